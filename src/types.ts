/**
 * LSYS — Grammar Types
 *
 * The in-memory form of a stochastic L-system: symbols, replacement
 * cases, rules and the validated grammar handed to the expander.
 */

/** A non-terminal, rewritten by its rule if the grammar has one. */
export interface LetterSymbol {
  readonly type: 'letter';
  readonly name: string;
}

/** A terminal string, never rewritten. */
export interface LiteralSymbol {
  readonly type: 'literal';
  readonly text: string;
}

export type GrammarSymbol = LetterSymbol | LiteralSymbol;

/**
 * A case weight. `relative` weights are proportions (`"x":3`),
 * `percent` weights are chances out of 100 (`"x":25%`).
 */
export interface Weight {
  readonly value: number;
  readonly kind: 'relative' | 'percent';
}

/** One alternative of a rule: a flat symbol sequence and its weight, if any. */
export interface ReplacementCase {
  readonly symbols: readonly GrammarSymbol[];
  readonly weight?: Weight;
  /** Source line the case starts on (0 when built programmatically). */
  readonly line: number;
}

/** All replacement cases bound to one letter. */
export interface Rule {
  readonly letter: string;
  readonly cases: readonly ReplacementCase[];
  readonly line: number;
}

export type RuleTable = ReadonlyMap<string, Rule>;

/**
 * Parser output. Structurally sound but not yet checked for weight
 * consistency; pass it to `validate()` to obtain a `Grammar`.
 */
export interface ParsedGrammar {
  readonly alphabet: readonly string[];
  readonly axiom: readonly GrammarSymbol[];
  readonly rules: RuleTable;
}

/** A validated, frozen grammar. */
export interface Grammar extends ParsedGrammar {
  readonly validated: true;
}

/** One expansion step's output. Generation 0 is the axiom. */
export type Generation = readonly GrammarSymbol[];
