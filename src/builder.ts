/**
 * LSYS — Builder
 *
 * Build grammars in code instead of text. Definitions go through the same
 * validator as parsed files, so the weighting rules are identical.
 */

import { letter, literal } from './symbols';
import { validate } from './validator';
import type { ValidationResult } from './validator';
import type { GrammarSymbol, ReplacementCase, Rule, Weight } from './types';

export { letter, literal };

export type DefinitionErrorReason =
  | 'invalid letter name'
  | 'duplicate letter'
  | 'unknown letter in axiom'
  | 'unknown letter in rule'
  | 'empty rule'
  | 'empty replacement case'
  | 'unknown letter in rule body'
  | 'invalid recipe'
  | 'invalid template';

export class DefinitionError extends Error {
  constructor(
    public readonly reason: DefinitionErrorReason,
    message: string,
  ) {
    super(message);
    this.name = 'DefinitionError';
  }
}

const LETTER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type CaseInput =
  | readonly GrammarSymbol[]
  | { readonly symbols: readonly GrammarSymbol[]; readonly weight: number | Weight };

export interface GrammarDefinition {
  alphabet: readonly string[];
  axiom: readonly GrammarSymbol[];
  rules?: Readonly<Record<string, readonly CaseInput[]>>;
}

function isSymbolList(input: CaseInput): input is readonly GrammarSymbol[] {
  return Array.isArray(input);
}

function toCase(input: CaseInput): ReplacementCase {
  if (isSymbolList(input)) {
    return { symbols: input, line: 0 };
  }
  const weight: Weight = typeof input.weight === 'number'
    ? { value: input.weight, kind: 'relative' }
    : input.weight;
  return { symbols: input.symbols, weight, line: 0 };
}

/**
 * Define a grammar in code and validate it.
 *
 * Structural mistakes (bad or unknown letters, empty rules or cases)
 * throw a `DefinitionError`; weighting problems come back in the
 * validation result, exactly as for parsed text.
 *
 * @example
 * ```ts
 * const result = defineGrammar({
 *   alphabet: ['A'],
 *   axiom: [letter('A')],
 *   rules: { A: [{ symbols: [literal('x')], weight: 1 }, { symbols: [literal('y')], weight: 3 }] },
 * });
 * ```
 */
export function defineGrammar(definition: GrammarDefinition): ValidationResult {
  const members = new Set<string>();
  for (const name of definition.alphabet) {
    if (!LETTER_NAME.test(name)) {
      throw new DefinitionError('invalid letter name', `'${name}' is not a valid letter name`);
    }
    if (members.has(name)) {
      throw new DefinitionError('duplicate letter', `Letter '${name}' is declared twice`);
    }
    members.add(name);
  }

  for (const symbol of definition.axiom) {
    if (symbol.type === 'letter' && !members.has(symbol.name)) {
      throw new DefinitionError('unknown letter in axiom', `Letter '${symbol.name}' is not in the alphabet`);
    }
  }

  const rules = new Map<string, Rule>();
  for (const [name, inputs] of Object.entries(definition.rules ?? {})) {
    if (!members.has(name)) {
      throw new DefinitionError('unknown letter in rule', `Letter '${name}' is not in the alphabet`);
    }
    if (inputs.length === 0) {
      throw new DefinitionError('empty rule', `The rule for '${name}' has no cases`);
    }

    const cases = inputs.map(toCase);
    for (const c of cases) {
      if (c.symbols.length === 0) {
        throw new DefinitionError('empty replacement case', `The rule for '${name}' has a case with no symbols`);
      }
      for (const symbol of c.symbols) {
        if (symbol.type === 'letter' && !members.has(symbol.name)) {
          throw new DefinitionError(
            'unknown letter in rule body',
            `Letter '${symbol.name}' in the rule for '${name}' is not in the alphabet`,
          );
        }
      }
    }
    rules.set(name, { letter: name, cases, line: 0 });
  }

  return validate({ alphabet: [...definition.alphabet], axiom: [...definition.axiom], rules });
}

// ─── Fill recipes ─────────────────────────────────────────────────

/** Placeholder for the whole supplement item in a `spread` recipe. */
export const FILL: unique symbol = Symbol('lsys.fill');

/** Placeholder for one element of a tuple supplement item. */
export interface NumberedFill {
  readonly fill: number;
}

/** Refer to element `index` (0-based) of each tuple supplement item. */
export function fill(index: number): NumberedFill {
  if (!Number.isInteger(index) || index < 0) {
    throw new DefinitionError('invalid recipe', `Fill index must be a non-negative integer, got ${index}`);
  }
  return { fill: index };
}

/** Strings in a recipe or supplement are shorthand for literals. */
export type FillValue = string | GrammarSymbol;
export type RecipePart = FillValue | typeof FILL | NumberedFill;
export type SupplementItem = FillValue | readonly FillValue[];

function toSymbol(value: FillValue): GrammarSymbol {
  return typeof value === 'string' ? literal(value) : value;
}

function isNumberedFill(part: RecipePart): part is NumberedFill {
  return typeof part === 'object' && 'fill' in part;
}

function isSequence(item: SupplementItem): item is readonly FillValue[] {
  return Array.isArray(item);
}

/**
 * Produce one case per supplement item by filling the recipe's
 * placeholders.
 *
 * With `FILL`, each item replaces every `FILL` in the recipe. With
 * numbered placeholders, each item is a tuple and `fill(i)` takes its
 * i-th element. The two kinds cannot be mixed in one recipe.
 *
 * @example
 * ```ts
 * spread([letter('DET'), FILL, ' '], ['cat', 'dog']);
 * // [[DET, "cat", " "], [DET, "dog", " "]]
 * ```
 */
export function spread(
  recipe: readonly RecipePart[],
  supplement: Iterable<SupplementItem>,
): GrammarSymbol[][] {
  const positional = recipe.some(part => part === FILL);
  const numbered = recipe.some(isNumberedFill);
  if (positional && numbered) {
    throw new DefinitionError('invalid recipe', 'A recipe cannot mix FILL with numbered fills');
  }

  const results: GrammarSymbol[][] = [];
  for (const item of supplement) {
    results.push(recipe.map(part => {
      if (part === FILL) {
        if (isSequence(item)) {
          throw new DefinitionError('invalid recipe', 'FILL takes single values; use fill(i) for tuples');
        }
        return toSymbol(item);
      }
      if (isNumberedFill(part)) {
        const values = isSequence(item) ? item : [item];
        if (part.fill >= values.length) {
          throw new DefinitionError(
            'invalid recipe',
            `fill(${part.fill}) needs ${part.fill + 1} values but the item has ${values.length}`,
          );
        }
        return toSymbol(values[part.fill]);
      }
      return toSymbol(part);
    }));
  }
  return results;
}

/**
 * Like `spread`, but each case carries a weight: a constant, or a
 * function of the produced symbols.
 */
export function weightedSpread(
  recipe: readonly RecipePart[],
  supplement: Iterable<SupplementItem>,
  weight: number | ((symbols: readonly GrammarSymbol[]) => number) = 1,
): { symbols: GrammarSymbol[]; weight: number }[] {
  return spread(recipe, supplement).map(symbols => ({
    symbols,
    weight: typeof weight === 'function' ? weight(symbols) : weight,
  }));
}

// ─── Templates ────────────────────────────────────────────────────

export interface TemplateOptions {
  /** Opening delimiter of a letter reference. Default: '{' */
  open?: string;
  /** Closing delimiter of a letter reference. Default: '}' */
  close?: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Convert template text into a symbol sequence. Delimited names become
 * letters; the text around them becomes literals.
 *
 * @example
 * ```ts
 * template('{N} something else');
 * // [letter('N'), literal(' something else')]
 * ```
 */
export function template(text: string, options?: TemplateOptions): GrammarSymbol[] {
  const open = options?.open ?? '{';
  const close = options?.close ?? '}';
  if (open.length === 0 || close.length === 0) {
    throw new DefinitionError('invalid template', 'Template delimiters must not be empty');
  }

  const reference = new RegExp(`(${escapeRegExp(open)}.+?${escapeRegExp(close)})`);
  const symbols: GrammarSymbol[] = [];

  for (const part of text.split(reference)) {
    if (part.length === 0) continue;
    if (part.length > open.length + close.length && part.startsWith(open) && part.endsWith(close)) {
      const name = part.slice(open.length, part.length - close.length);
      if (!LETTER_NAME.test(name)) {
        throw new DefinitionError('invalid template', `'${name}' in template "${text}" is not a valid letter name`);
      }
      symbols.push(letter(name));
    } else {
      symbols.push(literal(part));
    }
  }
  return symbols;
}
