/**
 * LSYS — Stochastic L-system grammars
 *
 * Parses `.lsys` grammar text and expands it generation by generation,
 * choosing among weighted replacement cases with an injected random
 * source.
 */

import { parse } from './parser';
import { validate, GrammarValidationError } from './validator';
import { generate, realize } from './expander';
import { createRandomSource } from './random';
import type { Grammar } from './types';

export type {
  LetterSymbol,
  LiteralSymbol,
  GrammarSymbol,
  Weight,
  ReplacementCase,
  Rule,
  RuleTable,
  ParsedGrammar,
  Grammar,
  Generation,
} from './types';

export { tokenize, LexError } from './lexer';
export type { Token, TokenKind } from './lexer';
export { parse, ParseError } from './parser';
export type { ParseErrorReason } from './parser';
export {
  validate,
  ValidationError,
  GrammarValidationError,
  InvariantError,
} from './validator';
export type { ValidationErrorReason, ValidationResult, ValidationWarning } from './validator';
export {
  expand,
  selectCase,
  generations,
  generate,
  realize,
  ExpansionError,
} from './expander';
export type { GenerationOptions } from './expander';
export { SeededRandom, createRandomSource, randomSeed, MAX_SEED } from './random';
export type { RandomSource } from './random';
export { letter, literal, symbolsEqual, sequencesEqual } from './symbols';
export {
  defineGrammar,
  spread,
  weightedSpread,
  template,
  fill,
  FILL,
  DefinitionError,
} from './builder';
export type {
  CaseInput,
  DefinitionErrorReason,
  GrammarDefinition,
  NumberedFill,
  FillValue,
  RecipePart,
  SupplementItem,
  TemplateOptions,
} from './builder';
export { ConsoleLogger, createLogger, LOG_LEVELS } from './logger';
export type { Logger, LogLevel } from './logger';

/**
 * Parse and validate grammar text in one step.
 *
 * @throws LexError, ParseError, or GrammarValidationError (which lists
 *   every validation problem at once)
 *
 * @example
 * ```ts
 * import { compile } from 'lsys';
 *
 * const grammar = compile(`
 *   %A
 *   @A@
 *   $A = "x":1 | "y":3 ~
 * `);
 * ```
 */
export function compile(input: string): Grammar {
  const result = validate(parse(input));
  if (!result.ok) {
    throw new GrammarValidationError(result.errors);
  }
  return result.grammar;
}

export interface LsysOptions {
  /** Expansion steps after the axiom. */
  steps: number;
  /** Seed for the random source; drawn at random when omitted. */
  seed?: number;
}

/**
 * Compile grammar text and return the text of generations 0 through
 * `steps`.
 *
 * @example
 * ```ts
 * import { lsys } from 'lsys';
 *
 * lsys('%A\n@A, "!"@\n$A = "hi" ~', { steps: 1 });
 * // ['A!', 'hi!']
 * ```
 */
export function lsys(input: string, options: LsysOptions): string[] {
  const grammar = compile(input);
  return generate(grammar, options.steps, createRandomSource(options.seed)).map(realize);
}
