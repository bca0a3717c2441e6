/**
 * LSYS — Validator
 *
 * Cross-checks a parsed grammar for weight consistency and collects every
 * problem into a single report. Letter resolution is re-checked as an
 * internal invariant: the parser (or the builder) must already have
 * rejected unknown letters, so a failure there is a bug, not bad input.
 */

import type { Grammar, GrammarSymbol, ParsedGrammar, ReplacementCase, Rule, RuleTable } from './types';

export type ValidationErrorReason =
  | 'inconsistent weighting'
  | 'invalid weight'
  | 'negative weight'
  | 'zero total weight'
  | 'mixed weight kinds'
  | 'percent out of range';

export class ValidationError extends Error {
  constructor(
    public readonly reason: ValidationErrorReason,
    message: string,
    public readonly line: number,
    public readonly letter: string,
  ) {
    super(line > 0 ? `Validation error at line ${line}: ${message}` : `Validation error: ${message}`);
    this.name = 'ValidationError';
  }
}

/** Thrown by `compile()` when validation reports one or more errors. */
export class GrammarValidationError extends Error {
  constructor(public readonly errors: readonly ValidationError[]) {
    super(
      `Grammar has ${errors.length} validation error${errors.length === 1 ? '' : 's'}:\n` +
      errors.map(e => `  ${e.message}`).join('\n'),
    );
    this.name = 'GrammarValidationError';
  }
}

/** A broken internal assumption: reaching this means a bug upstream. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(`Internal invariant violated: ${message}`);
    this.name = 'InvariantError';
  }
}

export interface ValidationWarning {
  code: 'letter without rule' | 'percent total';
  message: string;
  line: number;
  letter: string;
}

export type ValidationResult =
  | { ok: true; grammar: Grammar; warnings: ValidationWarning[] }
  | { ok: false; errors: ValidationError[]; warnings: ValidationWarning[] };

/** Percent totals within this distance of 100 count as exact. */
const PERCENT_EPSILON = 1e-6;

/**
 * Validate a parsed grammar.
 *
 * Never throws for user-facing problems; they are returned in the result.
 * Throws `InvariantError` if a letter reference escaped the parser.
 */
export function validate(parsed: ParsedGrammar): ValidationResult {
  assertLettersResolve(parsed);

  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const rule of parsed.rules.values()) {
    checkRule(rule, errors, warnings);
  }

  for (const name of parsed.alphabet) {
    if (!parsed.rules.has(name)) {
      warnings.push({
        code: 'letter without rule',
        message: `Letter '${name}' has no rule and will be rewritten to itself`,
        line: 0,
        letter: name,
      });
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors, warnings };
  }
  return { ok: true, grammar: freeze(parsed), warnings };
}

function checkRule(rule: Rule, errors: ValidationError[], warnings: ValidationWarning[]): void {
  const weighted = rule.cases.filter(c => c.weight !== undefined);

  if (weighted.length === 0) return;

  if (weighted.length !== rule.cases.length) {
    errors.push(new ValidationError(
      'inconsistent weighting',
      `The rule for '${rule.letter}' weights ${weighted.length} of ${rule.cases.length} cases; weight all or none`,
      rule.line,
      rule.letter,
    ));
    return;
  }

  let total = 0;
  let rejected = false;
  for (const c of rule.cases) {
    const value = weightOf(c);
    if (!Number.isFinite(value)) {
      rejected = true;
      errors.push(new ValidationError(
        'invalid weight',
        `The rule for '${rule.letter}' has a weight that is not a finite number (${value})`,
        c.line || rule.line,
        rule.letter,
      ));
    } else if (value < 0) {
      rejected = true;
      errors.push(new ValidationError(
        'negative weight',
        `The rule for '${rule.letter}' has a negative weight (${value})`,
        c.line || rule.line,
        rule.letter,
      ));
    } else {
      total += value;
    }
  }

  if (!rejected && !Number.isFinite(total)) {
    rejected = true;
    errors.push(new ValidationError(
      'invalid weight',
      `The weights of the rule for '${rule.letter}' add up to more than a number can hold`,
      rule.line,
      rule.letter,
    ));
  }

  if (!rejected && total <= 0) {
    errors.push(new ValidationError(
      'zero total weight',
      `The weights of the rule for '${rule.letter}' add up to zero`,
      rule.line,
      rule.letter,
    ));
  }

  const percent = rule.cases.filter(c => c.weight?.kind === 'percent');
  if (percent.length === 0) return;

  if (percent.length !== rule.cases.length) {
    errors.push(new ValidationError(
      'mixed weight kinds',
      `The rule for '${rule.letter}' mixes percent and relative weights`,
      rule.line,
      rule.letter,
    ));
    return;
  }

  for (const c of percent) {
    const value = weightOf(c);
    if (Number.isFinite(value) && value > 100) {
      errors.push(new ValidationError(
        'percent out of range',
        `The rule for '${rule.letter}' has a percent weight above 100 (${value}%)`,
        c.line || rule.line,
        rule.letter,
      ));
    }
  }

  if (!rejected && total > 0 && Math.abs(total - 100) > PERCENT_EPSILON) {
    warnings.push({
      code: 'percent total',
      message: `The percent weights of the rule for '${rule.letter}' add up to ${total}%, not 100%; they will be normalized`,
      line: rule.line,
      letter: rule.letter,
    });
  }
}

function weightOf(c: ReplacementCase): number {
  return c.weight?.value ?? 0;
}

function assertLettersResolve(parsed: ParsedGrammar): void {
  const members = new Set(parsed.alphabet);

  const check = (symbols: readonly GrammarSymbol[], where: string): void => {
    for (const symbol of symbols) {
      if (symbol.type === 'letter' && !members.has(symbol.name)) {
        throw new InvariantError(`letter '${symbol.name}' in ${where} is not in the alphabet`);
      }
    }
  };

  check(parsed.axiom, 'the axiom');
  for (const [key, rule] of parsed.rules) {
    if (key !== rule.letter || !members.has(key)) {
      throw new InvariantError(`rule key '${key}' does not name an alphabet letter`);
    }
    if (rule.cases.length === 0) {
      throw new InvariantError(`the rule for '${key}' has no cases`);
    }
    for (const c of rule.cases) {
      check(c.symbols, `the rule for '${key}'`);
    }
  }
}

/** Copy the parsed grammar into frozen structures the expander can share. */
function freeze(parsed: ParsedGrammar): Grammar {
  const rules = new Map<string, Rule>();
  for (const [key, rule] of parsed.rules) {
    rules.set(key, Object.freeze({
      letter: rule.letter,
      line: rule.line,
      cases: Object.freeze(rule.cases.map(c => Object.freeze({
        ...c,
        symbols: freezeSymbols(c.symbols),
      }))),
    }));
  }

  const table: RuleTable = rules;
  return Object.freeze({
    alphabet: Object.freeze([...parsed.alphabet]),
    axiom: freezeSymbols(parsed.axiom),
    rules: table,
    validated: true as const,
  });
}

function freezeSymbols(symbols: readonly GrammarSymbol[]): readonly GrammarSymbol[] {
  return Object.freeze(symbols.map(s => (Object.isFrozen(s) ? s : Object.freeze({ ...s }))));
}
