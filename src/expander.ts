/**
 * LSYS — Expander
 *
 * Rewrites a generation into the next one. Literals and letters without a
 * rule are copied through; every other letter is replaced by one of its
 * rule's cases, picked by weighted random choice from the injected
 * `RandomSource`.
 */

import type { RandomSource } from './random';
import { sequencesEqual } from './symbols';
import { InvariantError } from './validator';
import type { Generation, Grammar, GrammarSymbol, ReplacementCase, Rule } from './types';

export class ExpansionError extends Error {
  constructor(
    message: string,
    public readonly step: number,
    public readonly size: number,
  ) {
    super(message);
    this.name = 'ExpansionError';
  }
}

export interface GenerationOptions {
  /**
   * Number of expansion steps to run after generation 0.
   * Default: unlimited (the iterator runs until the caller stops or
   * `untilStable` ends it).
   */
  limit?: number;
  /** Stop as soon as a step leaves the generation unchanged. */
  untilStable?: boolean;
  /**
   * Largest generation (in symbols) to allow. A step producing more
   * throws an ExpansionError. Default: no cap.
   */
  maxSymbols?: number;
}

const alphabetCache = new WeakMap<Grammar, ReadonlySet<string>>();

function membersOf(grammar: Grammar): ReadonlySet<string> {
  let members = alphabetCache.get(grammar);
  if (members === undefined) {
    members = new Set(grammar.alphabet);
    alphabetCache.set(grammar, members);
  }
  return members;
}

function isWeighted(rule: Rule): boolean {
  return rule.cases.every(c => c.weight !== undefined);
}

/**
 * Pick one case of a rule.
 *
 * Unweighted rules pick uniformly. Weighted rules normalize the weights
 * into a distribution and take the first case, in declaration order,
 * whose cumulative interval contains the draw. Zero-weight cases have an
 * empty interval and are never picked.
 */
export function selectCase(rule: Rule, rng: RandomSource): ReplacementCase {
  const { cases } = rule;
  if (cases.length === 0) {
    throw new InvariantError(`the rule for '${rule.letter}' has no cases`);
  }

  const draw = rng.next();
  if (!(draw >= 0 && draw < 1)) {
    throw new RangeError(`RandomSource returned ${draw}, expected a number in [0, 1)`);
  }

  if (!isWeighted(rule)) {
    return cases[Math.min(Math.floor(draw * cases.length), cases.length - 1)];
  }

  const total = cases.reduce((sum, c) => sum + (c.weight?.value ?? 0), 0);
  if (!(total > 0)) {
    throw new InvariantError(`the weights of the rule for '${rule.letter}' do not add up to a positive total`);
  }

  let cumulative = 0;
  let last: ReplacementCase | undefined;
  for (const c of cases) {
    const probability = (c.weight?.value ?? 0) / total;
    if (probability <= 0) continue;
    last = c;
    cumulative += probability;
    if (draw < cumulative) return c;
  }

  if (last === undefined) {
    throw new InvariantError(`the rule for '${rule.letter}' has no case with a positive weight`);
  }
  // Rounding can leave the final boundary just under 1
  return last;
}

/**
 * Expand a generation by one step. The input is left untouched; the
 * result is a new frozen array.
 */
export function expand(generation: Generation, grammar: Grammar, rng: RandomSource): Generation {
  const members = membersOf(grammar);
  const output: GrammarSymbol[] = [];

  for (const symbol of generation) {
    if (symbol.type === 'literal') {
      output.push(symbol);
      continue;
    }

    const rule = grammar.rules.get(symbol.name);
    if (rule === undefined) {
      if (!members.has(symbol.name)) {
        throw new InvariantError(`letter '${symbol.name}' is not in the alphabet`);
      }
      output.push(symbol);
      continue;
    }

    for (const replacement of selectCase(rule, rng).symbols) {
      output.push(replacement);
    }
  }

  return Object.freeze(output);
}

function checkCount(value: number, name: string): void {
  if (value !== Infinity && (!Number.isInteger(value) || value < 0)) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Lazily produce the generation sequence, starting with generation 0
 * (the axiom). Each yielded generation is independent of the others and
 * may be kept after the iterator moves on.
 *
 * @example
 * ```ts
 * for (const generation of generations(grammar, new SeededRandom(7), { limit: 3 })) {
 *   console.log(realize(generation));
 * }
 * ```
 */
export function* generations(
  grammar: Grammar,
  rng: RandomSource,
  options?: GenerationOptions,
): Generator<Generation, void, undefined> {
  const limit = options?.limit ?? Infinity;
  const maxSymbols = options?.maxSymbols ?? Infinity;
  checkCount(limit, 'limit');
  checkCount(maxSymbols, 'maxSymbols');

  let current: Generation = grammar.axiom;
  yield current;

  for (let step = 1; step <= limit; step++) {
    const next = expand(current, grammar, rng);

    if (next.length > maxSymbols) {
      throw new ExpansionError(
        `Generation ${step} has ${next.length.toLocaleString()} symbols, ` +
        `which exceeds the limit of ${maxSymbols.toLocaleString()}`,
        step,
        next.length,
      );
    }

    if (options?.untilStable && sequencesEqual(next, current)) return;

    yield next;
    current = next;
  }
}

/** Generations 0 through `steps`, inclusive. */
export function generate(grammar: Grammar, steps: number, rng: RandomSource): Generation[] {
  if (!Number.isInteger(steps) || steps < 0) {
    throw new RangeError(`steps must be a non-negative integer, got ${steps}`);
  }
  return [...generations(grammar, rng, { limit: steps })];
}

/** Join a generation into text: literal contents and letter names, in order. */
export function realize(generation: Generation): string {
  return generation.map(symbol => (symbol.type === 'literal' ? symbol.text : symbol.name)).join('');
}
