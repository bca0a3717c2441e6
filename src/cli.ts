/**
 * lsys — command line front end
 *
 * Reads a grammar file, reports diagnostics and prints each generation.
 *
 *   lsys grammar.lsys -n 8 --seed 42
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { LexError } from './lexer';
import { parse, ParseError } from './parser';
import { validate, GrammarValidationError } from './validator';
import { generations, realize, ExpansionError } from './expander';
import { SeededRandom, randomSeed, MAX_SEED } from './random';
import { createLogger, isLogLevel, LOG_LEVELS } from './logger';
import type { Logger, LogLevel } from './logger';
import type { Generation } from './types';

export interface CliIO {
  readFile(path: string): string;
  /** Standard output, one line per call. */
  write(line: string): void;
  /** Where commander prints usage errors and help. */
  writeError(text: string): void;
  createLogger(level: LogLevel): Logger;
}

export const defaultIO: CliIO = {
  readFile: path => readFileSync(path, 'utf-8'),
  write: line => process.stdout.write(`${line}\n`),
  writeError: text => process.stderr.write(text),
  createLogger,
};

export interface RunOptions {
  generations: number;
  seed?: number;
  untilStable?: boolean;
  maxSymbols?: number;
  json?: boolean;
  logLevel: LogLevel;
}

/** Failure that has already been put into words for the user. */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly hints: readonly string[] = [],
  ) {
    super(message);
    this.name = 'CliError';
  }
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

function parseSeed(value: string): number {
  const seed = Number(value);
  if (!/^\d+$/.test(value) || seed > MAX_SEED) {
    throw new InvalidArgumentError(`Expected an integer between 0 and ${MAX_SEED}.`);
  }
  return seed;
}

function parseLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return value;
}

function toJson(index: number, generation: Generation): Record<string, unknown> {
  return { generation: index, text: realize(generation), symbols: generation };
}

/**
 * Compile the grammar at `file` and write its generations.
 */
export function run(file: string, options: RunOptions, io: CliIO): void {
  const logger = io.createLogger(options.logLevel);

  let text: string;
  try {
    text = io.readFile(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError(`Cannot read ${file}`, [reason]);
  }
  logger.debug('Read grammar', { file, characters: text.length });

  const result = validate(parse(text));
  for (const warning of result.warnings) {
    logger.warn(warning.message, warning.line > 0 ? { line: warning.line } : undefined);
  }
  if (!result.ok) {
    throw new GrammarValidationError(result.errors);
  }

  const { grammar } = result;
  logger.debug('Compiled grammar', { letters: grammar.alphabet.length, rules: grammar.rules.size });

  const seed = options.seed ?? randomSeed();
  logger.info('Expanding', { seed, generations: options.generations });

  const sequence = generations(grammar, new SeededRandom(seed), {
    limit: options.generations,
    untilStable: options.untilStable,
    maxSymbols: options.maxSymbols,
  });

  if (options.json) {
    const all = [...sequence].map((generation, index) => toJson(index, generation));
    io.write(JSON.stringify({ seed, generations: all }, null, 2));
    return;
  }

  for (const generation of sequence) {
    io.write(realize(generation));
  }
}

export function createProgram(io: CliIO = defaultIO): Command {
  return new Command()
    .name('lsys')
    .description('Expand a stochastic L-system grammar')
    .argument('<file>', 'Grammar file (.lsys)')
    .option('-n, --generations <n>', 'Expansion steps after the axiom', parseCount, 5)
    .option('-s, --seed <n>', 'Seed for the random source (random when omitted)', parseSeed)
    .option('--until-stable', 'Stop early once a step changes nothing')
    .option('--max-symbols <n>', 'Fail if a generation grows past this many symbols', parseCount)
    .option('--json', 'Print generations as JSON')
    .option('--log-level <level>', `One of: ${LOG_LEVELS.join(', ')}`, parseLevel, 'warnings')
    .configureOutput({
      writeOut: text => io.write(text.replace(/\n$/, '')),
      writeErr: text => io.writeError(text),
    })
    .addHelpText('after', `
Examples:
  lsys grammar.lsys                 Print generations 0-5
  lsys grammar.lsys -n 10 -s 42     Ten steps, reproducible
  lsys grammar.lsys --until-stable  Stop when nothing is left to rewrite
`)
    .action((file: string, options: RunOptions) => {
      run(file, options, io);
    });
}

/**
 * Turn a failure into a title and follow-up lines.
 */
export function describeFailure(error: unknown): { title: string; hints: string[] } {
  if (error instanceof CliError) {
    return { title: error.message, hints: [...error.hints] };
  }
  if (error instanceof LexError || error instanceof ParseError) {
    return { title: error.message, hints: [`Fix the grammar near line ${error.line}`] };
  }
  if (error instanceof GrammarValidationError) {
    const count = error.errors.length;
    return {
      title: `Grammar has ${count} validation error${count === 1 ? '' : 's'}`,
      hints: error.errors.map(e => e.message),
    };
  }
  if (error instanceof ExpansionError) {
    return { title: error.message, hints: ['Raise --max-symbols or run fewer generations'] };
  }
  return { title: error instanceof Error ? error.message : String(error), hints: [] };
}

/**
 * Print a failure and exit with status 1.
 */
export function exitWithError(error: unknown): never {
  const { title, hints } = describeFailure(error);
  console.error(`✗ ${title}`);

  if (hints.length > 0) {
    console.error('');
    for (const hint of hints) {
      console.error(`→ ${hint}`);
    }
  }

  process.exit(1);
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync([...argv]);
  } catch (error) {
    exitWithError(error);
  }
}
