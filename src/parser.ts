/**
 * LSYS — Parser
 *
 * Consumes the token stream in three fixed phases (alphabet, axiom,
 * rules) and builds a `ParsedGrammar`. Rule bodies are flat symbol runs,
 * so each case is collected with a simple accumulator rather than a
 * recursive descent. Fails fast on the first structural problem.
 */

import { tokenize } from './lexer';
import type { Token, TokenKind } from './lexer';
import { letter, literal } from './symbols';
import type { GrammarSymbol, ParsedGrammar, ReplacementCase, Rule, Weight } from './types';

export type ParseErrorReason =
  | 'expected alphabet declaration'
  | 'duplicate letter'
  | 'expected axiom'
  | 'unterminated axiom'
  | 'unknown letter in axiom'
  | 'unknown letter in rule'
  | 'duplicate rule for letter'
  | 'unknown letter in rule body'
  | 'empty replacement case'
  | 'unterminated rule'
  | 'unexpected trailing content'
  | 'unexpected token';

export class ParseError extends Error {
  constructor(
    public readonly reason: ParseErrorReason,
    message: string,
    public readonly line: number,
  ) {
    super(`Parse error at line ${line}: ${message}`);
    this.name = 'ParseError';
  }
}

const TOKEN_NAMES: Record<TokenKind, string> = {
  percent: "'%'",
  at: "'@'",
  dollar: "'$'",
  equals: "'='",
  pipe: "'|'",
  tilde: "'~'",
  colon: "':'",
  comma: "','",
  ident: 'identifier',
  string: 'string',
  number: 'number',
};

function describe(token: Token | undefined): string {
  if (token === undefined) return 'end of input';
  if (token.kind === 'ident' || token.kind === 'number') return `${TOKEN_NAMES[token.kind]} '${token.text}'`;
  if (token.kind === 'string') return `string "${token.text}"`;
  return TOKEN_NAMES[token.kind];
}

/**
 * Parse LSYS grammar text.
 *
 * @throws LexError on malformed tokens
 * @throws ParseError on structural violations
 *
 * @example
 * ```ts
 * const parsed = parse(`
 *   %NOUN, VERB
 *   @NOUN, " runs"@
 *   $NOUN = "dog " | "cat " ~
 * `);
 * parsed.alphabet; // ['NOUN', 'VERB']
 * ```
 */
export function parse(input: string): ParsedGrammar {
  const tokens = tokenize(input);
  let current = pull();
  let lastLine = 1;

  function pull(): Token | undefined {
    const result = tokens.next();
    return result.done ? undefined : result.value;
  }

  function peek(): Token | undefined {
    return current;
  }

  function advance(): Token {
    const token = current;
    if (token === undefined) {
      throw new ParseError('unexpected token', 'Unexpected end of input', lastLine);
    }
    lastLine = token.line;
    current = pull();
    return token;
  }

  function unexpected(token: Token | undefined, expected: string): ParseError {
    return new ParseError(
      'unexpected token',
      `Expected ${expected} but found ${describe(token)}`,
      token?.line ?? lastLine,
    );
  }

  // ─── Phase 1: alphabet ────────────────────────────────────────

  const alphabet = parseAlphabet();
  const members = new Set(alphabet);

  function parseAlphabet(): string[] {
    const first = peek();
    if (first?.kind !== 'percent') {
      throw new ParseError(
        'expected alphabet declaration',
        `Expected '%' alphabet declaration but found ${describe(first)}`,
        first?.line ?? lastLine,
      );
    }
    advance();

    const letters: string[] = [];
    for (;;) {
      const token = peek();
      if (token?.kind !== 'ident') {
        throw unexpected(token, 'a letter name');
      }
      advance();
      if (letters.includes(token.text)) {
        throw new ParseError('duplicate letter', `Letter '${token.text}' is declared twice`, token.line);
      }
      letters.push(token.text);

      if (peek()?.kind !== 'comma') break;
      advance();
    }
    return letters;
  }

  // ─── Phase 2: axiom ───────────────────────────────────────────

  const axiom = parseAxiom();

  function parseAxiom(): GrammarSymbol[] {
    const open = peek();
    if (open?.kind !== 'at') {
      throw new ParseError('expected axiom', `Expected '@' axiom but found ${describe(open)}`, open?.line ?? lastLine);
    }
    advance();

    const symbols: GrammarSymbol[] = [];
    for (;;) {
      const item = peek();
      if (item === undefined || item.kind === 'dollar') {
        throw new ParseError('unterminated axiom', "Axiom is missing its closing '@'", open.line);
      }
      if (item.kind === 'string') {
        symbols.push(literal(item.text));
      } else if (item.kind === 'ident') {
        if (!members.has(item.text)) {
          throw new ParseError('unknown letter in axiom', `Letter '${item.text}' is not in the alphabet`, item.line);
        }
        symbols.push(letter(item.text));
      } else {
        throw unexpected(item, 'a letter or string');
      }
      advance();

      const separator = peek();
      if (separator === undefined || separator.kind === 'dollar') {
        throw new ParseError('unterminated axiom', "Axiom is missing its closing '@'", open.line);
      }
      advance();
      if (separator.kind === 'at') break;
      if (separator.kind !== 'comma') {
        throw unexpected(separator, "',' or '@'");
      }
    }
    return symbols;
  }

  // ─── Phase 3: rules ───────────────────────────────────────────

  const rules = new Map<string, Rule>();

  for (let token = peek(); token !== undefined; token = peek()) {
    if (token.kind !== 'dollar') {
      throw new ParseError(
        'unexpected trailing content',
        `Expected '$' rule block but found ${describe(token)}`,
        token.line,
      );
    }
    const rule = parseRule();
    rules.set(rule.letter, rule);
  }

  return { alphabet, axiom, rules };

  function parseRule(): Rule {
    const dollar = advance();

    const name = peek();
    if (name === undefined) {
      throw new ParseError('unterminated rule', "Rule is missing its closing '~'", dollar.line);
    }
    if (name.kind !== 'ident') {
      throw unexpected(name, 'a letter name');
    }
    advance();
    if (!members.has(name.text)) {
      throw new ParseError('unknown letter in rule', `Letter '${name.text}' is not in the alphabet`, name.line);
    }
    if (rules.has(name.text)) {
      throw new ParseError('duplicate rule for letter', `Letter '${name.text}' already has a rule`, name.line);
    }

    const equals = peek();
    if (equals === undefined || equals.kind === 'dollar') {
      throw unterminatedRule(name.text, dollar.line);
    }
    if (equals.kind !== 'equals') {
      throw unexpected(equals, "'='");
    }
    advance();

    const cases: ReplacementCase[] = [];
    for (;;) {
      cases.push(parseCase(name.text, dollar.line));
      // parseCase leaves a '|' or '~' in front of us
      if (advance().kind === 'tilde') break;
    }

    return { letter: name.text, cases, line: dollar.line };
  }

  function parseCase(ruleLetter: string, ruleLine: number): ReplacementCase {
    const symbols: GrammarSymbol[] = [];
    const line = peek()?.line ?? lastLine;

    let token = peek();
    while (token?.kind === 'string' || token?.kind === 'ident') {
      if (token.kind === 'string') {
        symbols.push(literal(token.text));
      } else {
        if (!members.has(token.text)) {
          throw new ParseError(
            'unknown letter in rule body',
            `Letter '${token.text}' in the rule for '${ruleLetter}' is not in the alphabet`,
            token.line,
          );
        }
        symbols.push(letter(token.text));
      }
      advance();
      token = peek();
    }

    if (token === undefined || token.kind === 'dollar') {
      throw unterminatedRule(ruleLetter, ruleLine);
    }
    if (symbols.length === 0) {
      throw new ParseError(
        'empty replacement case',
        `The rule for '${ruleLetter}' has a case with no symbols`,
        token.line,
      );
    }

    let weight: Weight | undefined;
    if (token.kind === 'colon') {
      advance();
      weight = parseWeight(ruleLetter, ruleLine);
      token = peek();
    }

    if (token === undefined || token.kind === 'dollar') {
      throw unterminatedRule(ruleLetter, ruleLine);
    }
    if (token.kind !== 'pipe' && token.kind !== 'tilde') {
      throw unexpected(token, "'|' or '~'");
    }

    return weight === undefined ? { symbols, line } : { symbols, weight, line };
  }

  function parseWeight(ruleLetter: string, ruleLine: number): Weight {
    const number = peek();
    if (number === undefined) {
      throw unterminatedRule(ruleLetter, ruleLine);
    }
    if (number.kind !== 'number') {
      throw unexpected(number, 'a weight');
    }
    advance();

    // A '%' straight after the number marks a percentage
    const marker = peek();
    if (
      marker?.kind === 'percent' &&
      marker.line === number.line &&
      marker.column === number.column + number.text.length
    ) {
      advance();
      return { value: Number(number.text), kind: 'percent' };
    }
    return { value: Number(number.text), kind: 'relative' };
  }

  function unterminatedRule(ruleLetter: string, ruleLine: number): ParseError {
    return new ParseError('unterminated rule', `The rule for '${ruleLetter}' is missing its closing '~'`, ruleLine);
  }
}
