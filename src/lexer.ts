/**
 * LSYS — Lexer
 *
 * Turns grammar text into a lazy stream of tokens. Comment lines (first
 * non-blank character `#`) and whitespace outside strings are dropped.
 */

export type TokenKind =
  | 'percent'
  | 'at'
  | 'dollar'
  | 'equals'
  | 'pipe'
  | 'tilde'
  | 'colon'
  | 'comma'
  | 'ident'
  | 'string'
  | 'number';

export interface Token {
  kind: TokenKind;
  /** Identifier name, string contents (without quotes) or number text. */
  text: string;
  line: number;
  column: number;
}

export class LexError extends Error {
  constructor(
    public readonly reason: 'unterminated string' | 'unexpected character',
    message: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`Lex error at line ${line}, column ${column}: ${message}`);
    this.name = 'LexError';
  }
}

const PUNCTUATION: Partial<Record<string, TokenKind>> = {
  '%': 'percent',
  '@': 'at',
  '$': 'dollar',
  '=': 'equals',
  '|': 'pipe',
  '~': 'tilde',
  ':': 'colon',
  ',': 'comma',
};

const IDENT_START = /^[A-Za-z_]$/;
const IDENT_PART = /^[A-Za-z0-9_]$/;
const DIGIT = /^[0-9]$/;
const WHITESPACE = /^[ \t\r\f\v]$/;
const COMMENT_LINE = /^\s*#/;

/**
 * Tokenize grammar text. The returned iterator is single-pass: it walks
 * the input line by line as tokens are requested and cannot be rewound.
 */
export function* tokenize(input: string): Generator<Token, void, undefined> {
  const lines = input.split('\n');

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (COMMENT_LINE.test(line)) continue;
    yield* tokenizeLine(line, index + 1);
  }
}

function* tokenizeLine(src: string, line: number): Generator<Token, void, undefined> {
  let pos = 0;

  while (pos < src.length) {
    const ch = src[pos];
    const column = pos + 1;

    if (WHITESPACE.test(ch)) {
      pos++;
      continue;
    }

    const punctuation = PUNCTUATION[ch];
    if (punctuation !== undefined) {
      pos++;
      yield { kind: punctuation, text: ch, line, column };
      continue;
    }

    if (ch === '"') {
      const close = src.indexOf('"', pos + 1);
      if (close === -1) {
        throw new LexError('unterminated string', 'Unterminated string literal', line, column);
      }
      yield { kind: 'string', text: src.slice(pos + 1, close), line, column };
      pos = close + 1;
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = pos;
      while (pos < src.length && IDENT_PART.test(src[pos])) pos++;
      yield { kind: 'ident', text: src.slice(start, pos), line, column };
      continue;
    }

    if (DIGIT.test(ch)) {
      const start = pos;
      while (pos < src.length && DIGIT.test(src[pos])) pos++;
      // A fractional part needs at least one digit after the dot
      if (src[pos] === '.' && pos + 1 < src.length && DIGIT.test(src[pos + 1])) {
        pos++;
        while (pos < src.length && DIGIT.test(src[pos])) pos++;
      }
      yield { kind: 'number', text: src.slice(start, pos), line, column };
      continue;
    }

    throw new LexError('unexpected character', `Unexpected character '${ch}'`, line, column);
  }
}
