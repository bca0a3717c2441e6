import type { GrammarSymbol, LetterSymbol, LiteralSymbol } from './types';

/** Create a letter (non-terminal) symbol. */
export function letter(name: string): LetterSymbol {
  return Object.freeze({ type: 'letter', name });
}

/** Create a literal (terminal) symbol. */
export function literal(text: string): LiteralSymbol {
  return Object.freeze({ type: 'literal', text });
}

export function symbolsEqual(a: GrammarSymbol, b: GrammarSymbol): boolean {
  if (a.type === 'letter') {
    return b.type === 'letter' && a.name === b.name;
  }
  return b.type === 'literal' && a.text === b.text;
}

/** Element-wise comparison of two symbol sequences. */
export function sequencesEqual(a: readonly GrammarSymbol[], b: readonly GrammarSymbol[]): boolean {
  return a.length === b.length && a.every((symbol, i) => symbolsEqual(symbol, b[i]));
}
