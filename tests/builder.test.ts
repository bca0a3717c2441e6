import { describe, it, expect } from 'vitest';
import {
  defineGrammar,
  spread,
  weightedSpread,
  template,
  fill,
  FILL,
  letter,
  literal,
  DefinitionError,
} from '../src/builder';
import type { DefinitionErrorReason } from '../src/builder';
import { generate, realize } from '../src/expander';
import { SeededRandom } from '../src/random';
import { parse } from '../src/parser';
import { validate } from '../src/validator';

function reasonOf(fn: () => unknown): DefinitionErrorReason {
  try {
    fn();
  } catch (e) {
    if (e instanceof DefinitionError) return e.reason;
    throw e;
  }
  throw new Error('expected a DefinitionError');
}

describe('builder', () => {
  describe('defineGrammar', () => {
    it('builds the same grammar as the equivalent text', () => {
      const built = defineGrammar({
        alphabet: ['NOUN', 'VERB'],
        axiom: [letter('NOUN'), literal(' runs')],
        rules: { NOUN: [[literal('dog ')], [literal('cat ')]] },
      });
      const parsed = validate(parse('%NOUN, VERB\n@NOUN, " runs"@\n$NOUN = "dog " | "cat " ~'));
      if (!built.ok || !parsed.ok) throw new Error('expected valid grammars');

      const a = generate(built.grammar, 3, new SeededRandom(11)).map(realize);
      const b = generate(parsed.grammar, 3, new SeededRandom(11)).map(realize);
      expect(a).toEqual(b);
    });

    it('turns numeric weights into relative weights', () => {
      const result = defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: {
          A: [
            { symbols: [literal('x')], weight: 1 },
            { symbols: [literal('y')], weight: { value: 3, kind: 'relative' } },
          ],
        },
      });
      if (!result.ok) throw new Error('expected a valid grammar');
      expect(result.grammar.rules.get('A')?.cases.map(c => c.weight)).toEqual([
        { value: 1, kind: 'relative' },
        { value: 3, kind: 'relative' },
      ]);
    });

    it('reports weighting problems through the validator', () => {
      const result = defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [{ symbols: [literal('x')], weight: 1 }, [literal('y')]] },
      });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.errors.map(e => e.reason)).toEqual(['inconsistent weighting']);
    });

    it('reports negative weights', () => {
      const result = defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [{ symbols: [literal('x')], weight: -2 }, { symbols: [literal('y')], weight: 1 }] },
      });
      expect(result.ok ? [] : result.errors.map(e => e.reason)).toEqual(['negative weight']);
    });

    it('reports a NaN weight instead of approving it', () => {
      const result = defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [{ symbols: [literal('x')], weight: NaN }, { symbols: [literal('y')], weight: 1 }] },
      });
      expect(result.ok ? [] : result.errors.map(e => e.reason)).toEqual(['invalid weight']);
    });

    it('rejects structural mistakes', () => {
      expect(reasonOf(() => defineGrammar({ alphabet: ['1A'], axiom: [] }))).toBe('invalid letter name');
      expect(reasonOf(() => defineGrammar({ alphabet: ['A', 'A'], axiom: [] }))).toBe('duplicate letter');
      expect(reasonOf(() => defineGrammar({ alphabet: ['A'], axiom: [letter('B')] }))).toBe('unknown letter in axiom');
      expect(reasonOf(() => defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { B: [[literal('x')]] },
      }))).toBe('unknown letter in rule');
      expect(reasonOf(() => defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [] },
      }))).toBe('empty rule');
      expect(reasonOf(() => defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [[]] },
      }))).toBe('empty replacement case');
      expect(reasonOf(() => defineGrammar({
        alphabet: ['A'],
        axiom: [letter('A')],
        rules: { A: [[letter('C')]] },
      }))).toBe('unknown letter in rule body');
    });
  });

  describe('spread', () => {
    it('fills FILL with each supplement item', () => {
      expect(spread([letter('DET'), FILL, ' '], ['cat', 'dog'])).toEqual([
        [letter('DET'), literal('cat'), literal(' ')],
        [letter('DET'), literal('dog'), literal(' ')],
      ]);
    });

    it('accepts symbols as supplement items', () => {
      expect(spread([FILL, FILL], [letter('A')])).toEqual([[letter('A'), letter('A')]]);
    });

    it('fills numbered placeholders from tuples', () => {
      expect(spread([letter('A'), fill(1), letter('C'), fill(0)], [['1', '2'], ['3', '4']])).toEqual([
        [letter('A'), literal('2'), letter('C'), literal('1')],
        [letter('A'), literal('4'), letter('C'), literal('3')],
      ]);
    });

    it('returns nothing for an empty supplement', () => {
      expect(spread([FILL], [])).toEqual([]);
    });

    it('rejects mixing FILL with numbered fills', () => {
      expect(reasonOf(() => spread([FILL, fill(0)], ['a']))).toBe('invalid recipe');
    });

    it('rejects a tuple for FILL', () => {
      expect(reasonOf(() => spread([FILL], [['a', 'b']]))).toBe('invalid recipe');
    });

    it('rejects a numbered fill past the end of the tuple', () => {
      expect(() => spread([fill(2)], [['a', 'b']])).toThrow('fill(2) needs 3 values but the item has 2');
    });

    it('rejects a negative fill index', () => {
      expect(reasonOf(() => fill(-1))).toBe('invalid recipe');
    });
  });

  describe('weightedSpread', () => {
    it('applies a constant weight', () => {
      expect(weightedSpread([FILL], ['a', 'b'], 2)).toEqual([
        { symbols: [literal('a')], weight: 2 },
        { symbols: [literal('b')], weight: 2 },
      ]);
    });

    it('defaults the weight to 1', () => {
      expect(weightedSpread([FILL], ['a'])).toEqual([{ symbols: [literal('a')], weight: 1 }]);
    });

    it('computes weights from the produced symbols', () => {
      const byLength = (symbols: readonly { type: string }[]) => symbols.length;
      const cases = weightedSpread([letter('A'), FILL, letter('B')], ['cat', 'horse'], byLength);
      expect(cases.map(c => c.weight)).toEqual([3, 3]);

      const longWords = weightedSpread([FILL], ['cat', 'horse'], symbols => {
        const [first] = symbols;
        return first.type === 'literal' && first.text.length > 3 ? 2 : 3;
      });
      expect(longWords.map(c => c.weight)).toEqual([3, 2]);
    });

    it('feeds straight into a grammar definition', () => {
      const result = defineGrammar({
        alphabet: ['ADJ'],
        axiom: [letter('ADJ')],
        rules: { ADJ: [...weightedSpread([FILL, ' '], ['big', 'small'], 2), { symbols: [literal('')], weight: 1 }] },
      });
      expect(result.ok).toBe(true);
    });
  });

  describe('template', () => {
    it('splits letters from literal text', () => {
      expect(template('{N} something else')).toEqual([letter('N'), literal(' something else')]);
    });

    it('handles adjacent references', () => {
      expect(template('{V} {A} and {V}{V}')).toEqual([
        letter('V'),
        literal(' '),
        letter('A'),
        literal(' and '),
        letter('V'),
        letter('V'),
      ]);
    });

    it('supports custom delimiters', () => {
      expect(template('@B@@B@', { open: '@', close: '@' })).toEqual([letter('B'), letter('B')]);
    });

    it('keeps text without references as one literal', () => {
      expect(template('plain')).toEqual([literal('plain')]);
      expect(template('')).toEqual([]);
    });

    it('rejects a reference that is not a letter name', () => {
      expect(reasonOf(() => template('{not a name}'))).toBe('invalid template');
    });

    it('rejects empty delimiters', () => {
      expect(reasonOf(() => template('x', { open: '' }))).toBe('invalid template');
    });
  });
});
