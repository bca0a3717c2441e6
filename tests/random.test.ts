import { describe, it, expect } from 'vitest';
import { SeededRandom, createRandomSource, randomSeed, MAX_SEED } from '../src/random';

describe('random', () => {
  describe('SeededRandom', () => {
    it('produces the Mulberry32 sequence', () => {
      const rng = new SeededRandom(42);
      expect(rng.next()).toBe(0.6011037519201636);
      expect(rng.next()).toBe(0.44829055899754167);
      expect(rng.next()).toBe(0.8524657934904099);
    });

    it('accepts a zero seed', () => {
      const rng = new SeededRandom(0);
      expect(rng.next()).toBe(0.26642920868471265);
      expect(rng.next()).toBe(0.0003297457005828619);
    });

    it('replays the same draws for the same seed', () => {
      const a = new SeededRandom(31337);
      const b = new SeededRandom(31337);
      for (let i = 0; i < 100; i++) {
        expect(a.next()).toBe(b.next());
      }
    });

    it('accepts the largest 32-bit seed', () => {
      expect(new SeededRandom(MAX_SEED).seed).toBe(4294967295);
    });

    it('rejects seeds that are not unsigned 32-bit integers', () => {
      expect(() => new SeededRandom(-1)).toThrow(RangeError);
      expect(() => new SeededRandom(1.5)).toThrow(RangeError);
      expect(() => new SeededRandom(4294967296)).toThrow(RangeError);
      expect(() => new SeededRandom(NaN)).toThrow('Seed must be an integer from 0 to 4294967295, got NaN');
    });

    it('stays within [0, 1)', () => {
      const rng = new SeededRandom(123);
      for (let i = 0; i < 10000; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('createRandomSource', () => {
    it('uses the given seed', () => {
      const rng = createRandomSource(7);
      expect(rng.seed).toBe(7);
      expect(rng.next()).toBe(new SeededRandom(7).next());
    });

    it('draws a 32-bit seed when none is given', () => {
      const { seed } = createRandomSource();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    });
  });

  describe('randomSeed', () => {
    it('returns an unsigned 32-bit integer', () => {
      const seed = randomSeed();
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(0xffffffff);
    });
  });
});
