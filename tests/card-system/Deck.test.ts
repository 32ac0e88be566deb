import { describe, it, expect } from 'vitest';
import {
  VALUE_POOL,
  pairValues,
  createPairedDeck,
  shuffle,
} from '../../src/card-system/Deck';

describe('Deck', () => {
  describe('VALUE_POOL', () => {
    it('should hold 70 distinct single-character symbols', () => {
      expect(VALUE_POOL).toHaveLength(70);
      expect(new Set(VALUE_POOL).size).toBe(70);
      expect(VALUE_POOL.every((v) => v.length === 1)).toBe(true);
    });

    it('should order uppercase, lowercase, digits, then punctuation', () => {
      expect(VALUE_POOL[0]).toBe('A');
      expect(VALUE_POOL[25]).toBe('Z');
      expect(VALUE_POOL[26]).toBe('a');
      expect(VALUE_POOL[52]).toBe('0');
      expect(VALUE_POOL[61]).toBe('9');
      expect(VALUE_POOL.slice(62).join('')).toBe('!@#$%^&*');
    });
  });

  describe('pairValues', () => {
    it('should take values in pool order', () => {
      expect(pairValues(3)).toEqual(['A', 'B', 'C']);
    });

    it('should return nothing for zero pairs', () => {
      expect(pairValues(0)).toEqual([]);
    });

    it('should use the whole pool for 70 pairs', () => {
      expect(pairValues(70)).toEqual([...VALUE_POOL]);
    });

    it('should cycle the pool past 70 pairs', () => {
      const values = pairValues(72);
      expect(values).toHaveLength(72);
      expect(values[69]).toBe('*');
      expect(values[70]).toBe('A');
      expect(values[71]).toBe('B');
    });
  });

  describe('createPairedDeck', () => {
    it('should place each value twice, adjacent', () => {
      expect(createPairedDeck(2)).toEqual(['A', 'A', 'B', 'B']);
    });

    it('should hold 2 * pairCount cards', () => {
      expect(createPairedDeck(8)).toHaveLength(16);
    });
  });

  describe('shuffle', () => {
    it('should change the order of cards', () => {
      const deck = createPairedDeck(26);
      const originalOrder = [...deck];

      // Use a deterministic RNG that produces varied output
      let seed = 42;
      const rng = (): number => {
        seed = (seed * 16807) % 2147483647;
        return (seed - 1) / 2147483646;
      };

      shuffle(deck, rng);
      expect(deck).not.toEqual(originalOrder);
    });

    it('should retain every card after shuffling', () => {
      const deck = createPairedDeck(10);
      shuffle(deck);
      expect(deck).toHaveLength(20);
      expect([...deck].sort()).toEqual(createPairedDeck(10).sort());
    });

    it('should return the same array reference', () => {
      const deck = [1, 2, 3];
      expect(shuffle(deck)).toBe(deck);
    });

    it('should swap each position with index 0 when rng returns 0', () => {
      expect(shuffle([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
    });

    it('should keep the order when rng always picks the current index', () => {
      expect(shuffle([1, 2, 3, 4], () => 0.999)).toEqual([1, 2, 3, 4]);
    });

    it('should handle empty and single-card decks', () => {
      expect(shuffle([])).toEqual([]);
      expect(shuffle(['A'])).toEqual(['A']);
    });

    it('should be deterministic for the same rng sequence', () => {
      const makeRng = (): (() => number) => {
        let s = 9;
        return () => {
          s = (s * 1664525 + 1013904223) % 4294967296;
          return s / 4294967296;
        };
      };
      const a = shuffle(createPairedDeck(8), makeRng());
      const b = shuffle(createPairedDeck(8), makeRng());
      expect(a).toEqual(b);
    });
  });
});
