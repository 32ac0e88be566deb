/**
 * Deck operations for the memory engine.
 *
 * A deck is a plain array of card values. This module builds the
 * paired deck from the fixed value pool and shuffles it, keeping
 * the data model simple and composable.
 */

import type { CardValue } from './Card';

/**
 * The ordered value pool: uppercase letters, lowercase letters,
 * digits, then eight punctuation symbols (70 in total).
 */
export const VALUE_POOL: readonly CardValue[] = [
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  ...'abcdefghijklmnopqrstuvwxyz',
  ...'0123456789',
  ...'!@#$%^&*',
];

/**
 * Pick the values for `pairCount` pairs, in pool order.
 *
 * When more pairs are requested than the pool holds, the pool is
 * cycled from the start, so those boards repeat earlier symbols.
 */
export function pairValues(pairCount: number): CardValue[] {
  const values: CardValue[] = [];
  for (let i = 0; i < pairCount; i++) {
    values.push(VALUE_POOL[i % VALUE_POOL.length]);
  }
  return values;
}

/**
 * Create an unshuffled deck holding each of the first `pairCount`
 * pool values twice, adjacent to each other.
 */
export function createPairedDeck(pairCount: number): CardValue[] {
  const deck: CardValue[] = [];
  for (const value of pairValues(pairCount)) {
    deck.push(value, value);
  }
  return deck;
}

/**
 * Shuffle an array in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic testing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle<T>(
  deck: T[],
  rng: () => number = Math.random,
): T[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}
