import { describe, it, expect } from 'vitest';
import {
  CARD_SYSTEM_VERSION,
  VALUE_POOL,
  Card,
  createCard,
  pairValues,
  createPairedDeck,
  shuffle,
} from '../../src/card-system/index';

describe('card-system barrel exports', () => {
  it('should export the module version', () => {
    expect(CARD_SYSTEM_VERSION).toBe('0.1.0');
  });

  it('should export the Card class and factory', () => {
    const card = createCard('A');
    expect(card).toBeInstanceOf(Card);
    expect(card.value).toBe('A');
  });

  it('should export the value pool', () => {
    expect(VALUE_POOL).toHaveLength(70);
  });

  it('should export Deck functions', () => {
    expect(typeof pairValues).toBe('function');
    expect(typeof createPairedDeck).toBe('function');
    expect(typeof shuffle).toBe('function');
  });
});
