import { describe, it, expect } from 'vitest';
import { Card, createCard } from '../../src/card-system/Card';

describe('Card', () => {
  it('should create a face-down, unmatched card', () => {
    const card = createCard('A');
    expect(card.value).toBe('A');
    expect(card.revealed).toBe(false);
    expect(card.matched).toBe(false);
    expect(card.isFaceUp()).toBe(false);
  });

  it('should reveal and hide an unmatched card', () => {
    const card = new Card('q');
    card.reveal();
    expect(card.revealed).toBe(true);
    expect(card.isFaceUp()).toBe(true);
    card.hide();
    expect(card.revealed).toBe(false);
  });

  it('should lock a matched card face-up', () => {
    const card = new Card('7');
    card.setMatched();
    expect(card.matched).toBe(true);
    expect(card.revealed).toBe(true);
  });

  it('should ignore hide and reveal once matched', () => {
    const card = new Card('#');
    card.setMatched();
    card.hide();
    expect(card.revealed).toBe(true);
    expect(card.matched).toBe(true);
    card.reveal();
    expect(card.revealed).toBe(true);
    expect(card.matched).toBe(true);
  });

  it('should treat setMatched as idempotent', () => {
    const card = new Card('Z');
    card.reveal();
    card.setMatched();
    card.setMatched();
    expect(card.matched).toBe(true);
    expect(card.revealed).toBe(true);
  });

  it('should match a face-down card directly', () => {
    const card = new Card('b');
    card.setMatched();
    expect(card.isFaceUp()).toBe(true);
  });
});
