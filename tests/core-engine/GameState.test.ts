import { describe, it, expect } from 'vitest';
import { createGameState } from '../../src/core-engine/GameState';

describe('createGameState', () => {
  it('should start waiting on the first selection', () => {
    const state = createGameState();
    expect(state.phase).toBe('awaiting-first');
  });

  it('should start with no moves', () => {
    expect(createGameState().moves).toBe(0);
  });

  it('should create independent states', () => {
    const a = createGameState();
    const b = createGameState();
    a.moves = 3;
    expect(b.moves).toBe(0);
  });
});
