import { describe, it, expect } from 'vitest';
import {
  ENGINE_VERSION,
  createGameState,
  transitionTo,
  recordMove,
  declareWin,
  isGameOver,
  createRng,
  GameEventEmitter,
  GAME_EVENT_NAMES,
  attachEventLogger,
} from '../../src/core-engine/index';

describe('core-engine barrel exports', () => {
  it('should export the engine version', () => {
    expect(ENGINE_VERSION).toBe('0.1.0');
  });

  it('should export state and sequencer functions', () => {
    const state = createGameState();
    transitionTo(state, 'first-revealed');
    transitionTo(state, 'awaiting-second');
    transitionTo(state, 'resolving');
    recordMove(state);
    transitionTo(state, 'awaiting-first');
    declareWin(state);
    expect(isGameOver(state)).toBe(true);
    expect(state.moves).toBe(1);
  });

  it('should export the seeded RNG', () => {
    expect(createRng(3)()).toBe(createRng(3)());
  });

  it('should export the event system', () => {
    const emitter = new GameEventEmitter();
    expect(GAME_EVENT_NAMES).toHaveLength(8);
    expect(typeof attachEventLogger).toBe('function');
    expect(emitter.listenerCount('turn-started')).toBe(0);
  });
});
