import { describe, it, expect, vi } from 'vitest';
import { GameEventEmitter, GAME_EVENT_NAMES } from '../../src/core-engine/GameEventEmitter';
import { attachEventLogger } from '../../src/core-engine/EventLogger';

describe('attachEventLogger', () => {
  it('should write one prefixed JSON line per event', () => {
    const emitter = new GameEventEmitter();
    const lines: string[] = [];
    attachEventLogger(emitter, (line) => lines.push(line));

    emitter.emit('game-won', { moves: 3 });
    emitter.emit('card-hidden', { position: { row: 1, col: 0 } });

    expect(lines).toEqual([
      '[memory] game-won {"moves":3}',
      '[memory] card-hidden {"position":{"row":1,"col":0}}',
    ]);
  });

  it('should subscribe to every event name', () => {
    const emitter = new GameEventEmitter();
    attachEventLogger(emitter, () => {});
    for (const name of GAME_EVENT_NAMES) {
      expect(emitter.listenerCount(name)).toBe(1);
    }
  });

  it('should stop logging once detached', () => {
    const emitter = new GameEventEmitter();
    const log = vi.fn();
    const detach = attachEventLogger(emitter, log);

    detach();
    emitter.emit('game-won', { moves: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(emitter.listenerCount('game-won')).toBe(0);
  });

  it('should default to console.error', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = new GameEventEmitter();
    attachEventLogger(emitter);

    emitter.emit('phase-changed', { from: 'awaiting-first', to: 'won' });

    expect(spy).toHaveBeenCalledWith(
      '[memory] phase-changed {"from":"awaiting-first","to":"won"}',
    );
    spy.mockRestore();
  });
});
