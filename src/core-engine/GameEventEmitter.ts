/**
 * Typed Event Emitter for the memory engine.
 *
 * Provides a type-safe, zero-dependency event emitter for turn
 * lifecycle events. Games emit these events at key points; tools
 * (the verbose logger, tests) subscribe to them.
 */

import type { CardValue } from '../card-system/Card';
import type { Position, TurnPhase } from './GameState';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted when a new turn begins.
 */
export interface TurnStartedPayload {
  /** Completed moves so far. */
  readonly moves: number;
  /** Number of cards already matched. */
  readonly matchedCount: number;
}

/**
 * Emitted whenever the turn sequencer changes phase.
 */
export interface PhaseChangedPayload {
  readonly from: TurnPhase;
  readonly to: TurnPhase;
}

/**
 * Emitted when a card is turned face-up.
 */
export interface CardRevealedPayload {
  readonly position: Position;
  readonly value: CardValue;
}

/**
 * Emitted when a card is turned face-down again.
 */
export interface CardHiddenPayload {
  readonly position: Position;
}

/**
 * Emitted when two selected cards share a value.
 */
export interface PairMatchedPayload {
  readonly first: Position;
  readonly second: Position;
  readonly value: CardValue;
  /** Move count after this turn. */
  readonly moves: number;
}

/**
 * Emitted when two selected cards differ.
 */
export interface PairMismatchedPayload {
  readonly first: Position;
  readonly second: Position;
  readonly firstValue: CardValue;
  readonly secondValue: CardValue;
  /** Move count after this turn. */
  readonly moves: number;
}

/**
 * Emitted when a selection is refused (bad input, already matched,
 * or the same card twice). No state has changed.
 */
export interface SelectionRejectedPayload {
  readonly reason: 'invalid-input' | 'already-matched' | 'same-card';
  /** Which pick of the turn was refused. */
  readonly selection: 'first' | 'second';
  /** Raw input line, for `invalid-input`. */
  readonly input?: string;
}

/**
 * Emitted once, when every card is matched.
 */
export interface GameWonPayload {
  readonly moves: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'turn-started': TurnStartedPayload;
  'phase-changed': PhaseChangedPayload;
  'card-revealed': CardRevealedPayload;
  'card-hidden': CardHiddenPayload;
  'pair-matched': PairMatchedPayload;
  'pair-mismatched': PairMismatchedPayload;
  'selection-rejected': SelectionRejectedPayload;
  'game-won': GameWonPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

/** Every event name, in emission-table order. */
export const GAME_EVENT_NAMES: readonly GameEventName[] = [
  'turn-started',
  'phase-changed',
  'card-revealed',
  'card-hidden',
  'pair-matched',
  'pair-mismatched',
  'selection-rejected',
  'game-won',
];

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]?: Array<GameEventListener<K>>;
};

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('pair-matched', (payload) => {
 *   console.log(`Matched ${payload.value} after ${payload.moves} moves`);
 * });
 * ```
 */
export class GameEventEmitter {
  private listeners: ListenerTable = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    let list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) {
      list = [];
      (this.listeners as Record<string, unknown>)[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list || list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}
