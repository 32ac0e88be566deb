/**
 * Turn sequencer for the memory engine.
 *
 * Enforces the turn state machine on a GameState:
 *
 *   awaiting-first -> first-revealed -> awaiting-second -> resolving
 *                  -> awaiting-first | won
 *
 * A rejected second selection sends the turn back to
 * `awaiting-first`. Operates on the GameState directly
 * (mutation-based).
 */

import type { GameState, TurnPhase } from './GameState';

// ── Query functions ─────────────────────────────────────────

/**
 * Whether the game has been won.
 */
export function isGameOver(state: GameState): boolean {
  return state.phase === 'won';
}

/**
 * Whether the sequencer is waiting for a card selection.
 */
export function isAwaitingSelection(state: GameState): boolean {
  return state.phase === 'awaiting-first' || state.phase === 'awaiting-second';
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Transition the turn to a new phase.
 *
 * @throws If the transition is not in the table below.
 * @throws If transitioning to the same phase.
 */
export function transitionTo(state: GameState, newPhase: TurnPhase): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Turn is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<TurnPhase, TurnPhase[]> = {
  'awaiting-first': ['first-revealed', 'won'],
  'first-revealed': ['awaiting-second'],
  'awaiting-second': ['resolving', 'awaiting-first'],
  resolving: ['awaiting-first'],
  won: [],
};

/**
 * Count a completed two-card turn.
 *
 * @throws If called outside the `resolving` phase.
 */
export function recordMove(state: GameState): void {
  if (state.phase !== 'resolving') {
    throw new Error(
      `Cannot record a move in phase "${state.phase}"; only while resolving`,
    );
  }
  state.moves++;
}

// ── Convenience ─────────────────────────────────────────────

/**
 * Abandon the current turn after a rejected second selection.
 */
export function restartTurn(state: GameState): void {
  transitionTo(state, 'awaiting-first');
}

/**
 * End the game. Only legal at the start of a turn.
 */
export function declareWin(state: GameState): void {
  transitionTo(state, 'won');
}
