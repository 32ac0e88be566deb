/**
 * Turn phase and state types for the memory engine.
 *
 * TurnPhase tracks where the single player is within a turn.
 * GameState is the small mutable record the turn sequencer
 * operates on.
 */

/**
 * Phases of a turn.
 *
 * - `awaiting-first`  -- Waiting for the first selection of a turn.
 * - `first-revealed`  -- First card is face-up.
 * - `awaiting-second` -- Waiting for the second selection.
 * - `resolving`       -- Both cards face-up; comparing values.
 * - `won`             -- Every card is matched (terminal).
 */
export type TurnPhase =
  | 'awaiting-first'
  | 'first-revealed'
  | 'awaiting-second'
  | 'resolving'
  | 'won';

/** A 0-based board coordinate. */
export interface Position {
  readonly row: number;
  readonly col: number;
}

export interface GameState {
  /** Current turn phase. */
  phase: TurnPhase;
  /** Completed two-card turns, whether or not they matched. */
  moves: number;
}

/**
 * Create the state for a fresh game, waiting on the first selection.
 */
export function createGameState(): GameState {
  return {
    phase: 'awaiting-first',
    moves: 0,
  };
}
