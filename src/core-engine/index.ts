/**
 * Core Engine Module
 *
 * Turn state management, seedable randomness, and the typed game
 * event system.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { TurnPhase, Position, GameState } from './GameState';
export { createGameState } from './GameState';

// Turn sequencer functions
export {
  isGameOver,
  isAwaitingSelection,
  transitionTo,
  recordMove,
  restartTurn,
  declareWin,
} from './TurnSequencer';

// Randomness
export type { Rng } from './Random';
export { createRng, randomSeed } from './Random';

// Game event system
export type {
  TurnStartedPayload,
  PhaseChangedPayload,
  CardRevealedPayload,
  CardHiddenPayload,
  PairMatchedPayload,
  PairMismatchedPayload,
  SelectionRejectedPayload,
  GameWonPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter, GAME_EVENT_NAMES } from './GameEventEmitter';

// Event logging
export type { LogSink } from './EventLogger';
export { attachEventLogger, LOG_PREFIX } from './EventLogger';
