/**
 * Debug logging for game events.
 *
 * Subscribes to every event on an emitter and writes one line per
 * emission: `[memory] <event> <json payload>`.
 */

import type { GameEventEmitter } from './GameEventEmitter';
import { GAME_EVENT_NAMES } from './GameEventEmitter';

/** Sink for formatted log lines. */
export type LogSink = (line: string) => void;

export const LOG_PREFIX = '[memory]';

/**
 * Attach a logger to all game events.
 *
 * @param log Defaults to `console.error`, keeping stdout for play.
 * @returns A function that detaches the logger.
 */
export function attachEventLogger(
  emitter: GameEventEmitter,
  log: LogSink = (line) => console.error(line),
): () => void {
  const unsubscribers = GAME_EVENT_NAMES.map((name) =>
    emitter.on(name, (payload) => {
      log(`${LOG_PREFIX} ${name} ${JSON.stringify(payload)}`);
    }),
  );

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}
