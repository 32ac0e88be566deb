/**
 * Entry-point logic for the terminal memory game, kept separate from
 * `main.ts` so it can run against scripted IO.
 *
 * Steps:
 *   1. Parse command-line options (usage on --help or bad options)
 *   2. Pick the board size from --size or the startup prompt
 *   3. Seed the shuffle from --seed or a fresh random seed
 *   4. Optionally attach the verbose event logger
 *   5. Play until every pair is matched
 */

import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { attachEventLogger, LOG_PREFIX } from '../../src/core-engine/EventLogger';
import type { LogSink } from '../../src/core-engine/EventLogger';
import { createRng, randomSeed } from '../../src/core-engine/Random';
import type { PlayerIO } from '../../src/ui/PlayerIO';
import { parseBoardSize, promptBoardSize } from './BoardSize';
import type { BoardSizeChoice } from './BoardSize';
import { USAGE, parseCliArgs } from './CliOptions';
import { setupMemoryGame } from './MemoryGame';

export interface RunDependencies {
  /** Player channel (stdin/stdout in production). */
  io: PlayerIO;
  /** Diagnostic sink for errors and verbose logs (default console.error). */
  log?: LogSink;
}

/**
 * Run the game end to end.
 *
 * @returns The process exit code: 0 on completion or help, 1 on error.
 */
export async function runMemoryGame(
  args: readonly string[],
  deps: RunDependencies,
): Promise<number> {
  const { io, log = (line) => console.error(line) } = deps;

  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    log(`Error: ${parsed.error}`);
    log(USAGE);
    return 1;
  }
  const { options } = parsed;
  if (options.help) {
    io.print(USAGE);
    return 0;
  }

  try {
    let size: BoardSizeChoice;
    if (options.size !== undefined) {
      size = parseBoardSize(options.size);
      if (size.warning) io.print(size.warning);
    } else {
      size = await promptBoardSize(io);
    }

    const seed = options.seed ?? randomSeed();
    const events = new GameEventEmitter();
    if (options.verbose) {
      attachEventLogger(events, log);
      log(`${LOG_PREFIX} board ${size.rows}x${size.cols} seed ${seed}`);
    }

    const game = setupMemoryGame({
      rows: size.rows,
      cols: size.cols,
      rng: createRng(seed),
      events,
    });
    await game.play(io);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`Error: ${message}`);
    return 1;
  }
}
