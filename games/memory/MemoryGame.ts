/**
 * Memory game orchestration -- ties together the board, rules, turn
 * sequencer, and event emitter into a playable single-player game.
 *
 * Provides:
 *   - MemorySetupOptions / setupMemoryGame: board construction
 *   - MemoryGame.playTurn: one pass of the turn state machine
 *   - MemoryGame.play: intro, then turns until every pair is found
 *
 * All player interaction goes through a PlayerIO, so the loop runs
 * the same against a terminal or a scripted test double.
 */

import type { CardValue } from '../../src/card-system/Card';
import type { GameState, Position, TurnPhase } from '../../src/core-engine/GameState';
import { createGameState } from '../../src/core-engine/GameState';
import {
  declareWin,
  isGameOver,
  recordMove,
  restartTurn,
  transitionTo,
} from '../../src/core-engine/TurnSequencer';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { Rng } from '../../src/core-engine/Random';
import type { PlayerIO } from '../../src/ui/PlayerIO';
import { renderBoard } from '../../src/ui/TextRenderer';
import { MemoryBoard } from './MemoryBoard';
import { DEFAULT_COLS, DEFAULT_ROWS } from './BoardSize';
import {
  MESSAGES,
  checkFirstSelection,
  checkSecondSelection,
  matchMessage,
  parseSelection,
  resolvePair,
} from './MemoryRules';

// ── Setup ───────────────────────────────────────────────────

export interface MemorySetupOptions {
  /** Board rows (default 4). */
  rows?: number;
  /** Board columns (default 4). */
  cols?: number;
  /** RNG for shuffling (default Math.random). */
  rng?: Rng;
  /**
   * Fixed row-major card values. When given, no shuffle happens and
   * `rng` is ignored.
   */
  values?: readonly CardValue[];
  /** Emitter to publish game events on (default: a new one). */
  events?: GameEventEmitter;
}

/**
 * Set up a new game: build the board and start waiting for the
 * first selection.
 *
 * @throws BoardConfigError if the dimensions or values are invalid.
 */
export function setupMemoryGame(options: MemorySetupOptions = {}): MemoryGame {
  const {
    rows = DEFAULT_ROWS,
    cols = DEFAULT_COLS,
    rng = Math.random,
    values,
    events,
  } = options;

  const board = values
    ? MemoryBoard.fromValues(rows, cols, values)
    : MemoryBoard.create(rows, cols, rng);

  return new MemoryGame(board, events);
}

// ── Turn execution ──────────────────────────────────────────

/**
 * How a call to `playTurn` ended.
 *
 * - `won`        -- every card was already matched; the game is over.
 * - `matched`    -- a move was made and the two cards paired up.
 * - `mismatched` -- a move was made and the two cards were hidden again.
 * - `rejected`   -- a selection was refused; no move was counted.
 */
export type TurnOutcome = 'won' | 'matched' | 'mismatched' | 'rejected';

export class MemoryGame {
  readonly board: MemoryBoard;
  readonly events: GameEventEmitter;
  private readonly state: GameState = createGameState();

  constructor(board: MemoryBoard, events: GameEventEmitter = new GameEventEmitter()) {
    this.board = board;
    this.events = events;
  }

  /** Completed two-card turns so far. */
  get moves(): number {
    return this.state.moves;
  }

  /** Current turn phase. */
  get phase(): TurnPhase {
    return this.state.phase;
  }

  isOver(): boolean {
    return isGameOver(this.state);
  }

  /**
   * Print the intro and wait for the player to press Enter.
   */
  async introduce(io: PlayerIO): Promise<void> {
    io.print('Memory Pairs (no timers, press Enter when asked)');
    io.print(`Board: ${this.board.rows}x${this.board.cols}`);
    io.print(
      'Choose cards by entering row and column numbers separated by space.',
    );
    await io.readLine('Press Enter to start...');
  }

  /**
   * Play the intro and then turns until the game is won.
   *
   * @returns The total number of moves.
   */
  async play(io: PlayerIO): Promise<number> {
    await this.introduce(io);
    let outcome: TurnOutcome;
    do {
      outcome = await this.playTurn(io);
    } while (outcome !== 'won');
    return this.moves;
  }

  /**
   * Run one turn: render, take two selections, and resolve them.
   *
   * Malformed or off-board input re-prompts without touching the
   * board. Rejected selections end the turn early without counting
   * a move.
   *
   * @throws If the game is already over.
   */
  async playTurn(io: PlayerIO): Promise<TurnOutcome> {
    if (this.isOver()) {
      throw new Error('Cannot play a turn: the game is already won');
    }

    if (this.board.allMatched()) {
      this.setPhase(declareWin);
      io.print(renderBoard(this.board));
      io.print(MESSAGES.won);
      io.print(`Total moves: ${this.moves}`);
      this.events.emit('game-won', { moves: this.moves });
      return 'won';
    }

    this.events.emit('turn-started', {
      moves: this.moves,
      matchedCount: this.board.matchedCount(),
    });
    io.print(renderBoard(this.board));
    io.print(`Moves: ${this.moves}`);

    // First selection
    const first = await this.readSelection(io, 'first');
    const firstCheck = checkFirstSelection(this.board, first);
    if (!firstCheck.legal) {
      io.print(firstCheck.message);
      this.events.emit('selection-rejected', {
        reason: firstCheck.reason,
        selection: 'first',
      });
      return 'rejected';
    }

    this.setPhase((s) => transitionTo(s, 'first-revealed'));
    this.reveal(first);
    io.print(renderBoard(this.board));
    this.setPhase((s) => transitionTo(s, 'awaiting-second'));

    // Second selection
    const second = await this.readSelection(io, 'second');
    const secondCheck = checkSecondSelection(this.board, first, second);
    if (!secondCheck.legal) {
      io.print(secondCheck.message);
      this.hide(first);
      this.events.emit('selection-rejected', {
        reason: secondCheck.reason,
        selection: 'second',
      });
      this.setPhase(restartTurn);
      return 'rejected';
    }

    this.setPhase((s) => transitionTo(s, 'resolving'));
    this.reveal(second);
    io.print(renderBoard(this.board));
    recordMove(this.state);

    const outcome = resolvePair(this.board, first, second);
    if (outcome.matched) {
      io.print(matchMessage(outcome.value));
      this.events.emit('pair-matched', {
        first,
        second,
        value: outcome.value,
        moves: this.moves,
      });
    } else {
      io.print(MESSAGES.mismatch);
      this.events.emit('pair-mismatched', {
        first,
        second,
        firstValue: outcome.firstValue,
        secondValue: outcome.secondValue,
        moves: this.moves,
      });
      // The player must see both values before they are hidden.
      await io.readLine(MESSAGES.acknowledgePrompt);
      this.hide(first);
      this.hide(second);
    }

    this.setPhase(restartTurn);
    return outcome.matched ? 'matched' : 'mismatched';
  }

  // ── Internals ─────────────────────────────────────────────

  private async readSelection(
    io: PlayerIO,
    selection: 'first' | 'second',
  ): Promise<Position> {
    const prompt =
      selection === 'first' ? MESSAGES.firstPrompt : MESSAGES.secondPrompt;
    for (;;) {
      const line = await io.readLine(prompt);
      const position = parseSelection(line, this.board);
      if (position) return position;

      io.print(MESSAGES.invalidInput);
      this.events.emit('selection-rejected', {
        reason: 'invalid-input',
        selection,
        input: line,
      });
    }
  }

  private setPhase(change: (state: GameState) => void): void {
    const from = this.state.phase;
    change(this.state);
    this.events.emit('phase-changed', { from, to: this.state.phase });
  }

  private reveal(position: Position): void {
    this.board.revealAt(position.row, position.col);
    this.events.emit('card-revealed', {
      position,
      value: this.board.cardAt(position.row, position.col).value,
    });
  }

  private hide(position: Position): void {
    this.board.hideAt(position.row, position.col);
    this.events.emit('card-hidden', { position });
  }
}
