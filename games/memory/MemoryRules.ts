/**
 * Memory rules -- coordinate parsing, selection legality, and pair
 * resolution.
 *
 * Turn flow:
 *   1. Player picks a first card. It must not already be matched.
 *   2. Player picks a second card. It must differ from the first
 *      and must not already be matched.
 *   3. Both are face-up. Equal values lock as a matched pair;
 *      otherwise both are hidden again once the player has seen them.
 *
 * Players type coordinates 1-based; everything here returns 0-based
 * positions.
 */

import type { Position } from '../../src/core-engine/GameState';
import type { CardValue } from '../../src/card-system/Card';
import type { MemoryBoard } from './MemoryBoard';

// ── Player-facing messages ──────────────────────────────────

export const MESSAGES = {
  firstPrompt: 'Select first card (row col): ',
  secondPrompt: 'Select second card (row col): ',
  invalidInput: 'Invalid input. Use: <row> <col>  (e.g. 2 3)',
  firstAlreadyMatched: 'That card is already matched. Choose another.',
  sameCard: 'You selected the same card twice. Try again.',
  secondAlreadyMatched: 'Second card already matched. Try again.',
  mismatch: 'Not a match.',
  acknowledgePrompt: 'Press Enter to continue and hide the two cards...',
  won: 'CONGRATULATIONS! All pairs matched.',
} as const;

/** Status line announcing a matched pair. */
export function matchMessage(value: CardValue): string {
  return `MATCH! (${value})`;
}

// ── Coordinate parsing ──────────────────────────────────────

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a line holding exactly two whitespace-separated integers.
 *
 * @returns The two integers, or `null` if the line is malformed.
 */
export function parseIntegerPair(line: string): [number, number] | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length !== 2 || !tokens.every((t) => INTEGER.test(t))) {
    return null;
  }
  return [Number(tokens[0]), Number(tokens[1])];
}

/**
 * Parse a 1-based "row col" line into a 0-based board position.
 *
 * @returns The position, or `null` if the line is malformed or the
 *          cell is off the board.
 */
export function parseSelection(
  line: string,
  board: MemoryBoard,
): Position | null {
  const pair = parseIntegerPair(line);
  if (!pair) return null;

  const position = { row: pair[0] - 1, col: pair[1] - 1 };
  return board.isInBounds(position.row, position.col) ? position : null;
}

// ── Legality checks ─────────────────────────────────────────

export type SelectionRejection = 'already-matched' | 'same-card';

/**
 * Result of a legality check: either legal or illegal with a reason.
 */
export type SelectionCheck =
  | { legal: true }
  | { legal: false; reason: SelectionRejection; message: string };

/** Whether two positions address the same cell. */
export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Check the first pick of a turn: it must not be matched.
 */
export function checkFirstSelection(
  board: MemoryBoard,
  first: Position,
): SelectionCheck {
  if (board.cardAt(first.row, first.col).matched) {
    return {
      legal: false,
      reason: 'already-matched',
      message: MESSAGES.firstAlreadyMatched,
    };
  }
  return { legal: true };
}

/**
 * Check the second pick of a turn against the first.
 */
export function checkSecondSelection(
  board: MemoryBoard,
  first: Position,
  second: Position,
): SelectionCheck {
  if (samePosition(first, second)) {
    return { legal: false, reason: 'same-card', message: MESSAGES.sameCard };
  }
  if (board.cardAt(second.row, second.col).matched) {
    return {
      legal: false,
      reason: 'already-matched',
      message: MESSAGES.secondAlreadyMatched,
    };
  }
  return { legal: true };
}

// ── Pair resolution ─────────────────────────────────────────

export type PairOutcome =
  | { matched: true; value: CardValue }
  | { matched: false; firstValue: CardValue; secondValue: CardValue };

/**
 * Compare the two picked cards, locking them as matched when their
 * values are equal. A mismatch leaves both cards as they are.
 */
export function resolvePair(
  board: MemoryBoard,
  first: Position,
  second: Position,
): PairOutcome {
  const firstValue = board.cardAt(first.row, first.col).value;
  const secondValue = board.cardAt(second.row, second.col).value;

  if (firstValue === secondValue) {
    board.matchAt(first.row, first.col);
    board.matchAt(second.row, second.col);
    return { matched: true, value: firstValue };
  }
  return { matched: false, firstValue, secondValue };
}
