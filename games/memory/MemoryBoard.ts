/**
 * MemoryBoard -- a rows x cols grid of face-down cards.
 *
 * The grid is stored as a flat array in row-major order, so for a
 * 2x3 board:
 *   [0][1][2]   (row 0)
 *   [3][4][5]   (row 1)
 *
 * A board always holds an even number of cards. Built with
 * `create`, it holds each of the first rows*cols/2 pool values
 * exactly twice, in shuffled order.
 */

import { Card } from '../../src/card-system/Card';
import type { CardValue } from '../../src/card-system/Card';
import { createPairedDeck, shuffle } from '../../src/card-system/Deck';
import type { Position } from '../../src/core-engine/GameState';
import type { Rng } from '../../src/core-engine/Random';

/** Board dimensions that cannot be fully paired. */
export class BoardConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardConfigError';
  }
}

/**
 * Result of a dimension check: either valid or invalid with a reason.
 */
export type DimensionCheck =
  | { valid: true }
  | { valid: false; reason: string };

/**
 * Check that rows and cols are positive integers with an even product.
 */
export function checkDimensions(rows: number, cols: number): DimensionCheck {
  if (!Number.isInteger(rows) || !Number.isInteger(cols)) {
    return {
      valid: false,
      reason: `Board dimensions must be integers, got ${rows}x${cols}.`,
    };
  }
  if (rows <= 0 || cols <= 0 || (rows * cols) % 2 !== 0) {
    return {
      valid: false,
      reason:
        'Board must have positive rows/cols and an even number of cells.',
    };
  }
  return { valid: true };
}

function assertDimensions(rows: number, cols: number): void {
  const check = checkDimensions(rows, cols);
  if (!check.valid) {
    throw new BoardConfigError(check.reason);
  }
}

export class MemoryBoard {
  readonly rows: number;
  readonly cols: number;
  private readonly cards: readonly Card[];

  private constructor(rows: number, cols: number, values: CardValue[]) {
    this.rows = rows;
    this.cols = cols;
    this.cards = values.map((value) => new Card(value));
  }

  /**
   * Build a board with a freshly shuffled paired deck.
   *
   * @param rng Source of randomness for the shuffle (default Math.random).
   * @throws BoardConfigError if the dimensions are invalid.
   */
  static create(
    rows: number,
    cols: number,
    rng: Rng = Math.random,
  ): MemoryBoard {
    assertDimensions(rows, cols);
    const deck = shuffle(createPairedDeck((rows * cols) / 2), rng);
    return new MemoryBoard(rows, cols, deck);
  }

  /**
   * Build a board from explicit values in row-major order, unshuffled.
   *
   * @throws BoardConfigError if the dimensions are invalid, the value
   *         count does not match, or a value is empty.
   */
  static fromValues(
    rows: number,
    cols: number,
    values: readonly CardValue[],
  ): MemoryBoard {
    assertDimensions(rows, cols);
    if (values.length !== rows * cols) {
      throw new BoardConfigError(
        `A ${rows}x${cols} board needs ${rows * cols} values, got ${values.length}.`,
      );
    }
    if (values.some((value) => value.length === 0)) {
      throw new BoardConfigError('Card values must be non-empty.');
    }
    return new MemoryBoard(rows, cols, [...values]);
  }

  /** Total number of cells. */
  get size(): number {
    return this.rows * this.cols;
  }

  /** Whether (row, col) addresses a cell on this board. */
  isInBounds(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.rows &&
      col >= 0 &&
      col < this.cols
    );
  }

  /**
   * Convert (row, col) to a flat index.
   * @throws RangeError if row or col is out of bounds.
   */
  index(row: number, col: number): number {
    if (!this.isInBounds(row, col)) {
      throw new RangeError(
        `Board position (${row}, ${col}) is out of bounds (valid: 0-${this.rows - 1}, 0-${this.cols - 1})`,
      );
    }
    return row * this.cols + col;
  }

  /**
   * Convert a flat index to (row, col).
   */
  position(index: number): Position {
    return {
      row: Math.floor(index / this.cols),
      col: index % this.cols,
    };
  }

  /**
   * Get the card at a specific board position.
   * @throws RangeError if the position is out of bounds.
   */
  cardAt(row: number, col: number): Card {
    return this.cards[this.index(row, col)];
  }

  revealAt(row: number, col: number): void {
    this.cardAt(row, col).reveal();
  }

  hideAt(row: number, col: number): void {
    this.cardAt(row, col).hide();
  }

  matchAt(row: number, col: number): void {
    this.cardAt(row, col).setMatched();
  }

  /** Whether every card on the board is matched. */
  allMatched(): boolean {
    return this.cards.every((card) => card.matched);
  }

  /** Count how many cards are matched. */
  matchedCount(): number {
    return this.cards.filter((card) => card.matched).length;
  }

  /** All face values in row-major order. */
  values(): CardValue[] {
    return this.cards.map((card) => card.value);
  }
}
