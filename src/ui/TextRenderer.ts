/**
 * Plain-text board rendering.
 *
 * Layout for a 2x3 board with one card face-up:
 *
 * ```
 *
 *       1   2   3
 *    +------------+
 *  1 | * | A | * |
 *    +------------+
 *  2 | * | * | * |
 *    +------------+
 *
 * ```
 *
 * Column and row labels are 1-based. Hidden cards show as `*`.
 */

import type { Card } from '../card-system/Card';

/** Glyph shown for a face-down card. */
export const HIDDEN_GLYPH = '*';

/** Anything with a rectangular, coordinate-addressed grid of cards. */
export interface RenderableGrid {
  readonly rows: number;
  readonly cols: number;
  cardAt(row: number, col: number): Card;
}

export interface RenderOptions {
  /** Include the row and column labels. Default: true. */
  showCoords?: boolean;
}

/**
 * The glyph for a single card: its value when face-up, `*` otherwise.
 */
export function cardGlyph(card: Card): string {
  return card.isFaceUp() ? card.value : HIDDEN_GLYPH;
}

/**
 * Render the grid as lines of text, including a leading and a
 * trailing blank line.
 */
export function renderBoardLines(
  grid: RenderableGrid,
  options: RenderOptions = {},
): string[] {
  const { showCoords = true } = options;
  const border = `   +${'-'.repeat(grid.cols * 4)}+`;
  const lines: string[] = [''];

  if (showCoords) {
    let header = '    ';
    for (let c = 0; c < grid.cols; c++) {
      header += `${String(c + 1).padStart(3)} `;
    }
    lines.push(header);
  }

  lines.push(border);
  for (let r = 0; r < grid.rows; r++) {
    let line = showCoords ? `${String(r + 1).padStart(2)} |` : '   |';
    for (let c = 0; c < grid.cols; c++) {
      line += ` ${cardGlyph(grid.cardAt(r, c))} |`;
    }
    lines.push(line, border);
  }
  lines.push('');

  return lines;
}

/**
 * Render the grid as a single newline-joined string.
 */
export function renderBoard(
  grid: RenderableGrid,
  options: RenderOptions = {},
): string {
  return renderBoardLines(grid, options).join('\n');
}
