/**
 * Board size selection at startup.
 *
 * Players may type "rows cols", press Enter for the default, or pass
 * `--size <rows>x<cols>` on the command line. Anything unusable
 * falls back to 4x4 with a warning instead of failing.
 */

import type { PlayerIO } from '../../src/ui/PlayerIO';
import { checkDimensions } from './MemoryBoard';
import { parseIntegerPair } from './MemoryRules';

export const DEFAULT_ROWS = 4;
export const DEFAULT_COLS = 4;

export const SIZE_PROMPT =
  'Enter board size (rows cols) or press Enter for default 4 4:';
export const INVALID_SIZE_INPUT = 'Invalid input. Using default 4x4.';
export const INVALID_SIZE_DIMENSIONS =
  'Invalid board dimensions. Using default 4x4.';

export interface BoardSizeChoice {
  rows: number;
  cols: number;
  /** Set when the request was replaced by the default. */
  warning?: string;
}

const CROSS_FORM = /^\s*([+-]?\d+)\s*[xX]\s*([+-]?\d+)\s*$/;

const DEFAULT_CHOICE: BoardSizeChoice = {
  rows: DEFAULT_ROWS,
  cols: DEFAULT_COLS,
};

/**
 * Interpret a size request such as "3 4" or "3x4".
 *
 * - Empty input selects the default silently.
 * - Anything else that is not two integers (whitespace-separated, or
 *   joined by a single x across the whole line) selects the default
 *   with INVALID_SIZE_INPUT. Whitespace alone counts as unparseable.
 * - Non-positive sizes or an odd cell count select the default with
 *   INVALID_SIZE_DIMENSIONS.
 */
export function parseBoardSize(line: string): BoardSizeChoice {
  if (line === '') {
    return { ...DEFAULT_CHOICE };
  }

  const cross = CROSS_FORM.exec(line);
  const pair: [number, number] | null = cross
    ? [Number(cross[1]), Number(cross[2])]
    : parseIntegerPair(line);
  if (!pair) {
    return { ...DEFAULT_CHOICE, warning: INVALID_SIZE_INPUT };
  }

  const [rows, cols] = pair;
  if (!checkDimensions(rows, cols).valid) {
    return { ...DEFAULT_CHOICE, warning: INVALID_SIZE_DIMENSIONS };
  }
  return { rows, cols };
}

/**
 * Ask the player for a board size and print any fallback warning.
 */
export async function promptBoardSize(io: PlayerIO): Promise<BoardSizeChoice> {
  io.print(SIZE_PROMPT);
  const choice = parseBoardSize(await io.readLine('> '));
  if (choice.warning) {
    io.print(choice.warning);
  }
  return choice;
}
