import type { MemoryBoard } from '../../games/memory/MemoryBoard';

/**
 * Input lines that pick every pair on `board` in one move each,
 * as 1-based "row col" strings.
 */
export function solutionLines(board: MemoryBoard): string[] {
  const byValue = new Map<string, number[]>();
  board.values().forEach((value, index) => {
    const indexes = byValue.get(value) ?? [];
    indexes.push(index);
    byValue.set(value, indexes);
  });

  const lines: string[] = [];
  for (const indexes of byValue.values()) {
    for (const index of indexes) {
      const { row, col } = board.position(index);
      lines.push(`${row + 1} ${col + 1}`);
    }
  }
  return lines;
}
