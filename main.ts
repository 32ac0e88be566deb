#!/usr/bin/env node
/**
 * Memory Pairs -- terminal entry point.
 *
 * Wires stdin/stdout into the memory game and turns its result into
 * the process exit code.
 *
 * Usage:
 *   npm start -- [--size <rows>x<cols>] [--seed <n>] [--verbose]
 */
import { ConsoleIO } from './src/ui/ConsoleIO';
import { runMemoryGame } from './games/memory/runMemoryGame';

async function main(): Promise<void> {
  const io = new ConsoleIO();
  try {
    process.exitCode = await runMemoryGame(process.argv.slice(2), { io });
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
