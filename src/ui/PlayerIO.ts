/**
 * The player-facing text channel a game drives.
 *
 * ConsoleIO implements it over stdin/stdout; tests use a scripted
 * in-memory implementation.
 */
export interface PlayerIO {
  /** Write one line of output (a trailing newline is added). */
  print(text: string): void;
  /**
   * Show `prompt` (no newline) and resolve with the next input line.
   * Rejects with InputClosedError once input has ended.
   */
  readLine(prompt: string): Promise<string>;
}

/** The input stream ended while a line was still expected. */
export class InputClosedError extends Error {
  constructor(message = 'Input closed before the game finished') {
    super(message);
    this.name = 'InputClosedError';
  }
}
