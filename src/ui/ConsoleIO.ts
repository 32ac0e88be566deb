/**
 * ConsoleIO -- PlayerIO over Node streams (stdin/stdout by default).
 *
 * Lines are read through `node:readline` and queued as they arrive,
 * so piped input is never lost between prompts. Each `readLine`
 * takes the oldest queued line, or waits for the next one.
 */

import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { PlayerIO } from './PlayerIO';
import { InputClosedError } from './PlayerIO';

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export interface ConsoleIOOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ConsoleIO implements PlayerIO {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly buffered: string[] = [];
  private readonly pending: PendingRead[] = [];
  private closed = false;

  constructor(options: ConsoleIOOptions = {}) {
    const { input = process.stdin, output = process.stdout } = options;
    this.output = output;
    this.rl = createInterface({ input, terminal: false });

    this.rl.on('line', (line: string) => {
      const reader = this.pending.shift();
      if (reader) {
        reader.resolve(line);
      } else {
        this.buffered.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      for (const reader of this.pending.splice(0)) {
        reader.reject(new InputClosedError());
      }
    });
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  readLine(prompt: string): Promise<string> {
    this.output.write(prompt);

    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  /** Stop reading input. Pending reads reject with InputClosedError. */
  close(): void {
    this.rl.close();
  }
}
