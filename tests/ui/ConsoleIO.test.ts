import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { ConsoleIO } from '../../src/ui/ConsoleIO';
import { InputClosedError } from '../../src/ui/PlayerIO';

describe('ConsoleIO', () => {
  let input: PassThrough;
  let written: string[];
  let io: ConsoleIO;

  beforeEach(() => {
    input = new PassThrough();
    written = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString());
        callback();
      },
    });
    io = new ConsoleIO({ input, output });
  });

  it('should print text followed by a newline', () => {
    io.print('Moves: 0');
    expect(written).toEqual(['Moves: 0\n']);
  });

  it('should write the prompt and resolve with the next line', async () => {
    const line = io.readLine('> ');
    input.write('3 4\n');
    await expect(line).resolves.toBe('3 4');
    expect(written).toEqual(['> ']);
    io.close();
  });

  it('should keep lines that arrive before they are asked for', async () => {
    input.write('1 1\n1 2\n\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(await io.readLine('a')).toBe('1 1');
    expect(await io.readLine('b')).toBe('1 2');
    expect(await io.readLine('c')).toBe('');
    io.close();
  });

  it('should reject a pending read when input ends', async () => {
    const line = io.readLine('> ');
    input.end();
    await expect(line).rejects.toBeInstanceOf(InputClosedError);
  });

  it('should reject reads after close', async () => {
    io.close();
    await expect(io.readLine('> ')).rejects.toThrow(
      'Input closed before the game finished',
    );
  });
});
