/**
 * Command-line option parsing for the memory game.
 *
 * Usage:
 *   npm start -- [--size <rows>x<cols>] [--seed <n>] [--verbose] [--help]
 */

export const USAGE = `
Usage: npm start -- [options]

Options:
  -s, --size <rows>x<cols>   Board size; skips the size prompt (e.g. 4x6)
      --seed <n>             Integer seed for a reproducible shuffle
  -v, --verbose              Log every game event to stderr
  -h, --help                 Show this help and exit

Examples:
  npm start
  npm start -- --size 2x3 --seed 7
`;

export interface CliOptions {
  /** Raw size request, parsed later with the startup fallback rules. */
  size?: string;
  seed?: number;
  verbose: boolean;
  help: boolean;
}

/**
 * Result of parsing: the options, or an error message for the user.
 */
export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

/**
 * Parse arguments (without the leading node and script paths).
 */
export function parseCliArgs(args: readonly string[]): CliParseResult {
  const options: CliOptions = { verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-s':
      case '--size': {
        const value = args[++i];
        if (value === undefined) {
          return { ok: false, error: `Missing value for ${arg}` };
        }
        options.size = value;
        break;
      }
      case '--seed': {
        const value = args[++i];
        if (value === undefined || !/^\d+$/.test(value)) {
          return {
            ok: false,
            error: `--seed expects a non-negative integer, got ${value ?? 'nothing'}`,
          };
        }
        options.seed = Number(value);
        break;
      }
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, options };
}
