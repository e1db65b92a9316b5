/**
 * Command line argument parsing
 */

export interface CLIOptions {
  command: 'solve' | 'help';
  inputFile?: string;
  outputFormat: 'text' | 'json';
  show: boolean;
  evaluation: boolean;
  maxExpansions?: number;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'solve',
    outputFormat: 'text',
    show: false,
    evaluation: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--show':
        options.show = true;
        break;

      case '--evaluation':
        options.evaluation = true;
        break;

      case '-f':
      case '--format': {
        const format = args[++i];
        if (format !== 'text' && format !== 'json') {
          throw new Error(`Unknown output format: ${format}`);
        }
        options.outputFormat = format;
        break;
      }

      case '--max-expansions': {
        const limit = Number(args[++i]);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw new Error('--max-expansions expects a positive integer');
        }
        options.maxExpansions = limit;
        break;
      }

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.inputFile = arg;
    }
  }

  if (options.command === 'solve' && options.inputFile === undefined) {
    options.command = 'help';
  }

  return options;
}

export const HELP_TEXT = `
N-Puzzle Solver
===============

Finds a shortest move sequence for a sliding-tile puzzle using A*
(Manhattan distance + linear conflict).

USAGE:
  npuzzle <file> [options]

OPTIONS:
  --show                  Print boards along the solution path
  --evaluation            Compare uniform-cost search (h = 0) with A*
  -f, --format <type>     Output format: text (default) or json
  --max-expansions <n>    Abort after expanding n states
  -h, --help              Show help

INPUT FILE FORMAT:
  One row per line, n rows (3 <= n <= 8). Cells are separated by tabs or
  aligned with spaces. The blank is 0 or an empty cell.

  1 2 3
  4   6
  7 5 8
`;
