/**
 * Command-line option parsing for the calculator.
 *
 * @module
 */
import {
  type CalcConfig,
  ConfigError,
  parseBufferSize,
  resolveConfig
} from '../shared/config.js';

export type Mode = 'interactive' | 'stream' | 'oneshot';

export interface CLIOptions {
  help: boolean;
  version: boolean;
  /** Forces stream mode even when stdin is a terminal. */
  noTty: boolean;
  config: CalcConfig;
  expressions: string[];
}

export function parseArgs(args: readonly string[]): CLIOptions {
  let help = false;
  let version = false;
  let noTty = false;
  const overrides: Partial<CalcConfig> = {};
  const expressions: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--version':
      case '-v':
        version = true;
        break;
      case '--verbose':
      case '-V':
        overrides.verbose = true;
        break;
      case '--no-tty':
        noTty = true;
        break;
      case '--buffer-size':
      case '-b':
        overrides.bufferSize = parseBufferSize(args[++i]);
        break;
      case '--expr':
      case '-e': {
        const expr: string | undefined = args[++i];
        if (expr === undefined) {
          throw new ConfigError(`${arg} requires an expression`);
        }
        expressions.push(expr);
        break;
      }
      default:
        if (arg.startsWith('-') && arg.length > 1 && !/^-[0-9(]/.test(arg)) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        expressions.push(arg);
        break;
    }
  }

  return {
    help,
    version,
    noTty,
    config: resolveConfig(overrides),
    expressions
  };
}

/**
 * Picks how the CLI reads its input: expressions on the command line win,
 * then a terminal, then piped stdin.
 */
export function selectMode(options: CLIOptions, stdinIsTTY: boolean): Mode {
  if (options.expressions.length > 0) {
    return 'oneshot';
  }
  return stdinIsTTY && !options.noTty ? 'interactive' : 'stream';
}

export function helpText(version: string): string {
  return `
Arithmetic calculator (arith-calc) v${version}

USAGE:
    arith-calc                         # Interactive prompt on a terminal
    arith-calc < expressions.txt       # One expression per line from stdin
    arith-calc "2 + 6 * 6"             # Evaluate and print
    arith-calc [OPTIONS]

OPTIONS:
    -h, --help               Show this help message
    -v, --version            Show version information
    -V, --verbose            Report why a line was rejected
    -b, --buffer-size <n>    Line buffer size, terminator included (default 32)
    -e, --expr <expression>  Evaluate an expression (repeatable)
        --no-tty             Read stdin line by line even on a terminal

INPUT:
    Integers, + - * /, and parentheses. Spaces and '=' are ignored.
    Division truncates toward zero. Type 'exit' to leave.
`;
}
