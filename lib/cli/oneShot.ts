import { calculate, describeError, formatOutcome } from '../calculator.js';
import {
  type CalcConfig,
  DEFAULT_CONFIG,
  truncateLine
} from '../shared/config.js';

export const EXIT_OK = 0;
export const EXIT_INVALID = 2;

/**
 * Evaluates expressions given on the command line, one response per line.
 * Each expression is held to the line buffer like any other input line.
 *
 * @returns the process exit code
 */
export function runOneShot(
  expressions: readonly string[],
  out: (text: string) => void,
  err: (text: string) => void,
  config: CalcConfig = DEFAULT_CONFIG
): number {
  let failures = 0;
  for (const expr of expressions) {
    const outcome = calculate(truncateLine(expr, config));
    out(formatOutcome(outcome, config));
    if (outcome.kind === 'invalid') {
      failures++;
      if (config.verbose) {
        err(describeError(outcome.error));
      }
    }
  }
  return failures === 0 ? EXIT_OK : EXIT_INVALID;
}
