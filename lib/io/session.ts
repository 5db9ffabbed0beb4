/**
 * Read-eval loop over framed input lines.
 *
 * @module
 */
import {
  calculate,
  type CalcOutcome,
  describeError,
  formatOutcome
} from '../calculator.js';
import { type CalcConfig, DEFAULT_CONFIG } from '../shared/config.js';

export const GREETING = "Hello! I'm a simple calculator.";
export const USAGE =
  "Give me an expression or type 'exit' to leave and press enter:";
export const FAREWELL = 'Quitting...';

/**
 * Receives everything the session writes. `kind` lets a terminal front end
 * pick colors; plain sinks can ignore it.
 */
export type SessionSink = (
  text: string,
  kind: 'info' | 'result' | 'error'
) => void;

export interface SessionSummary {
  evaluated: number;
  invalid: number;
  exited: boolean;
}

/**
 * Handles one line and writes `<line> <response>`. Returns null when the line
 * is the exit command, which never reaches the calculator.
 */
export function respond(
  line: string,
  sink: SessionSink,
  config: CalcConfig = DEFAULT_CONFIG
): CalcOutcome | null {
  if (line === config.exitCommand) {
    return null;
  }

  const outcome = calculate(line);
  const kind = outcome.kind === 'value' ? 'result' : 'error';
  sink(`${line} ${formatOutcome(outcome, config)}`, kind);
  if (outcome.kind === 'invalid' && config.verbose) {
    sink(describeError(outcome.error), 'error');
  }
  return outcome;
}

export async function runSession(
  lines: AsyncIterable<string> | Iterable<string>,
  sink: SessionSink,
  config: CalcConfig = DEFAULT_CONFIG
): Promise<SessionSummary> {
  const summary: SessionSummary = { evaluated: 0, invalid: 0, exited: false };

  sink(GREETING, 'info');
  sink(USAGE, 'info');

  for await (const line of lines) {
    const outcome = respond(line, sink, config);
    if (outcome === null) {
      summary.exited = true;
      break;
    }
    if (outcome.kind === 'value') {
      summary.evaluated++;
    } else {
      summary.invalid++;
    }
  }

  sink(FAREWELL, 'info');
  return summary;
}
