/**
 * Runtime configuration shared by the session and the CLI.
 *
 * @module
 */

export interface CalcConfig {
  /** Line buffer size in characters, terminator included. */
  bufferSize: number;
  /** Line that ends a session before reaching the calculator. */
  exitCommand: string;
  /** Response written for any rejected line. */
  invalidMessage: string;
  /** Report the failing stage and reason alongside the response. */
  verbose: boolean;
}

export const MIN_BUFFER_SIZE = 2;

export const DEFAULT_CONFIG: Readonly<CalcConfig> = {
  bufferSize: 32,
  exitCommand: 'exit',
  invalidMessage: 'invalid input',
  verbose: false
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * @returns the longest line, in characters, a buffer of the given size holds
 */
export const maxLineLength = (config: Pick<CalcConfig, 'bufferSize'>) =>
  config.bufferSize - 1;

/**
 * Cuts a line to what the line buffer holds, as the framer does for stdin.
 */
export const truncateLine = (
  line: string,
  config: Pick<CalcConfig, 'bufferSize'>
): string => line.slice(0, maxLineLength(config));

export function parseBufferSize(raw: string | undefined): number {
  if (raw === undefined || !/^[0-9]+$/.test(raw)) {
    throw new ConfigError(
      `buffer size must be a positive integer, got ${raw ?? 'nothing'}`
    );
  }
  const size = Number.parseInt(raw, 10);
  if (size < MIN_BUFFER_SIZE) {
    throw new ConfigError(
      `buffer size must be at least ${MIN_BUFFER_SIZE}, got ${size}`
    );
  }
  return size;
}

export function resolveConfig(overrides: Partial<CalcConfig> = {}): CalcConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  if (
    !Number.isSafeInteger(config.bufferSize) ||
    config.bufferSize < MIN_BUFFER_SIZE
  ) {
    throw new ConfigError(
      `buffer size must be at least ${MIN_BUFFER_SIZE}, got ${config.bufferSize}`
    );
  }
  if (config.exitCommand.length === 0) {
    throw new ConfigError('exit command must not be empty');
  }
  return config;
}
