/**
 * Parse error definitions.
 *
 * @module
 */

export type ParseErrorReason =
  | 'unexpected-end'
  | 'malformed-number'
  | 'trailing-tokens'
  | 'unmatched-paren';

export class ParseError extends Error {
  readonly stage = 'parse';

  constructor(
    readonly reason: ParseErrorReason,
    readonly index: number,
    message: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}
