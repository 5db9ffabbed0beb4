/**
 * Raised when raw input contains a character outside the arithmetic
 * alphabet.
 *
 * @module
 */
export class TokenizeError extends Error {
  readonly stage = 'tokenize';
  readonly reason = 'invalid-character';

  constructor(readonly character: string, readonly index: number) {
    super(`invalid character '${character}' at position ${index}`);
    this.name = 'TokenizeError';
  }
}
