/**
 * Evaluation error definitions.
 *
 * @module
 */

export type EvalErrorReason = 'division-by-zero' | 'overflow';

export class EvalError extends Error {
  readonly stage = 'evaluate';

  constructor(readonly reason: EvalErrorReason, message: string) {
    super(message);
    this.name = 'EvalError';
  }
}
