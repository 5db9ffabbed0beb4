import { RIGHT_PAREN } from './consts.js';
import { ParseError, type ParseErrorReason } from './parseError.js';

/**
 * Immutable cursor over a token stream. `idx` is the position of the next
 * unconsumed token and stays within `[0, buf.length]`.
 */
export interface ParserState {
  buf: string;
  idx: number;
}

export function createParserState(buf: string): ParserState {
  return { buf, idx: 0 };
}

export function peek(state: ParserState): string | null {
  if (state.idx < state.buf.length) {
    return state.buf[state.idx];
  }
  return null;
}

export function consume(state: ParserState): ParserState {
  if (state.idx >= state.buf.length) {
    throw new ParseError(
      'unexpected-end',
      state.idx,
      'cannot consume past the end of input'
    );
  }
  return { buf: state.buf, idx: state.idx + 1 };
}

export function matchCh(
  state: ParserState,
  ch: string,
  reason: ParseErrorReason
): ParserState {
  const next = peek(state);
  if (next !== ch) {
    throw new ParseError(
      reason,
      state.idx,
      `expected '${ch}' but found '${next ?? 'EOF'}'`
    );
  }
  return consume(state);
}

export function matchRP(state: ParserState): ParserState {
  return matchCh(state, RIGHT_PAREN, 'unmatched-paren');
}

export function remaining(state: ParserState): boolean {
  return state.idx < state.buf.length;
}
