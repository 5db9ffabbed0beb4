import { createParserState, type ParserState, remaining } from './parserState.js';
import { ParseError } from './parseError.js';

/**
 * Runs a parser over the whole input and rejects anything it leaves
 * unconsumed.
 *
 * @param input the token stream to parse
 * @param parser a function that parses from a state and returns a tuple:
 *               [result, updatedState]
 * @returns the result of the parser along with its final state
 * @throws ParseError if there is leftover input after parsing
 */
export function parseWithEOF<T>(
  input: string,
  parser: (state: ParserState) => [T, ParserState]
): [T, ParserState] {
  const initialState = createParserState(input);
  const [result, finalState] = parser(initialState);
  if (remaining(finalState)) {
    throw new ParseError(
      'trailing-tokens',
      finalState.idx,
      `unexpected extra input: "${finalState.buf.slice(finalState.idx)}"`
    );
  }
  return [result, finalState];
}
