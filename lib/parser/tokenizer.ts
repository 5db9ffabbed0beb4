/**
 * Input filtering.
 *
 * Reduces a raw line to the canonical token stream consumed by the parser:
 * arithmetic characters are kept in order, spaces and `=` are dropped, and
 * anything else rejects the whole line.
 *
 * @module
 */
import { IGNORED_CHARS, TOKEN_STREAM_REGEX, VALID_TOKENS } from './consts.js';
import { TokenizeError } from './tokenizeError.js';

declare const tokenStreamBrand: unique symbol;

/**
 * A string holding only digits, `+ - * /` and parentheses.
 */
export type TokenStream = string & { readonly [tokenStreamBrand]: true };

export function isTokenStream(s: string): s is TokenStream {
  return TOKEN_STREAM_REGEX.test(s);
}

/**
 * @param raw a single line with its terminator already stripped
 * @returns the filtered token stream, possibly empty
 * @throws TokenizeError on the first character outside the alphabet
 */
export function tokenize(raw: string): TokenStream {
  let tokens = '';

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (VALID_TOKENS.includes(ch)) {
      tokens += ch;
    } else if (!IGNORED_CHARS.includes(ch)) {
      throw new TokenizeError(ch, i);
    }
  }

  if (!isTokenStream(tokens)) {
    throw new Error(`tokenizer produced a non-canonical stream: ${tokens}`);
  }
  return tokens;
}
