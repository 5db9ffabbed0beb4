/**
 * Parser constants.
 *
 * Character constants for syntax tokens and the character classes the
 * tokenizer filters by.
 *
 * @module
 */

// Character constants
export const LEFT_PAREN = '(';
export const RIGHT_PAREN = ')';
export const SPACE = ' ';
export const EQUALS = '=';

// Character classes
export const VALID_TOKENS = '+-*/0123456789()';
export const IGNORED_CHARS = SPACE + EQUALS;

// Regex patterns
export const DIGIT_REGEX = /[0-9]/;
export const TOKEN_STREAM_REGEX = /^[0-9+\-*/()]*$/;
