/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a double-quoted string. No escape sequences; newlines are kept.
 * An unterminated string consumes the rest of the source and reports
 * the location of its opening quote.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('LOX-L001', start);
  }

  advance(state); // consume closing "

  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(start.offset, state.pos),
    start,
    currentLocation(state),
    value
  );
}

/** Read digits with an optional fractional part: 12 or 12.5 (never 12. or .5) */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(
    TOKEN_TYPES.NUMBER,
    value,
    start,
    currentLocation(state),
    Number(value)
  );
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
