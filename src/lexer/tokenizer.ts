/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Result of scanning a whole source text */
export interface ScanResult {
  /** Valid tokens in source order, always terminated by EOF */
  readonly tokens: Token[];
  /** Every lexical error found, in source order */
  readonly errors: LexerError[];
}

/** Skip whitespace and // line comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/**
 * Read the next token. Throws LexerError on a malformed token; the state
 * is left positioned after the offending input.
 */
export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // String
  if (ch === '"') {
    return readString(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators (lookup table)
  const twoCharType = TWO_CHAR_OPERATORS[ch + peek(state, 1)];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, start);
  }

  advance(state); // skip the offending character
  throw new LexerError('LOX-L002', start, { char: ch });
}

/**
 * Scan source text into tokens.
 *
 * Lexical errors do not stop the scan: each one is recorded and scanning
 * resumes after the offending input.
 *
 * @example
 * ```typescript
 * const { tokens, errors } = scan('print 1 + 2;');
 * ```
 */
export function scan(source: string): ScanResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token | undefined;

  do {
    try {
      token = nextToken(state);
      tokens.push(token);
    } catch (err) {
      if (!(err instanceof LexerError)) throw err;
      state.errors.push(err);
      token = undefined;
    }
  } while (token?.type !== TOKEN_TYPES.EOF);

  return { tokens, errors: state.errors };
}
