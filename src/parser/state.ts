/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

/** Source range a failed declaration was discarded over */
export interface RecoveredRange {
  readonly error: ParseError;
  /** Offset of the declaration's first token */
  readonly start: number;
  /** Offset of the first token after recovery */
  readonly end: number;
}

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Errors collected while parsing; recovery resumes at the next declaration */
  readonly errors: ParseError[];
  readonly recovered: RecoveredRange[];
}

export function createParserState(tokens: Token[]): ParserState {
  return {
    tokens,
    pos: 0,
    errors: [],
    recovered: [],
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/**
 * Most recently consumed token. Falls back to the current token
 * before anything has been consumed.
 * @internal
 */
export function previous(state: ParserState): Token {
  const token = state.tokens[state.pos - 1];
  return token ?? current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or throw LOX-P001.
 * @param expectation - Rendered after "Expect", e.g. "';' after value"
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expectation: string
): Token {
  if (check(state, type)) return advance(state);
  throw new ParseError('LOX-P001', current(state).span.start, { expectation });
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return makeSpan(start, previous(state).span.end);
}
