/**
 * Lox Parser
 * Main entry point and re-exports
 */

import { scan, type LexerError } from '../lexer/index.js';
import type { ParseError, ProgramNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-control.js';

// ============================================================
// PARSE RESULT
// ============================================================

/** Syntax errors from either front-end stage */
export type FrontendError = LexerError | ParseError;

export interface ParseResult {
  /** Program with every statement that parsed cleanly */
  readonly program: ProgramNode;
  /** Lexer and parser errors merged in source order */
  readonly errors: FrontendError[];
  /** True when no errors were found */
  readonly success: boolean;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Scan and parse source text.
 *
 * Neither stage stops at the first error: the parser still runs over the
 * tokens the lexer produced, so one call reports every independent
 * syntax error. A parse error from a declaration that also holds a
 * lexer error is dropped; it only restates the damage the lexer found.
 *
 * @example
 * ```typescript
 * const result = parse('var x = 1;\nprint x;');
 * if (!result.success) {
 *   for (const err of result.errors) console.error(err.message);
 * }
 * ```
 */
export function parse(source: string): ParseResult {
  const { tokens, errors: lexerErrors } = scan(source);
  const parser = new Parser(tokens);
  const program = parser.parse();

  const lexerOffsets = lexerErrors.map((err) => err.location.offset);
  const parseErrors = parser.errors.filter((err) => {
    const range = parser.state.recovered.find((r) => r.error === err);
    if (!range) return true;
    return !lexerOffsets.some(
      (offset) => offset >= range.start && offset < range.end
    );
  });

  const errors: FrontendError[] = [...lexerErrors, ...parseErrors].sort(
    (a, b) => a.location.offset - b.location.offset
  );

  return { program, errors, success: errors.length === 0 };
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { Parser } from './parser.js';
export {
  createParserState,
  type ParserState,
  type RecoveredRange,
} from './state.js';
