/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import { ParseError } from '../types.js';
import {
  type ParserState,
  createParserState,
  current,
  makeSpan,
} from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, error recovery
 * - parser-control.ts: Statements, blocks, conditionals, loops
 * - parser-expr.ts: Expressions and the precedence chain
 *
 * Syntax errors never escape `parse()`; they are collected on `errors`
 * and parsing resumes at the next declaration.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const program = parser.parse();
 * if (parser.errors.length > 0) { ... }
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete program.
   * Input nested deeper than the call stack allows records LOX-P005 and
   * yields an empty program.
   */
  parse(): ProgramNode {
    try {
      return this.parseProgram();
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      const location = current(this.state).span.start;
      this.state.errors.push(new ParseError('LOX-P005', location));
      return {
        type: 'Program',
        statements: [],
        span: makeSpan(location, location),
      };
    }
  }

  /**
   * Get collected syntax errors.
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
