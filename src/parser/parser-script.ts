/**
 * Parser Extension: Program Parsing
 * Program, declarations, and error recovery
 */

import { Parser } from './parser.js';
import type {
  ExprNode,
  ProgramNode,
  StmtNode,
  VarStmtNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { STATEMENT_KEYWORDS } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  makeSpan,
  previous,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): StmtNode | null;
    parseVarDeclaration(): VarStmtNode;
    synchronize(): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StmtNode[] = [];

  while (!isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse one declaration. A syntax error inside it is recorded along with
 * the range recovery skipped, the parser resynchronizes, and null is
 * returned in place of the statement.
 */
Parser.prototype.parseDeclaration = function (this: Parser): StmtNode | null {
  const start = current(this.state).span.start.offset;
  try {
    if (check(this.state, TOKEN_TYPES.VAR)) {
      return this.parseVarDeclaration();
    }
    return this.parseStatement();
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    this.state.errors.push(err);
    this.synchronize();
    this.state.recovered.push({
      error: err,
      start,
      end: current(this.state).span.start.offset,
    });
    return null;
  }
};

Parser.prototype.parseVarDeclaration = function (this: Parser): VarStmtNode {
  const start = advance(this.state).span.start; // consume 'var'
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');

  let initializer: ExprNode | null = null;
  if (check(this.state, TOKEN_TYPES.ASSIGN)) {
    advance(this.state);
    initializer = this.parseExpression();
  }

  expect(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    "';' after variable declaration"
  );

  return {
    type: 'VarStmt',
    name: name.lexeme,
    initializer,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ERROR RECOVERY
// ============================================================

/**
 * Discard tokens until just after a ';' or just before a token that
 * starts a statement. Always consumes at least one token unless at EOF.
 */
Parser.prototype.synchronize = function (this: Parser): void {
  advance(this.state);

  while (!isAtEnd(this.state)) {
    if (previous(this.state).type === TOKEN_TYPES.SEMICOLON) return;
    if (check(this.state, ...STATEMENT_KEYWORDS)) return;
    advance(this.state);
  }
};
