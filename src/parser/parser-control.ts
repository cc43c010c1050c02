/**
 * Parser Extension: Statement Parsing
 * Simple statements, blocks, conditionals, and loops
 */

import { Parser } from './parser.js';
import type {
  BlockStmtNode,
  ExpressionStmtNode,
  ExprNode,
  IfStmtNode,
  PrintStmtNode,
  SourceSpan,
  StmtNode,
  WhileStmtNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { FORBIDDEN_LOOP_BODY_STARTS } from './helpers.js';
import { advance, check, current, expect, isAtEnd, spanFrom } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStatement(): StmtNode;
    parsePrintStatement(): PrintStmtNode;
    parseExpressionStatement(): ExpressionStmtNode;
    parseBlock(): BlockStmtNode;
    parseIf(): IfStmtNode;
    parseWhile(): WhileStmtNode;
    parseFor(): BlockStmtNode;
    parseLoopBody(): StmtNode;
  }
}

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StmtNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.PRINT:
      return this.parsePrintStatement();
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();
    case TOKEN_TYPES.IF:
      return this.parseIf();
    case TOKEN_TYPES.WHILE:
      return this.parseWhile();
    case TOKEN_TYPES.FOR:
      return this.parseFor();
    default:
      return this.parseExpressionStatement();
  }
};

Parser.prototype.parsePrintStatement = function (this: Parser): PrintStmtNode {
  const start = advance(this.state).span.start; // consume 'print'
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after value");

  return { type: 'PrintStmt', expression, span: spanFrom(this.state, start) };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");

  return {
    type: 'ExpressionStmt',
    expression,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOCKS
// ============================================================

/**
 * Parse { declaration* }. Declarations inside recover individually,
 * so one bad statement does not discard the rest of the block.
 */
Parser.prototype.parseBlock = function (this: Parser): BlockStmtNode {
  const start = advance(this.state).span.start; // consume '{'
  const statements: StmtNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' after block");

  return { type: 'BlockStmt', statements, span: spanFrom(this.state, start) };
};

// ============================================================
// CONDITIONALS
// ============================================================

/** if (cond) stmt [else stmt]; else binds to the nearest if */
Parser.prototype.parseIf = function (this: Parser): IfStmtNode {
  const start = advance(this.state).span.start; // consume 'if'
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'if'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after if condition");

  const thenBranch = this.parseStatement();
  let elseBranch: StmtNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    elseBranch = this.parseStatement();
  }

  return {
    type: 'IfStmt',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhile = function (this: Parser): WhileStmtNode {
  const start = advance(this.state).span.start; // consume 'while'
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'while'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after condition");
  const body = this.parseLoopBody();

  return {
    type: 'WhileStmt',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

/**
 * for (init; cond; incr) body
 *   => { init; while (cond ?? true) { body; incr; } }
 */
Parser.prototype.parseFor = function (this: Parser): BlockStmtNode {
  const start = advance(this.state).span.start; // consume 'for'
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'for'");

  let initializer: StmtNode | null;
  if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
    advance(this.state);
    initializer = null;
  } else if (check(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration();
  } else {
    initializer = this.parseExpressionStatement();
  }

  let condition: ExprNode | null = null;
  if (!check(this.state, TOKEN_TYPES.SEMICOLON)) {
    condition = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after loop condition");

  let increment: ExprNode | null = null;
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    increment = this.parseExpression();
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after for clauses");

  const body = this.parseLoopBody();
  const span: SourceSpan = spanFrom(this.state, start);

  const iteration: StmtNode[] = [body];
  if (increment) {
    iteration.push({ type: 'ExpressionStmt', expression: increment, span });
  }

  const loop: WhileStmtNode = {
    type: 'WhileStmt',
    condition: condition ?? { type: 'LiteralExpr', value: true, span },
    body: { type: 'BlockStmt', statements: iteration, span },
    span,
  };

  return {
    type: 'BlockStmt',
    statements: initializer ? [initializer, loop] : [loop],
    span,
  };
};

/**
 * Loop bodies are limited to a block, a print statement, or an
 * expression statement.
 */
Parser.prototype.parseLoopBody = function (this: Parser): StmtNode {
  if (check(this.state, ...FORBIDDEN_LOOP_BODY_STARTS)) {
    throw new ParseError('LOX-P004', current(this.state).span.start);
  }
  return this.parseStatement();
};
