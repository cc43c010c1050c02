/**
 * Parser Extension: Expression Parsing
 * Assignment, logical operators, and the binary precedence chain
 */

import { Parser } from './parser.js';
import type {
  ExprNode,
  GroupingExprNode,
  LogicalOp,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  ADDITIVE_OPS,
  COMPARISON_OPS,
  EQUALITY_OPS,
  literalValue,
  MULTIPLICATIVE_OPS,
  type OperatorTable,
  UNARY_OPS,
} from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExprNode;
    parseAssignment(): ExprNode;
    parseLogical(
      type: TokenType,
      op: LogicalOp,
      operand: () => ExprNode
    ): ExprNode;
    parseLogicalOr(): ExprNode;
    parseLogicalAnd(): ExprNode;
    parseBinaryLevel(operators: OperatorTable, operand: () => ExprNode): ExprNode;
    parseEquality(): ExprNode;
    parseComparison(): ExprNode;
    parseAdditive(): ExprNode;
    parseMultiplicative(): ExprNode;
    parseUnary(): ExprNode;
    parsePrimary(): ExprNode;
    parseGrouped(): GroupingExprNode;
  }
}

// ============================================================
// EXPRESSION ENTRY
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExprNode {
  return this.parseAssignment();
};

/**
 * Right-associative: a = b = 1 parses as a = (b = 1).
 * A non-variable target records LOX-P003 at the '=' and yields the
 * left-hand expression; parsing of the statement continues.
 */
Parser.prototype.parseAssignment = function (this: Parser): ExprNode {
  const target = this.parseLogicalOr();

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) {
    return target;
  }

  const equals = advance(this.state);
  const value = this.parseAssignment();

  if (target.type === 'VariableExpr') {
    return {
      type: 'AssignExpr',
      name: target.name,
      value,
      span: makeSpan(target.span.start, value.span.end),
    };
  }

  this.state.errors.push(new ParseError('LOX-P003', equals.span.start));
  return target;
};

// ============================================================
// LOGICAL OPERATORS
// ============================================================

Parser.prototype.parseLogical = function (
  this: Parser,
  type: TokenType,
  op: LogicalOp,
  operand: () => ExprNode
): ExprNode {
  let left = operand();

  while (check(this.state, type)) {
    advance(this.state);
    const right = operand();
    left = {
      type: 'LogicalExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseLogicalOr = function (this: Parser): ExprNode {
  return this.parseLogical(TOKEN_TYPES.OR, 'or', () => this.parseLogicalAnd());
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExprNode {
  return this.parseLogical(TOKEN_TYPES.AND, 'and', () => this.parseEquality());
};

// ============================================================
// BINARY PRECEDENCE CHAIN
// ============================================================

/** One left-associative precedence level */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: OperatorTable,
  operand: () => ExprNode
): ExprNode {
  let left = operand();

  for (;;) {
    const op = operators.get(current(this.state).type);
    if (op === undefined) return left;

    advance(this.state);
    const right = operand();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
};

Parser.prototype.parseEquality = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(ADDITIVE_OPS, () => this.parseMultiplicative());
};

Parser.prototype.parseMultiplicative = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(MULTIPLICATIVE_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY & PRIMARY
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): ExprNode {
  const op = UNARY_OPS.get(current(this.state).type);
  if (op === undefined) {
    return this.parsePrimary();
  }

  const start = advance(this.state).span.start;
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op,
    operand,
    span: makeSpan(start, operand.span.end),
  };
};

Parser.prototype.parsePrimary = function (this: Parser): ExprNode {
  const token = current(this.state);

  const value = literalValue(token);
  if (value !== undefined) {
    advance(this.state);
    return { type: 'LiteralExpr', value, span: token.span };
  }

  if (token.type === TOKEN_TYPES.IDENTIFIER) {
    advance(this.state);
    return { type: 'VariableExpr', name: token.lexeme, span: token.span };
  }

  if (token.type === TOKEN_TYPES.LPAREN) {
    return this.parseGrouped();
  }

  throw new ParseError('LOX-P002', token.span.start);
};

Parser.prototype.parseGrouped = function (this: Parser): GroupingExprNode {
  const start = advance(this.state).span.start; // consume '('
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after expression");

  return {
    type: 'GroupingExpr',
    expression,
    span: spanFrom(this.state, start),
  };
};
