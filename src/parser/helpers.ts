/**
 * Parser Helpers
 * Operator tables and token-to-value conversion
 */

import type {
  BinaryOp,
  LiteralValue,
  Token,
  TokenType,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// OPERATOR TABLES (one per precedence level)
// ============================================================

export type OperatorTable = ReadonlyMap<TokenType, BinaryOp>;

export const EQUALITY_OPS: OperatorTable = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.EQ, '=='],
  [TOKEN_TYPES.NE, '!='],
]);

export const COMPARISON_OPS: OperatorTable = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.GT, '>'],
  [TOKEN_TYPES.GE, '>='],
  [TOKEN_TYPES.LT, '<'],
  [TOKEN_TYPES.LE, '<='],
]);

export const ADDITIVE_OPS: OperatorTable = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.PLUS, '+'],
  [TOKEN_TYPES.MINUS, '-'],
]);

export const MULTIPLICATIVE_OPS: OperatorTable = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.STAR, '*'],
  [TOKEN_TYPES.SLASH, '/'],
]);

export const UNARY_OPS: ReadonlyMap<TokenType, UnaryOp> = new Map<
  TokenType,
  UnaryOp
>([
  [TOKEN_TYPES.BANG, '!'],
  [TOKEN_TYPES.MINUS, '-'],
]);

// ============================================================
// STATEMENT BOUNDARIES
// ============================================================

/** Tokens that begin a statement; error recovery stops before these */
export const STATEMENT_KEYWORDS: readonly TokenType[] = [
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
];

/** Tokens that may not begin a while/for body */
export const FORBIDDEN_LOOP_BODY_STARTS: readonly TokenType[] = [
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.FOR,
];

// ============================================================
// LITERALS
// ============================================================

/**
 * Convert a literal token to the value it denotes.
 * Returns undefined for tokens that are not literals.
 */
export function literalValue(token: Token): LiteralValue | undefined {
  switch (token.type) {
    case TOKEN_TYPES.TRUE:
      return true;
    case TOKEN_TYPES.FALSE:
      return false;
    case TOKEN_TYPES.NIL:
      return null;
    case TOKEN_TYPES.NUMBER:
      return typeof token.literal === 'number'
        ? token.literal
        : Number(token.lexeme);
    case TOKEN_TYPES.STRING:
      return typeof token.literal === 'string' ? token.literal : '';
    default:
      return undefined;
  }
}
