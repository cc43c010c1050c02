import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NIL: 'NIL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  SEMICOLON: 'SEMICOLON', // ;

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /

  // Comparison and equality
  BANG: 'BANG', // !
  NE: 'NE', // !=
  ASSIGN: 'ASSIGN', // =
  EQ: 'EQ', // ==
  GT: 'GT', // >
  GE: 'GE', // >=
  LT: 'LT', // <
  LE: 'LE', // <=

  // Keywords
  AND: 'AND',
  OR: 'OR',
  IF: 'IF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  VAR: 'VAR',
  PRINT: 'PRINT',

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Scalar carried by NUMBER and STRING tokens */
export type TokenLiteral = number | string | null;

export interface Token {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly literal: TokenLiteral;
  readonly span: SourceSpan;
}
