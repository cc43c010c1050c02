/**
 * Lox Shared Types
 * Source locations, tokens, AST nodes, and the error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';

export {
  TOKEN_TYPES,
  type Token,
  type TokenLiteral,
  type TokenType,
} from './token-types.js';

export type {
  ArithmeticOp,
  AssignExprNode,
  ASTNode,
  BinaryExprNode,
  BinaryOp,
  BlockStmtNode,
  ComparisonOp,
  EqualityOp,
  ExprNode,
  ExpressionStmtNode,
  GroupingExprNode,
  IfStmtNode,
  LiteralExprNode,
  LiteralValue,
  LogicalExprNode,
  LogicalOp,
  NodeType,
  PrintStmtNode,
  ProgramNode,
  StmtNode,
  UnaryExprNode,
  UnaryOp,
  VarStmtNode,
  VariableExprNode,
  WhileStmtNode,
} from './ast-nodes.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type RuntimeErrorKind,
} from './error-registry.js';

export {
  LoxError,
  ParseError,
  RuntimeError,
  lookupDefinition,
  type LoxErrorData,
} from './error-classes.js';
