/**
 * Lox AST Types
 *
 * Two node families: expressions produce values, statements produce effects.
 * Nodes are plain readonly objects discriminated by `type`.
 */

import type { SourceSpan } from './source-location.js';

// ============================================================
// NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'LiteralExpr'
  | 'GroupingExpr'
  | 'UnaryExpr'
  | 'BinaryExpr'
  | 'LogicalExpr'
  | 'VariableExpr'
  | 'AssignExpr'
  | 'ExpressionStmt'
  | 'PrintStmt'
  | 'VarStmt'
  | 'BlockStmt'
  | 'IfStmt'
  | 'WhileStmt';

interface BaseNode {
  readonly span: SourceSpan;
}

/** Value embedded in a literal node (null is nil) */
export type LiteralValue = number | string | boolean | null;

// ============================================================
// EXPRESSIONS
// ============================================================

export type UnaryOp = '-' | '!';

export type ArithmeticOp = '+' | '-' | '*' | '/';
export type ComparisonOp = '<' | '<=' | '>' | '>=';
export type EqualityOp = '==' | '!=';
export type BinaryOp = ArithmeticOp | ComparisonOp | EqualityOp;

export type LogicalOp = 'and' | 'or';

export interface LiteralExprNode extends BaseNode {
  readonly type: 'LiteralExpr';
  readonly value: LiteralValue;
}

/** Parenthesized expression: ( expr ) */
export interface GroupingExprNode extends BaseNode {
  readonly type: 'GroupingExpr';
  readonly expression: ExprNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExprNode;
}

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

/** Short-circuiting `and` / `or` */
export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly op: LogicalOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export interface VariableExprNode extends BaseNode {
  readonly type: 'VariableExpr';
  readonly name: string;
}

/**
 * Assignment: name = value
 * Right-associative; yields the assigned value.
 */
export interface AssignExprNode extends BaseNode {
  readonly type: 'AssignExpr';
  readonly name: string;
  readonly value: ExprNode;
}

export type ExprNode =
  | LiteralExprNode
  | GroupingExprNode
  | UnaryExprNode
  | BinaryExprNode
  | LogicalExprNode
  | VariableExprNode
  | AssignExprNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExprNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExprNode;
}

/** var name [= initializer]; */
export interface VarStmtNode extends BaseNode {
  readonly type: 'VarStmt';
  readonly name: string;
  readonly initializer: ExprNode | null;
}

export interface BlockStmtNode extends BaseNode {
  readonly type: 'BlockStmt';
  readonly statements: StmtNode[];
}

export interface IfStmtNode extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExprNode;
  readonly thenBranch: StmtNode;
  readonly elseBranch: StmtNode | null;
}

/**
 * While loop. Also the target of `for` desugaring:
 *   for (init; cond; incr) body
 *   => { init; while (cond) { body; incr; } }
 */
export interface WhileStmtNode extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExprNode;
  readonly body: StmtNode;
}

export type StmtNode =
  | ExpressionStmtNode
  | PrintStmtNode
  | VarStmtNode
  | BlockStmtNode
  | IfStmtNode
  | WhileStmtNode;

// ============================================================
// PROGRAM
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StmtNode[];
}

export type ASTNode = ProgramNode | ExprNode | StmtNode;
