/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Defines the constructor types and the method contracts mixins rely on.
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type {
  AssignExprNode,
  BinaryExprNode,
  BlockStmtNode,
  GroupingExprNode,
  IfStmtNode,
  LiteralExprNode,
  LogicalExprNode,
  UnaryExprNode,
  VarStmtNode,
  VariableExprNode,
  WhileStmtNode,
} from '../../../types.js';
import type { LoxValue } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 * This is the input type for mixin functions.
 *
 * Note: `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard TypeScript
 * mixin pattern.
 */
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> = new (...args: any[]) => TBase;

/** Provided by ExpressionsMixin */
export interface ExpressionEvaluation {
  evaluateLiteral(node: LiteralExprNode): LoxValue;
  evaluateGrouping(node: GroupingExprNode): LoxValue;
  evaluateUnary(node: UnaryExprNode): LoxValue;
  evaluateBinary(node: BinaryExprNode): LoxValue;
  evaluateLogical(node: LogicalExprNode): LoxValue;
}

/** Provided by VariablesMixin */
export interface VariableEvaluation {
  evaluateVariable(node: VariableExprNode): LoxValue;
  evaluateAssign(node: AssignExprNode): LoxValue;
  executeVar(node: VarStmtNode): void;
}

/** Provided by ControlFlowMixin */
export interface ControlFlowExecution {
  executeBlock(node: BlockStmtNode): void;
  executeIf(node: IfStmtNode): void;
  executeWhile(node: WhileStmtNode): void;
}
