/**
 * CoreMixin: Dispatch
 *
 * Routes every expression and statement node to the mixin that handles
 * it, and runs the two statements that need no other machinery
 * (expression statements and print).
 *
 * @internal
 */

import type { ExprNode, StmtNode } from '../../../../types.js';
import { formatValue, type LoxValue } from '../../values.js';
import type {
  ControlFlowExecution,
  EvaluatorConstructor,
  ExpressionEvaluation,
  VariableEvaluation,
} from '../types.js';
import type { EvaluatorBase } from '../base.js';

type DispatchTarget = EvaluatorBase &
  ExpressionEvaluation &
  VariableEvaluation &
  ControlFlowExecution;

/**
 * CoreMixin implementation. Must be applied last: it overrides the
 * base stubs and calls into every other mixin.
 */
function createCoreMixin<TBase extends EvaluatorConstructor<DispatchTarget>>(
  Base: TBase
) {
  return class CoreEvaluator extends Base {
    override evaluate(node: ExprNode): LoxValue {
      switch (node.type) {
        case 'LiteralExpr':
          return this.evaluateLiteral(node);
        case 'GroupingExpr':
          return this.evaluateGrouping(node);
        case 'UnaryExpr':
          return this.evaluateUnary(node);
        case 'BinaryExpr':
          return this.evaluateBinary(node);
        case 'LogicalExpr':
          return this.evaluateLogical(node);
        case 'VariableExpr':
          return this.evaluateVariable(node);
        case 'AssignExpr':
          return this.evaluateAssign(node);
      }
    }

    override execute(node: StmtNode): void {
      switch (node.type) {
        case 'ExpressionStmt':
          this.evaluate(node.expression);
          return;
        case 'PrintStmt':
          this.ctx.callbacks.onPrint(formatValue(this.evaluate(node.expression)));
          return;
        case 'VarStmt':
          this.executeVar(node);
          return;
        case 'BlockStmt':
          this.executeBlock(node);
          return;
        case 'IfStmt':
          this.executeIf(node);
          return;
        case 'WhileStmt':
          this.executeWhile(node);
          return;
      }
    }
  };
}

export const CoreMixin = createCoreMixin;
