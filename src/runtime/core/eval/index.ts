/**
 * Evaluation Public API
 *
 * Functional wrappers around the composed Evaluator.
 *
 * @internal
 */

import type { ExprNode, StmtNode } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';
import { getEvaluator } from './evaluator.js';

/** Execute one statement in the context's current scope */
export function executeStatement(stmt: StmtNode, ctx: RuntimeContext): void {
  getEvaluator(ctx).execute(stmt);
}

/** Evaluate one expression in the context's current scope */
export function evaluateExpression(
  expr: ExprNode,
  ctx: RuntimeContext
): LoxValue {
  return getEvaluator(ctx).evaluate(expr);
}

export { Evaluator, getEvaluator } from './evaluator.js';
