/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Context, current scope, dispatch stubs
 * 2. ExpressionsMixin - Literal, grouping, unary, binary, logical
 * 3. VariablesMixin - Declaration, lookup, assignment
 * 4. ControlFlowMixin - Blocks, if, while
 * 5. CoreMixin - Node dispatch, print (outermost)
 *
 * The order ensures that each mixin can depend on the methods provided
 * by mixins below it in the stack.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { VariablesMixin } from './mixins/variables.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = CoreMixin(
  ControlFlowMixin(VariablesMixin(ExpressionsMixin(EvaluatorBase)))
);

export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: RuntimeContext object reference
 * Value: Evaluator instance for that context
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
