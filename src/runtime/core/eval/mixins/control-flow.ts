/**
 * ControlFlowMixin: Blocks, Conditionals, and Loops
 *
 * Handles control flow statements:
 * - Blocks (child scope per execution)
 * - If / else
 * - While loops (also the target of for-loop desugaring)
 *
 * Error Handling:
 * - Errors propagate unchanged; the block scope is popped on every exit path
 *
 * @internal
 */

import type {
  BlockStmtNode,
  IfStmtNode,
  WhileStmtNode,
} from '../../../../types.js';
import { isTruthy } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * ControlFlowMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx, env, evaluate(), execute()
 */
function createControlFlowMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ControlFlowEvaluator extends Base {
    /**
     * Execute a block in a fresh child scope.
     * The enclosing scope is restored however the block exits.
     */
    executeBlock(node: BlockStmtNode): void {
      const savedEnv = this.env;
      this.env = savedEnv.createChild();
      const depth = this.env.depth;
      this.ctx.observability.onScopeEnter?.({ depth });

      try {
        for (const stmt of node.statements) {
          this.execute(stmt);
        }
      } finally {
        this.ctx.observability.onScopeExit?.({ depth });
        this.env = savedEnv;
      }
    }

    executeIf(node: IfStmtNode): void {
      if (isTruthy(this.evaluate(node.condition))) {
        this.execute(node.thenBranch);
      } else if (node.elseBranch) {
        this.execute(node.elseBranch);
      }
    }

    executeWhile(node: WhileStmtNode): void {
      while (isTruthy(this.evaluate(node.condition))) {
        this.execute(node.body);
      }
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;
