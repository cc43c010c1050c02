/**
 * VariablesMixin: Variable Access
 *
 * Declaration, lookup and assignment against the current scope chain.
 *
 * Error Handling:
 * - Reading or assigning an undeclared name throws RuntimeError(LOX-R003)
 *
 * @internal
 */

import type {
  AssignExprNode,
  VarStmtNode,
  VariableExprNode,
} from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

function createVariablesMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    evaluateVariable(node: VariableExprNode): LoxValue {
      return this.env.get(node.name, node.span.start);
    }

    /** Assignment never declares; yields the assigned value */
    evaluateAssign(node: AssignExprNode): LoxValue {
      const value = this.evaluate(node.value);
      return this.env.assign(node.name, value, node.span.start);
    }

    /** var name [= init]; defaults to nil, overwrites a same-scope binding */
    executeVar(node: VarStmtNode): void {
      const value = node.initializer ? this.evaluate(node.initializer) : null;
      this.env.define(node.name, value);
    }
  };
}

export const VariablesMixin = createVariablesMixin;
