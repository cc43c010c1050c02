/**
 * ExpressionsMixin: Operators
 *
 * Handles literal, grouping, unary, binary and logical expressions.
 *
 * Error Handling:
 * - Operands of the wrong kind throw RuntimeError(LOX-R001)
 * - A zero divisor throws RuntimeError(LOX-R002)
 *
 * @internal
 */

import type {
  BinaryExprNode,
  GroupingExprNode,
  LiteralExprNode,
  LogicalExprNode,
  UnaryExprNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { isTruthy, valuesEqual, type LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * ExpressionsMixin implementation.
 *
 * Both operands of a binary operator are evaluated, left first, before
 * any kind check. `and`/`or` evaluate the right operand only when the
 * left one does not decide the result.
 *
 * Depends on:
 * - EvaluatorBase: evaluate() (dispatch supplied by CoreMixin), typeMismatch()
 */
function createExpressionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ExpressionsEvaluator extends Base {
    evaluateLiteral(node: LiteralExprNode): LoxValue {
      return node.value;
    }

    evaluateGrouping(node: GroupingExprNode): LoxValue {
      return this.evaluate(node.expression);
    }

    evaluateUnary(node: UnaryExprNode): LoxValue {
      const operand = this.evaluate(node.operand);

      switch (node.op) {
        case '-':
          if (typeof operand !== 'number') {
            throw this.typeMismatch(node, '-', 'a number operand', operand);
          }
          return -operand;
        case '!':
          return !isTruthy(operand);
      }
    }

    evaluateBinary(node: BinaryExprNode): LoxValue {
      const left = this.evaluate(node.left);
      const right = this.evaluate(node.right);

      switch (node.op) {
        case '==':
          return valuesEqual(left, right);
        case '!=':
          return !valuesEqual(left, right);
        case '+':
          if (typeof left === 'number' && typeof right === 'number') {
            return left + right;
          }
          if (typeof left === 'string' && typeof right === 'string') {
            return left + right;
          }
          throw this.typeMismatch(
            node,
            '+',
            'two numbers or two strings',
            left,
            right
          );
      }

      if (typeof left !== 'number' || typeof right !== 'number') {
        throw this.typeMismatch(node, node.op, 'two numbers', left, right);
      }

      switch (node.op) {
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          if (right === 0) {
            throw RuntimeError.fromNode('LOX-R002', node);
          }
          return left / right;
        case '<':
          return left < right;
        case '<=':
          return left <= right;
        case '>':
          return left > right;
        case '>=':
          return left >= right;
      }
    }

    /** Short circuit: yields the operand that decided the result */
    evaluateLogical(node: LogicalExprNode): LoxValue {
      const left = this.evaluate(node.left);

      if (node.op === 'or') {
        if (isTruthy(left)) return left;
      } else if (!isTruthy(left)) {
        return left;
      }

      return this.evaluate(node.right);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;
