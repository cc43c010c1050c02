/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared state and utilities for all mixins.
 *
 * @internal
 */

import type { ExprNode, StmtNode } from '../../../types.js';
import { RuntimeError } from '../../../types.js';
import type { Environment } from '../environment.js';
import type { RuntimeContext } from '../types.js';
import { inferKind, type LoxValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Holds the context and the current scope; mixins read and swap `env`.
 */
export class EvaluatorBase {
  /** Scope statements currently run in */
  env: Environment;

  constructor(readonly ctx: RuntimeContext) {
    this.env = ctx.globals;
  }

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - the dispatching version is supplied by
   * CoreMixin. Only called after full mixin composition.
   */
  evaluate(_node: ExprNode): LoxValue {
    throw new Error('evaluate requires full Evaluator composition with CoreMixin');
  }

  /**
   * Execute a statement.
   *
   * NOTE: Stub implementation - the dispatching version is supplied by
   * CoreMixin. Only called after full mixin composition.
   */
  execute(_node: StmtNode): void {
    throw new Error('execute requires full Evaluator composition with CoreMixin');
  }

  /**
   * Build a LOX-R001 type mismatch located at `node`.
   * @param expected - Phrase such as "two numbers"
   */
  typeMismatch(
    node: ExprNode,
    operator: string,
    expected: string,
    ...operands: LoxValue[]
  ): RuntimeError {
    return RuntimeError.fromNode('LOX-R001', node, {
      operator,
      expected,
      actual: operands.map(inferKind).join(' and '),
    });
  }
}
