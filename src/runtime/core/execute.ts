/**
 * Program Execution
 *
 * Public API for executing parsed programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { executeStatement } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';

/**
 * Execute a parsed program.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns Root-scope bindings after the run
 * @throws RuntimeError from the first statement that fails
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Each step runs one top-level statement. A failing step fires onError,
 * marks the stepper done and rethrows. Call stack exhaustion surfaces as
 * RuntimeError LOX-R004.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = program.statements;
  const total = statements.length;
  let index = 0;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        executeStatement(stmt, context);
      } catch (caught) {
        isDone = true;
        // Call stack exhausted by deep nesting
        const error =
          caught instanceof RangeError
            ? new RuntimeError('LOX-R004', stmt.span.start)
            : caught;
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;

      return { done: isDone, index: index - 1, total };
    },

    getResult(): ExecutionResult {
      return { variables: context.globals.snapshot() };
    },
  };
}
