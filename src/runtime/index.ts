/**
 * Runtime Module
 *
 * Structure:
 * - core/: Core runtime
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: LoxValue and value utilities
 *   - environment.ts: Chained lexical scopes
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  ScopeEvent,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { LoxValue, ValueKind } from './core/values.js';

export {
  formatValue,
  inferKind,
  isTruthy,
  valuesEqual,
} from './core/values.js';

// ============================================================
// SCOPES
// ============================================================

export { Environment } from './core/environment.js';

// ============================================================
// CONTEXT FACTORY
// ============================================================

export { createRuntimeContext } from './core/context.js';

// ============================================================
// PROGRAM EXECUTION
// ============================================================

export { createStepper, execute } from './core/execute.js';
