/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { Environment } from './environment.js';
import type { LoxValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with the formatted value of each print statement */
  onPrint: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called after a block pushes its scope */
  onScopeEnter?: (event: ScopeEvent) => void;
  /** Called before a block pops its scope, on every exit path */
  onScopeExit?: (event: ScopeEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a block scope is entered or left */
export interface ScopeEvent {
  /** Depth of the block's own scope (root is 0) */
  depth: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/** Runtime context with the root scope and callbacks */
export interface RuntimeContext {
  /** Root scope; persists across execute() calls on the same context */
  readonly globals: Environment;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables, defined in the root scope */
  variables?: Record<string, LoxValue>;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
}

/** Result of program execution */
export interface ExecutionResult {
  /** Root-scope bindings after the last statement */
  variables: Record<string, LoxValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement this step executed (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Index of the next statement (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The runtime context (for inspecting variables between steps) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only meaningful after done=true) */
  getResult(): ExecutionResult;
}
