/**
 * Test utilities for runtime tests
 */

import {
  createRuntimeContext,
  createStepper,
  execute,
  type LoxValue,
  type ObservabilityCallbacks,
  parse,
  type ProgramNode,
  type RuntimeContext,
  type RuntimeOptions,
  type StepResult,
} from '../../src/index.js';

/** Parse, failing the test on the first syntax error */
export function parseOrThrow(source: string): ProgramNode {
  const result = parse(source);
  const [first] = result.errors;
  if (first) throw first;
  return result.program;
}

/** Shared setup for all execution modes; print output lands in `output` */
function setup(source: string, options: RuntimeOptions = {}) {
  const output: string[] = [];
  const ctx = createRuntimeContext({
    ...options,
    callbacks: { onPrint: (text) => output.push(text) },
  });
  return { program: parseOrThrow(source), ctx, output };
}

/** Execute a program and return its print output */
export function run(source: string, options: RuntimeOptions = {}): string[] {
  const { program, ctx, output } = setup(source, options);
  execute(program, ctx);
  return output;
}

/** Execute and return print output with root-scope variables */
export function runFull(
  source: string,
  options: RuntimeOptions = {}
): { output: string[]; variables: Record<string, LoxValue> } {
  const { program, ctx, output } = setup(source, options);
  const { variables } = execute(program, ctx);
  return { output, variables };
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): { steps: StepResult[]; ctx: RuntimeContext } {
  const { program, ctx } = setup(source, options);
  const stepper = createStepper(program, ctx);
  const steps: StepResult[] = [];

  while (!stepper.done) {
    steps.push(stepper.step());
  }

  return { steps, ctx };
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: { index: number; total: number }[];
  stepEnd: { index: number; total: number; durationMs: number }[];
  scopeEnter: number[];
  scopeExit: number[];
  error: { error: Error; index?: number | undefined }[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    scopeEnter: [],
    scopeExit: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push(e),
    onStepEnd: (e) => events.stepEnd.push(e),
    onScopeEnter: (e) => events.scopeEnter.push(e.depth),
    onScopeExit: (e) => events.scopeExit.push(e.depth),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
