/**
 * Interpret
 *
 * The whole pipeline behind one call: source text in, print lines and
 * diagnostic lines out. Script errors never escape as exceptions.
 */

import { formatDiagnostic } from './diagnostics.js';
import { parse } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  type LoxValue,
  type RuntimeOptions,
} from './runtime/index.js';
import type { LoxError } from './types.js';
import { RuntimeError } from './types.js';

export type InterpretStatus = 'ok' | 'syntax-error' | 'runtime-error';

export interface InterpretResult {
  readonly status: InterpretStatus;
  /** Print output in execution order, one entry per print statement */
  readonly output: string[];
  /** One formatted line per error */
  readonly diagnostics: string[];
  readonly errors: LoxError[];
  /** Root-scope bindings when execution stopped (empty after syntax errors) */
  readonly variables: Record<string, LoxValue>;
}

/**
 * Scan, parse and run a program.
 *
 * When any syntax error is found nothing executes and every syntax error
 * is reported. Otherwise statements run in order until one fails with a
 * runtime error, which is the only error reported for the run.
 *
 * `options.callbacks.onPrint`, when given, is called in addition to
 * collecting output.
 *
 * @example
 * ```typescript
 * const result = interpret('print 1 + 2;');
 * // result.output: ['3']
 * ```
 */
export function interpret(
  source: string,
  options: RuntimeOptions = {}
): InterpretResult {
  const parsed = parse(source);
  if (!parsed.success) {
    return {
      status: 'syntax-error',
      output: [],
      diagnostics: parsed.errors.map(formatDiagnostic),
      errors: parsed.errors,
      variables: {},
    };
  }

  const output: string[] = [];
  const hostPrint = options.callbacks?.onPrint;
  const ctx = createRuntimeContext({
    ...options,
    callbacks: {
      onPrint: (text) => {
        output.push(text);
        hostPrint?.(text);
      },
    },
  });

  try {
    const { variables } = execute(parsed.program, ctx);
    return { status: 'ok', output, diagnostics: [], errors: [], variables };
  } catch (err) {
    if (!(err instanceof RuntimeError)) throw err;
    return {
      status: 'runtime-error',
      output,
      diagnostics: [formatDiagnostic(err)],
      errors: [err],
      variables: ctx.globals.snapshot(),
    };
  }
}
