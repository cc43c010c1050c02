/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for program execution.
 * Public API for host applications.
 */

import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onPrint: (text) => {
    console.log(text);
  },
};

/**
 * Create a runtime context for program execution.
 * This is the main entry point for configuring the runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const globals = new Environment();

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      globals.define(name, value);
    }
  }

  return {
    globals,
    callbacks: {
      ...defaultCallbacks,
      ...options.callbacks,
    },
    observability: options.observability ?? {},
  };
}
