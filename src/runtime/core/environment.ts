/**
 * Environment
 *
 * Chained lexical scopes. Each block gets a child of the scope it runs
 * in; lookups walk outward through `parent`.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { LoxValue } from './values.js';

export class Environment {
  private readonly variables = new Map<string, LoxValue>();
  /** Nesting depth: 0 for the root scope */
  readonly depth: number;

  constructor(readonly parent?: Environment) {
    this.depth = parent ? parent.depth + 1 : 0;
  }

  /** Create or overwrite a binding in this scope */
  define(name: string, value: LoxValue): void {
    this.variables.set(name, value);
  }

  /**
   * Read the nearest binding of `name`.
   * @throws RuntimeError LOX-R003 when no scope in the chain defines it
   */
  get(name: string, location?: SourceLocation): LoxValue {
    const scope = this.resolve(name);
    if (!scope) {
      throw new RuntimeError('LOX-R003', location, { name });
    }
    return scope.variables.get(name) ?? null;
  }

  /**
   * Overwrite the nearest binding of `name`. Never creates a binding.
   * @throws RuntimeError LOX-R003 when no scope in the chain defines it
   */
  assign(name: string, value: LoxValue, location?: SourceLocation): LoxValue {
    const scope = this.resolve(name);
    if (!scope) {
      throw new RuntimeError('LOX-R003', location, { name });
    }
    scope.variables.set(name, value);
    return value;
  }

  /** True when this scope or an enclosing one defines `name` */
  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  /** Own bindings only, as a plain record */
  snapshot(): Record<string, LoxValue> {
    const vars: Record<string, LoxValue> = {};
    for (const [name, value] of this.variables) {
      vars[name] = value;
    }
    return vars;
  }

  createChild(): Environment {
    return new Environment(this);
  }

  private resolve(name: string): Environment | undefined {
    let scope: Environment | undefined = this;
    while (scope) {
      if (scope.variables.has(name)) return scope;
      scope = scope.parent;
    }
    return undefined;
  }
}
