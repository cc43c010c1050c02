/**
 * Language Tests: Variables and Assignment
 */

import { describe, expect, it } from 'vitest';
import { interpret, RuntimeError } from '../../src/index.js';
import { run, runFull } from '../helpers/runtime.js';

describe('Language: variables', () => {
  it('defaults an uninitialized variable to nil', () => {
    expect(run('var a;\nprint a;')).toEqual(['nil']);
  });

  it('allows redeclaring in the same scope', () => {
    expect(run('var a = 1;\nvar a = 2;\nprint a;')).toEqual(['2']);
  });

  it('allows the initializer to read the old binding', () => {
    expect(run('var a = 1;\nvar a = a + 1;\nprint a;')).toEqual(['2']);
  });

  it('yields the assigned value from assignment', () => {
    expect(run('var a;\nvar b;\na = b = 3;\nprint a;\nprint b;')).toEqual([
      '3',
      '3',
    ]);
  });

  it('prints an assignment expression', () => {
    expect(run('var a = 1;\nprint a = "two";')).toEqual(['two']);
  });

  it('reports reading an undeclared variable', () => {
    expect(() => run('print y;')).toThrow(RuntimeError);
    expect(() => run('print y;')).toThrow("Undefined variable 'y' at 1:7");
  });

  it('never declares on assignment', () => {
    const result = interpret('x = 1;');
    expect(result.status).toBe('runtime-error');
    expect(result.errors[0]).toBeInstanceOf(RuntimeError);
    expect(result.diagnostics).toEqual([
      "[line 1] Runtime Error: Undefined variable 'x'",
    ]);
    expect(result.variables).toEqual({});
  });

  it('exposes root bindings after execution', () => {
    const { variables } = runFull('var a = 1;\nvar b = "s";\nvar c;');
    expect(variables).toEqual({ a: 1, b: 's', c: null });
  });

  it('reads predefined variables', () => {
    expect(run('print greeting + "!";', { variables: { greeting: 'hi' } })).toEqual(
      ['hi!']
    );
  });

  it('keeps assignments made before a failing operator', () => {
    const result = interpret('var a = 1;\nprint (a = "s") - (a = 5);');
    expect(result.status).toBe('runtime-error');
    expect(result.variables).toEqual({ a: 5 });
  });
});
