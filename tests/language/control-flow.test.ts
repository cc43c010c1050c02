/**
 * Language Tests: Conditionals and Loops
 */

import { describe, expect, it } from 'vitest';
import { run, runFull } from '../helpers/runtime.js';

describe('Language: if', () => {
  it('takes the else branch', () => {
    expect(run('if (1 > 2) print "then"; else print "else";')).toEqual([
      'else',
    ]);
  });

  it('binds a dangling else to the inner if', () => {
    expect(run('if (true) if (false) print "a"; else print "b";')).toEqual([
      'b',
    ]);
    expect(run('if (false) if (true) print "a"; else print "b";')).toEqual([]);
  });

  it('accepts blocks as branches', () => {
    expect(
      run('var n = 3;\nif (n > 2) { print "big"; print n; } else { print "small"; }')
    ).toEqual(['big', '3']);
  });
});

describe('Language: while', () => {
  it('loops until the condition is falsy', () => {
    expect(run('var i = 3;\nwhile (i) { print i; i = i - 1; }')).toEqual([
      '3',
      '2',
      '1',
    ]);
  });

  it('never runs when the condition starts falsy', () => {
    expect(run('while (nil) print "never";')).toEqual([]);
  });

  it('gives each iteration a fresh block scope', () => {
    expect(
      run(
        'var i = 0;\nwhile (i < 2) { var seen; print seen; seen = i; i = i + 1; }'
      )
    ).toEqual(['nil', 'nil']);
  });

  it('hides loop-body bindings after the loop', () => {
    expect(() =>
      run('var i = 0;\nwhile (i < 2) { var inner = i; i = i + 1; }\nprint inner;')
    ).toThrow("Undefined variable 'inner'");
  });
});

describe('Language: for', () => {
  it('counts with a declared loop variable', () => {
    expect(run('for (var i = 0; i < 3; i = i + 1) print i;')).toEqual([
      '0',
      '1',
      '2',
    ]);
  });

  it('matches the equivalent while loop', () => {
    const forOutput = run('for (var i = 0; i < 3; i = i + 1) print i;');
    const whileOutput = run(
      'var i = 0;\nwhile (i < 3) { print i; i = i + 1; }'
    );
    expect(forOutput).toEqual(whileOutput);
  });

  it('scopes the loop variable to the loop', () => {
    expect(() =>
      run('for (var i = 0; i < 1; i = i + 1) print i;\nprint i;')
    ).toThrow("Undefined variable 'i'");
  });

  it('uses an existing variable as counter', () => {
    const { output, variables } = runFull(
      'var i;\nfor (i = 0; i < 2; i = i + 1) print i;'
    );
    expect(output).toEqual(['0', '1']);
    expect(variables).toEqual({ i: 2 });
  });

  it('runs the increment after the body', () => {
    expect(
      run('var total = 0;\nfor (var i = 1; i <= 4; i = i + 1) { total = total + i; }\nprint total;')
    ).toEqual(['10']);
  });

  it('accepts a loop without increment', () => {
    expect(run('for (var i = 0; i < 2;) { print i; i = i + 1; }')).toEqual([
      '0',
      '1',
    ]);
  });

  it('computes a small fibonacci sequence', () => {
    expect(
      run(
        'var a = 0;\nvar b = 1;\nfor (var n = 0; n < 6; n = n + 1) {\n  print a;\n  var next = a + b;\n  a = b;\n  b = next;\n}'
      )
    ).toEqual(['0', '1', '1', '2', '3', '5']);
  });
});
