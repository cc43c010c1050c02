/**
 * Parser Tests: Error Recovery
 * Multiple independent syntax errors reported in one parse
 */

import { describe, expect, it } from 'vitest';
import { LexerError, ParseError, parse, printProgram } from '../../src/index.js';

describe('Parser: error recovery', () => {
  it('reports errors on separate lines in one parse', () => {
    const result = parse('print ;\nvar = 1;\nprint 3;');

    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.location.line)).toEqual([1, 2]);
    expect(result.errors.map((e) => e.toData().message)).toEqual([
      'Expect expression',
      'Expect variable name',
    ]);
  });

  it('keeps statements after the error', () => {
    const result = parse('print ;\nvar = 1;\nprint 3;');
    expect(printProgram(result.program)).toBe('(print 3)');
  });

  it('resumes before a statement keyword', () => {
    const result = parse('var = 1 2 print 3;');
    expect(result.errors.map((e) => e.toData().message)).toEqual([
      'Expect variable name',
    ]);
    expect(printProgram(result.program)).toBe('(print 3)');
  });

  it('recovers inside a block', () => {
    const result = parse('{\n  print ;\n  print 2;\n}');
    expect(result.errors.map((e) => e.location.line)).toEqual([2]);
    expect(printProgram(result.program)).toBe('(block (print 2))');
  });

  it('merges lexer and parser errors in source order', () => {
    const result = parse('var a = @;\nprint ;');

    expect(result.errors.map((e) => e.errorId)).toEqual([
      'LOX-L002',
      'LOX-P002',
    ]);
    expect(result.errors[0]).toBeInstanceOf(LexerError);
    expect(result.errors[1]).toBeInstanceOf(ParseError);
    expect(result.errors.map((e) => e.location.line)).toEqual([1, 2]);
  });

  it('reports no parse error for a declaration with a lexer error', () => {
    const result = parse('print @;\nprint 2;');
    expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-L002']);
    expect(printProgram(result.program)).toBe('(print 2)');
  });

  it('reports only the unterminated string that swallowed the rest', () => {
    const result = parse('var s = "abc;\nprint 1;\nprint 2;');
    expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-L001']);
    expect(result.errors[0]?.location.line).toBe(1);
  });

  it('keeps parse errors from declarations without lexer errors', () => {
    const result = parse('print 1; @\nprint ;');
    expect(result.errors.map((e) => e.errorId)).toEqual([
      'LOX-L002',
      'LOX-P002',
    ]);
  });

  it('reports nesting deeper than the call stack allows', () => {
    const depth = 50000;
    const source = `print ${'('.repeat(depth)}1${')'.repeat(depth)};`;
    const result = parse(source);

    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.errorId)).toEqual(['LOX-P005']);
    expect(result.program.statements).toEqual([]);
  });

  it('discards the rest of a statement whose terminator is missing', () => {
    const result = parse('var a = 1 print a;\nprint 2;');
    expect(result.errors.map((e) => e.toData().message)).toEqual([
      "Expect ';' after variable declaration",
    ]);
    expect(printProgram(result.program)).toBe('(print 2)');
  });

  it('succeeds on clean input', () => {
    const result = parse('var a = 1;\nprint a;');
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.program.statements).toHaveLength(2);
  });

  it('parses empty input to an empty program', () => {
    const result = parse('');
    expect(result.success).toBe(true);
    expect(result.program.type).toBe('Program');
    expect(result.program.statements).toEqual([]);
  });
});
