/**
 * Runtime Tests: Error Registry and Error Classes
 */

import { describe, expect, it } from 'vitest';
import {
  ERROR_REGISTRY,
  LexerError,
  LoxError,
  ParseError,
  renderMessage,
  RuntimeError,
} from '../../src/index.js';

const location = { line: 2, column: 5, offset: 10 };

describe('Error registry', () => {
  it('registers every condition once', () => {
    const ids = [...ERROR_REGISTRY.entries()].map(([id]) => id);
    expect(ids).toEqual([
      'LOX-L001',
      'LOX-L002',
      'LOX-P001',
      'LOX-P002',
      'LOX-P003',
      'LOX-P004',
      'LOX-P005',
      'LOX-R001',
      'LOX-R002',
      'LOX-R003',
      'LOX-R004',
    ]);
    expect(ERROR_REGISTRY.size).toBe(11);
  });

  it('gives every runtime definition a kind', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.runtimeKind !== undefined).toBe(
        definition.category === 'runtime'
      );
    }
  });

  it('looks up definitions by id', () => {
    expect(ERROR_REGISTRY.get('LOX-R002')?.runtimeKind).toBe('DivisionByZero');
    expect(ERROR_REGISTRY.has('LOX-X999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('substitutes placeholders', () => {
    expect(renderMessage("Undefined variable '{name}'", { name: 'x' })).toBe(
      "Undefined variable 'x'"
    );
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('got {actual}!', {})).toBe('got !');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('{n} items', { n: 3 })).toBe('3 items');
  });

  it('returns an unclosed template unchanged', () => {
    expect(renderMessage('a {b', { b: 'x' })).toBe('a {b');
  });
});

describe('Error classes', () => {
  it('appends the location to the message', () => {
    const err = new RuntimeError('LOX-R002', location);
    expect(err.message).toBe('Division by zero at 2:5');
    expect(err.toData()).toEqual({
      errorId: 'LOX-R002',
      message: 'Division by zero',
      location,
      context: {},
    });
  });

  it('omits the suffix without a location', () => {
    const err = new RuntimeError('LOX-R003', undefined, { name: 'q' });
    expect(err.message).toBe("Undefined variable 'q'");
    expect(err.kind).toBe('UndefinedVariable');
  });

  it('builds the hierarchy', () => {
    const err = new ParseError('LOX-P002', location);
    expect(err).toBeInstanceOf(LoxError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ParseError');
    expect(new LexerError('LOX-L001', location).name).toBe('LexerError');
  });

  it('renders templates from context', () => {
    const err = new ParseError('LOX-P001', location, {
      expectation: "';' after value",
    });
    expect(err.toData().message).toBe("Expect ';' after value");
  });

  it('formats through a host formatter', () => {
    const err = new RuntimeError('LOX-R002', location);
    expect(err.format()).toBe('Division by zero at 2:5');
    expect(
      err.format((data) => `${data.errorId}: ${data.message}`)
    ).toBe('LOX-R002: Division by zero');
  });

  it('rejects unknown ids', () => {
    expect(() => new ParseError('LOX-X999', location)).toThrow(
      new TypeError('Unknown error ID: LOX-X999')
    );
  });

  it('rejects ids of another category', () => {
    expect(() => new RuntimeError('LOX-P001')).toThrow(
      new TypeError('Expected runtime error ID, got: LOX-P001')
    );
    expect(() => new LexerError('LOX-R001', location)).toThrow(TypeError);
  });

  it('builds runtime errors from nodes', () => {
    const err = RuntimeError.fromNode(
      'LOX-R001',
      { span: { start: location, end: location } },
      { operator: '+', expected: 'two numbers', actual: 'nil and nil' }
    );
    expect(err.location).toEqual(location);
    expect(err.toData().message).toBe(
      "Operator '+' expects two numbers, got nil and nil"
    );
  });
});
