/**
 * Lexer Tests: Scanning
 */

import { describe, expect, it } from 'vitest';
import { LexerError, scan, TOKEN_TYPES } from '../../src/index.js';

function types(source: string): string[] {
  return scan(source).tokens.map((t) => t.type);
}

describe('Lexer: scan', () => {
  describe('punctuation and operators', () => {
    it('scans single-character tokens', () => {
      expect(types('(){},.-+;/*')).toEqual([
        'LPAREN',
        'RPAREN',
        'LBRACE',
        'RBRACE',
        'COMMA',
        'DOT',
        'MINUS',
        'PLUS',
        'SEMICOLON',
        'SLASH',
        'STAR',
        'EOF',
      ]);
    });

    it('scans comparison and equality operators', () => {
      expect(types('! != = == > >= < <=')).toEqual([
        'BANG',
        'NE',
        'ASSIGN',
        'EQ',
        'GT',
        'GE',
        'LT',
        'LE',
        'EOF',
      ]);
    });

    it('prefers the longest operator', () => {
      expect(types('===')).toEqual(['EQ', 'ASSIGN', 'EOF']);
      expect(types('!==')).toEqual(['NE', 'ASSIGN', 'EOF']);
    });
  });

  describe('numbers', () => {
    it('carries the numeric value as literal', () => {
      const { tokens } = scan('123 4.5');
      expect(tokens[0]?.literal).toBe(123);
      expect(tokens[1]?.literal).toBe(4.5);
      expect(tokens[1]?.lexeme).toBe('4.5');
    });

    it('does not take a trailing dot', () => {
      const { tokens } = scan('1.');
      expect(tokens.map((t) => t.type)).toEqual(['NUMBER', 'DOT', 'EOF']);
      expect(tokens[0]?.lexeme).toBe('1');
    });

    it('does not take a leading dot', () => {
      const { tokens } = scan('.5');
      expect(tokens.map((t) => t.type)).toEqual(['DOT', 'NUMBER', 'EOF']);
      expect(tokens[1]?.literal).toBe(5);
    });
  });

  describe('strings', () => {
    it('strips quotes from the literal', () => {
      const [token] = scan('"hi there"').tokens;
      expect(token?.type).toBe(TOKEN_TYPES.STRING);
      expect(token?.lexeme).toBe('"hi there"');
      expect(token?.literal).toBe('hi there');
    });

    it('allows strings to span lines', () => {
      const { tokens } = scan('"a\nb" x');
      expect(tokens[0]?.literal).toBe('a\nb');
      expect(tokens[0]?.span.start).toEqual({ line: 1, column: 1, offset: 0 });
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 4, offset: 6 });
    });

    it('reports an unterminated string where it began', () => {
      const { tokens, errors } = scan('print "abc');
      expect(tokens.map((t) => t.type)).toEqual(['PRINT', 'EOF']);
      expect(errors).toHaveLength(1);
      expect(errors[0]?.errorId).toBe('LOX-L001');
      expect(errors[0]?.location).toEqual({ line: 1, column: 7, offset: 6 });
      expect(errors[0]?.toData().message).toBe('Unterminated string');
    });

    it('consumes the rest of the input after an unterminated string', () => {
      const { tokens, errors } = scan('"abc\ndef');
      expect(errors[0]?.location.line).toBe(1);
      expect(tokens).toHaveLength(1);
      expect(tokens[0]?.span.start).toEqual({ line: 2, column: 4, offset: 8 });
    });
  });

  describe('identifiers and keywords', () => {
    it('classifies keywords', () => {
      expect(
        types('and or if else while for var print true false nil')
      ).toEqual([
        'AND',
        'OR',
        'IF',
        'ELSE',
        'WHILE',
        'FOR',
        'VAR',
        'PRINT',
        'TRUE',
        'FALSE',
        'NIL',
        'EOF',
      ]);
    });

    it('scans other names as identifiers', () => {
      const { tokens } = scan('foo _bar x1 toString');
      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
      expect(tokens.map((t) => t.lexeme)).toEqual([
        'foo',
        '_bar',
        'x1',
        'toString',
        '',
      ]);
    });

    it('treats keywords as case sensitive', () => {
      expect(types('Print NIL')).toEqual(['IDENTIFIER', 'IDENTIFIER', 'EOF']);
    });
  });

  describe('whitespace and comments', () => {
    it('skips line comments and counts lines', () => {
      const { tokens } = scan('print 1; // one\nprint 2;');
      expect(tokens.map((t) => t.type)).toEqual([
        'PRINT',
        'NUMBER',
        'SEMICOLON',
        'PRINT',
        'NUMBER',
        'SEMICOLON',
        'EOF',
      ]);
      expect(tokens[3]?.span.start.line).toBe(2);
    });

    it('tracks columns', () => {
      const { tokens } = scan('var x;');
      expect(tokens[1]?.span).toEqual({
        start: { line: 1, column: 5, offset: 4 },
        end: { line: 1, column: 6, offset: 5 },
      });
    });

    it('ends empty input with EOF', () => {
      const { tokens, errors } = scan('');
      expect(errors).toEqual([]);
      expect(tokens).toHaveLength(1);
      expect(tokens[0]?.type).toBe('EOF');
      expect(tokens[0]?.span.start).toEqual({ line: 1, column: 1, offset: 0 });
    });

    it('scans a comment at end of input', () => {
      expect(types('// only a comment')).toEqual(['EOF']);
    });
  });

  describe('errors', () => {
    it('skips an unexpected character and keeps scanning', () => {
      const { tokens, errors } = scan('var a = @;');
      expect(tokens.map((t) => t.type)).toEqual([
        'VAR',
        'IDENTIFIER',
        'ASSIGN',
        'SEMICOLON',
        'EOF',
      ]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(LexerError);
      expect(errors[0]?.errorId).toBe('LOX-L002');
      expect(errors[0]?.message).toBe("Unexpected character '@' at 1:9");
    });

    it('collects every error in one pass', () => {
      const { tokens, errors } = scan('@\n#');
      expect(tokens.map((t) => t.type)).toEqual(['EOF']);
      expect(errors.map((e) => e.location.line)).toEqual([1, 2]);
      expect(errors.map((e) => e.context?.['char'])).toEqual(['@', '#']);
    });
  });
});
