/**
 * Diagnostics
 *
 * Line-oriented error reports for hosts: one line per error, plus
 * optional source snippets around the failing location.
 */

import type { SourceLocation } from './types.js';
import { LoxError, RuntimeError } from './types.js';

// ============================================================
// DIAGNOSTIC LINES
// ============================================================

/**
 * Format an error as a single diagnostic line.
 *
 * - Lexer and parse errors: `[line 3] Error: Expect expression`
 * - Runtime errors: `[line 3] Runtime Error: Division by zero`
 *
 * Errors without a location drop the `[line n] ` prefix; errors that are
 * not LoxErrors render their message unchanged.
 */
export function formatDiagnostic(err: Error): string {
  if (!(err instanceof LoxError)) {
    return err.message;
  }

  const { message, location } = err.toData();
  const label = err instanceof RuntimeError ? 'Runtime Error' : 'Error';
  const prefix = location ? `[line ${location.line}] ` : '';

  return `${prefix}${label}: ${message}`;
}

// ============================================================
// SOURCE SNIPPETS
// ============================================================

export interface SnippetLine {
  /** 1-based line number */
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/**
 * Extract the source lines around an error location.
 *
 * @param contextLines - Lines to include before and after (default: 1)
 * @returns Lines in order; empty for empty source
 * @throws {RangeError} When the location is outside the source
 */
export function extractSnippet(
  source: string,
  location: SourceLocation,
  contextLines = 1
): SnippetLine[] {
  if (source === '') return [];

  const lines = source.split('\n');
  if (location.line < 1 || location.line > lines.length) {
    throw new RangeError('Location exceeds source bounds');
  }

  const firstLine = Math.max(1, location.line - contextLines);
  const lastLine = Math.min(lines.length, location.line + contextLines);

  const snippet: SnippetLine[] = [];
  for (let lineNumber = firstLine; lineNumber <= lastLine; lineNumber++) {
    snippet.push({
      lineNumber,
      content: lines[lineNumber - 1] ?? '',
      isErrorLine: lineNumber === location.line,
    });
  }
  return snippet;
}

/**
 * Render a snippet with a line-number gutter and a caret under the
 * error column.
 *
 * @example
 * ```
 * 1 | var a = 1;
 * 2 | print a / 0;
 *   |       ^
 * ```
 */
export function renderSnippet(
  snippet: readonly SnippetLine[],
  column: number
): string {
  const width = String(snippet[snippet.length - 1]?.lineNumber ?? 0).length;
  const out: string[] = [];

  for (const line of snippet) {
    out.push(`${String(line.lineNumber).padStart(width)} | ${line.content}`);
    if (line.isErrorLine) {
      out.push(`${' '.repeat(width)} | ${' '.repeat(Math.max(0, column - 1))}^`);
    }
  }

  return out.join('\n');
}
