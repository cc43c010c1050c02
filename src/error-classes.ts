/**
 * Lox Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type RuntimeErrorKind,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Look up a definition and check that it belongs to the expected category.
 * Throws TypeError for unknown ids or ids of another category.
 * @internal
 */
export function lookupDefinition(
  errorId: string,
  category: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Lox errors.
 * Provides structured data for host applications to format as needed.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LoxErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LoxError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors */
export class ParseError extends LoxError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Runtime execution errors */
export class RuntimeError extends LoxError {
  readonly kind: RuntimeErrorKind;

  constructor(
    errorId: string,
    location?: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId, 'runtime');
    const kind = definition.runtimeKind;
    if (kind === undefined) {
      throw new TypeError(`Runtime error ID has no kind: ${errorId}`);
    }
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'RuntimeError';
    this.kind = kind;
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(errorId, node?.span.start, context);
  }
}
