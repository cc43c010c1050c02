/**
 * Lexer Errors
 */

import { LoxError, lookupDefinition, renderMessage } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends LoxError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const definition = lookupDefinition(errorId, 'lexer');

    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
  }
}
