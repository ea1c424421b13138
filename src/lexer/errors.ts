/**
 * Lexer Errors
 */

import { TinycError, ERROR_REGISTRY, getHelpUrl } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends TinycError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);

    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    const helpUrl = getHelpUrl(errorId);
    super({
      errorId,
      helpUrl: helpUrl || undefined,
      message,
      location,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
  }
}

/** TINYC-L001: character that no state can accept */
export function unknownCharacter(
  ch: string,
  location: SourceLocation
): LexerError {
  return new LexerError(
    'TINYC-L001',
    `Encountered unknown character: ${ch}`,
    location,
    { char: ch }
  );
}

/** TINYC-L002: recognized character in a position where it is not allowed */
export function unexpectedCharacter(
  ch: string,
  location: SourceLocation
): LexerError {
  return new LexerError(
    'TINYC-L002',
    `Unexpected character: ${ch}`,
    location,
    { char: ch }
  );
}
