/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import { ERROR_REGISTRY, renderMessage, getHelpUrl } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TinycErrorData {
  readonly errorId: string;
  readonly helpUrl?: string | undefined;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template with
 * the given context.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("TINYC-L002", { char: "9" }, location)
 * // TinycError: "Unexpected character: 9 at 1:4"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): TinycError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const helpUrl = getHelpUrl(errorId);
  return new TinycError({
    errorId,
    helpUrl: helpUrl || undefined,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all tinyc errors. `toData()` gives the fields the
 * CLI error formatter renders.
 */
export class TinycError extends Error {
  readonly errorId: string;
  readonly helpUrl: string | undefined;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TinycErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TinycError';
    this.errorId = data.errorId;
    this.helpUrl = data.helpUrl;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TinycErrorData {
    return {
      errorId: this.errorId,
      helpUrl: this.helpUrl,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Command-line usage errors raised by tinyc-lex */
export class CliError extends TinycError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'cli') {
      throw new TypeError(`Expected cli error ID, got: ${errorId}`);
    }

    const helpUrl = getHelpUrl(errorId);
    super({
      errorId,
      helpUrl: helpUrl || undefined,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'CliError';
  }
}
