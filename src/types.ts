/**
 * Shared Types
 * Source locations, tokens and the error taxonomy
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export {
  MAX_INTEGER,
  TOKEN_TYPES,
  type IdentifierToken,
  type IntegerToken,
  type KeywordToken,
  type KeywordType,
  type PunctuationToken,
  type PunctuationType,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  ERROR_REGISTRY,
  getHelpUrl,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  CliError,
  createError,
  TinycError,
  type TinycErrorData,
} from './error-classes.js';
