/**
 * tinyc-lex
 * Exports the lexer, token types, formatting and error taxonomy
 */

export {
  consumeChar,
  createLexerState,
  endLine,
  KEYWORDS,
  LexerError,
  primitiveToToken,
  PUNCTUATION,
  readLines,
  splitLines,
  stringToToken,
  tokenize,
  Tokenizer,
  tokenizeStream,
  type LexErrorEvent,
  type LexerState,
  type LineEvent,
  type Radix,
  type ScanMode,
  type TokenEvent,
  type TokenizeOptions,
  type TokenizerCallbacks,
} from './lexer/index.js';
export {
  formatToken,
  formatTokens,
  tokenToData,
  tokensToJson,
  tokensToYaml,
  type TokenData,
} from './format.js';
export { VERSION } from './version.js';

// ============================================================
// TOKENS AND ERROR TAXONOMY
// ============================================================
export {
  CliError,
  createError,
  ERROR_REGISTRY,
  getHelpUrl,
  MAX_INTEGER,
  renderMessage,
  TinycError,
  TOKEN_TYPES,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type IdentifierToken,
  type IntegerToken,
  type KeywordToken,
  type KeywordType,
  type PunctuationToken,
  type PunctuationType,
  type SourceLocation,
  type SourceSpan,
  type TinycErrorData,
  type Token,
  type TokenType,
} from './types.js';
