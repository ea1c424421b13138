/**
 * Lexer Module
 * Converts source lines into tokens
 */

export { PUNCTUATION, KEYWORDS, primitiveToToken, stringToToken } from './classify.js';
export { LexerError } from './errors.js';
export {
  createLexerState,
  type LexerState,
  type Radix,
  type ScanMode,
} from './state.js';
export { consumeChar, endLine } from './transitions.js';
export {
  readLines,
  splitLines,
  Tokenizer,
  tokenize,
  tokenizeStream,
  type LexErrorEvent,
  type LineEvent,
  type TokenEvent,
  type TokenizeOptions,
  type TokenizerCallbacks,
} from './tokenizer.js';
