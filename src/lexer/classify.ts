/**
 * Character Classifier
 * Punctuation and keyword lookup tables
 */

import type {
  KeywordType,
  PunctuationType,
  SourceSpan,
  Token,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { unexpectedCharacter } from './errors.js';

/** Single-character punctuation lookup table */
export const PUNCTUATION: ReadonlyMap<string, PunctuationType> = new Map([
  ['{', TOKEN_TYPES.LBRACE],
  ['}', TOKEN_TYPES.RBRACE],
  ['(', TOKEN_TYPES.LPAREN],
  [')', TOKEN_TYPES.RPAREN],
  [';', TOKEN_TYPES.SEMICOLON],
]);

/** Keyword lookup table (case-sensitive) */
export const KEYWORDS: ReadonlyMap<string, KeywordType> = new Map([
  ['Int', TOKEN_TYPES.INT],
  ['Return', TOKEN_TYPES.RETURN],
]);

/**
 * Token for one of `{ } ( ) ;`.
 *
 * @throws LexerError (TINYC-L002) for any other character
 */
export function primitiveToToken(ch: string, span: SourceSpan): Token {
  const type = PUNCTUATION.get(ch);
  if (type === undefined) {
    throw unexpectedCharacter(ch, span.start);
  }
  return { type, span };
}

/** Keyword token for a reserved spelling, identifier token otherwise */
export function stringToToken(text: string, span: SourceSpan): Token {
  const type = KEYWORDS.get(text);
  if (type !== undefined) {
    return { type, span };
  }
  return { type: TOKEN_TYPES.IDENTIFIER, name: text, span };
}
