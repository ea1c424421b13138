import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Punctuation
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  SEMICOLON: 'SEMICOLON', // ;

  // Keywords
  INT: 'INT', // Int
  RETURN: 'RETURN', // Return

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  INTEGER: 'INTEGER',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export type PunctuationType =
  | typeof TOKEN_TYPES.LBRACE
  | typeof TOKEN_TYPES.RBRACE
  | typeof TOKEN_TYPES.LPAREN
  | typeof TOKEN_TYPES.RPAREN
  | typeof TOKEN_TYPES.SEMICOLON;

export type KeywordType = typeof TOKEN_TYPES.INT | typeof TOKEN_TYPES.RETURN;

/** Largest magnitude an INTEGER token can hold (unsigned 64-bit) */
export const MAX_INTEGER = 0xffff_ffff_ffff_ffffn;

export interface PunctuationToken {
  readonly type: PunctuationType;
  readonly span: SourceSpan;
}

export interface KeywordToken {
  readonly type: KeywordType;
  readonly span: SourceSpan;
}

export interface IdentifierToken {
  readonly type: typeof TOKEN_TYPES.IDENTIFIER;
  /** Never empty, never a reserved keyword spelling */
  readonly name: string;
  readonly span: SourceSpan;
}

export interface IntegerToken {
  readonly type: typeof TOKEN_TYPES.INTEGER;
  readonly value: bigint;
  readonly span: SourceSpan;
}

export type Token =
  | PunctuationToken
  | KeywordToken
  | IdentifierToken
  | IntegerToken;
