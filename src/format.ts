/**
 * Token Formatting
 * Debug, JSON and YAML renderings of a token sequence
 */

import * as yaml from 'yaml';
import type { SourceSpan, Token } from './types.js';
import { TOKEN_TYPES } from './types.js';

/** Plain-data form of a token; integer values are decimal strings */
export interface TokenData {
  readonly type: Token['type'];
  readonly name?: string;
  readonly value?: string;
  readonly span: SourceSpan;
}

/**
 * Debug form of a single token.
 *
 * @example
 * formatToken(token) // 'Identifier("main")', 'Integer(31)', 'OpenBrace'
 */
export function formatToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.LBRACE:
      return 'OpenBrace';
    case TOKEN_TYPES.RBRACE:
      return 'CloseBrace';
    case TOKEN_TYPES.LPAREN:
      return 'OpenParenthesis';
    case TOKEN_TYPES.RPAREN:
      return 'CloseParenthesis';
    case TOKEN_TYPES.SEMICOLON:
      return 'Semicolon';
    case TOKEN_TYPES.INT:
      return 'IntKeyword';
    case TOKEN_TYPES.RETURN:
      return 'ReturnKeyword';
    case TOKEN_TYPES.IDENTIFIER:
      return `Identifier(${JSON.stringify(token.name)})`;
    case TOKEN_TYPES.INTEGER:
      return `Integer(${token.value.toString()})`;
    default: {
      const exhaustive: never = token;
      return exhaustive;
    }
  }
}

/** Debug dump of a token sequence: `[IntKeyword, Identifier("x")]` */
export function formatTokens(tokens: readonly Token[]): string {
  return `[${tokens.map(formatToken).join(', ')}]`;
}

export function tokenToData(token: Token): TokenData {
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      return { type: token.type, name: token.name, span: token.span };
    case TOKEN_TYPES.INTEGER:
      return {
        type: token.type,
        value: token.value.toString(),
        span: token.span,
      };
    default:
      return { type: token.type, span: token.span };
  }
}

export function tokensToJson(tokens: readonly Token[]): string {
  return JSON.stringify(tokens.map(tokenToData), null, 2);
}

export function tokensToYaml(tokens: readonly Token[]): string {
  return yaml.stringify(tokens.map(tokenToData));
}
