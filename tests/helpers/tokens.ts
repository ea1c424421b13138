/**
 * Test utilities for lexer tests
 */

import { formatTokens, tokenize, type TokenizeOptions } from '../../src/index.js';

/** Tokenize and return the debug dump, e.g. `[IntKeyword, Identifier("x")]` */
export function lex(
  input: string | Iterable<string>,
  options?: TokenizeOptions
): string {
  return formatTokens(tokenize(input, options));
}

/** Error thrown by `fn`, for asserting on its fields */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
