/**
 * Lexer Helper Functions
 * Character classification and span construction
 */

import type { SourceLocation, SourceSpan } from '../types.js';
import type { Radix } from './state.js';

const ALPHABETIC = /^\p{Alphabetic}$/u;
const NUMERIC = /^\p{N}$/u;
const WHITESPACE = /^\p{White_Space}$/u;

export function isPunctuation(ch: string): boolean {
  return ch === '{' || ch === '}' || ch === '(' || ch === ')' || ch === ';';
}

export function isDecimalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isAlphabetic(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return isAlphabetic(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || NUMERIC.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/** Characters an integer literal tries to read as a digit or radix prefix */
export function isIntegerChar(ch: string): boolean {
  return (
    isDecimalDigit(ch) ||
    (ch >= 'a' && ch <= 'f') ||
    (ch >= 'A' && ch <= 'F') ||
    ch === 'o' ||
    ch === 'x'
  );
}

/**
 * Value of `ch` as a digit in `radix`, or null when it is not one.
 * Letters are case-insensitive.
 */
export function digitValue(ch: string, radix: Radix): number | null {
  let value: number;
  if (isDecimalDigit(ch)) {
    value = ch.charCodeAt(0) - 48;
  } else if (ch >= 'a' && ch <= 'z') {
    value = ch.charCodeAt(0) - 87;
  } else if (ch >= 'A' && ch <= 'Z') {
    value = ch.charCodeAt(0) - 55;
  } else {
    return null;
  }
  return value < radix ? value : null;
}

export function makeSpan(start: SourceLocation, end: SourceLocation): SourceSpan {
  return { start, end };
}
