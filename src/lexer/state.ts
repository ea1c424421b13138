/**
 * Lexer State
 * Scan mode between characters plus the position of the next character
 */

import type { SourceLocation } from '../types.js';

export type Radix = 2 | 8 | 10 | 16;

/**
 * What the scanner is in the middle of.
 *
 * `leading-zero` is the state right after a `0` read in `idle`: the next
 * character decides between a radix prefix (`b`, `o`, `x`) and a decimal
 * literal, so it is kept apart from an `integer` whose value is zero.
 */
export type ScanMode =
  | { readonly kind: 'idle' }
  | {
      readonly kind: 'identifier';
      readonly text: string;
      readonly start: SourceLocation;
    }
  | { readonly kind: 'leading-zero'; readonly start: SourceLocation }
  | {
      readonly kind: 'integer';
      readonly value: bigint;
      readonly radix: Radix;
      /** Characters consumed so far, for diagnostics */
      readonly literal: string;
      readonly start: SourceLocation;
    };

export interface LexerState {
  mode: ScanMode;
  line: number;
  column: number;
  offset: number;
}

export const IDLE: ScanMode = { kind: 'idle' };

export function createLexerState(): LexerState {
  return {
    mode: IDLE,
    line: 1,
    column: 1,
    offset: 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.offset };
}

/** Move past one character on the current line */
export function advance(state: LexerState): void {
  state.column++;
  state.offset++;
}

/** Move past a line terminator of `breakLength` code points */
export function advanceLine(state: LexerState, breakLength: number = 1): void {
  state.line++;
  state.column = 1;
  state.offset += breakLength;
}
