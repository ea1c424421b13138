/**
 * State Transitions
 * One step of the scanner: (mode, character) -> (mode, emitted tokens)
 */

import type { SourceLocation, Token } from '../types.js';
import { MAX_INTEGER, TOKEN_TYPES } from '../types.js';
import { primitiveToToken, stringToToken } from './classify.js';
import { LexerError, unexpectedCharacter, unknownCharacter } from './errors.js';
import {
  digitValue,
  isAlphabetic,
  isDecimalDigit,
  isIdentifierChar,
  isIdentifierStart,
  isIntegerChar,
  isPunctuation,
  isWhitespace,
  makeSpan,
} from './helpers.js';
import {
  currentLocation,
  IDLE,
  type LexerState,
  type ScanMode,
} from './state.js';

type IdentifierMode = Extract<ScanMode, { kind: 'identifier' }>;
type LeadingZeroMode = Extract<ScanMode, { kind: 'leading-zero' }>;
type IntegerMode = Extract<ScanMode, { kind: 'integer' }>;

function locationAfter(loc: SourceLocation): SourceLocation {
  return { line: loc.line, column: loc.column + 1, offset: loc.offset + 1 };
}

function punctuation(ch: string, at: SourceLocation): Token {
  return primitiveToToken(ch, makeSpan(at, locationAfter(at)));
}

function integerToken(
  value: bigint,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type: TOKEN_TYPES.INTEGER, value, span: makeSpan(start, end) };
}

/** Token for the lexeme in progress, or null in `idle` */
function flush(mode: ScanMode, end: SourceLocation): Token | null {
  switch (mode.kind) {
    case 'idle':
      return null;
    case 'identifier':
      return stringToToken(mode.text, makeSpan(mode.start, end));
    case 'leading-zero':
      return integerToken(0n, mode.start, end);
    case 'integer':
      return integerToken(mode.value, mode.start, end);
    default: {
      const exhaustive: never = mode;
      return exhaustive;
    }
  }
}

function fromIdle(state: LexerState, ch: string, at: SourceLocation): Token[] {
  if (isPunctuation(ch)) {
    return [punctuation(ch, at)];
  }

  if (ch === '0') {
    state.mode = { kind: 'leading-zero', start: at };
    return [];
  }

  if (isDecimalDigit(ch)) {
    state.mode = {
      kind: 'integer',
      value: BigInt(ch),
      radix: 10,
      literal: ch,
      start: at,
    };
    return [];
  }

  if (isIdentifierStart(ch)) {
    state.mode = { kind: 'identifier', text: ch, start: at };
    return [];
  }

  if (isWhitespace(ch)) {
    return [];
  }

  throw unknownCharacter(ch, at);
}

function fromIdentifier(
  state: LexerState,
  mode: IdentifierMode,
  ch: string,
  at: SourceLocation
): Token[] {
  if (isPunctuation(ch)) {
    const name = stringToToken(mode.text, makeSpan(mode.start, at));
    state.mode = IDLE;
    return [name, punctuation(ch, at)];
  }

  if (isIdentifierChar(ch)) {
    state.mode = { ...mode, text: mode.text + ch };
    return [];
  }

  if (isWhitespace(ch)) {
    state.mode = IDLE;
    return [stringToToken(mode.text, makeSpan(mode.start, at))];
  }

  throw unknownCharacter(ch, at);
}

function fromLeadingZero(
  state: LexerState,
  mode: LeadingZeroMode,
  ch: string,
  at: SourceLocation
): Token[] {
  if (isPunctuation(ch)) {
    state.mode = IDLE;
    return [integerToken(0n, mode.start, at), punctuation(ch, at)];
  }

  if (isWhitespace(ch)) {
    state.mode = IDLE;
    return [integerToken(0n, mode.start, at)];
  }

  // Radix prefixes contribute no digit value
  const base = { kind: 'integer', value: 0n, start: mode.start } as const;
  switch (ch) {
    case 'b':
      state.mode = { ...base, radix: 2, literal: '0b' };
      return [];
    case 'o':
      state.mode = { ...base, radix: 8, literal: '0o' };
      return [];
    case 'x':
      state.mode = { ...base, radix: 16, literal: '0x' };
      return [];
  }

  if (isDecimalDigit(ch)) {
    state.mode = {
      ...base,
      value: BigInt(ch),
      radix: 10,
      literal: `0${ch}`,
    };
    return [];
  }

  if (isIntegerChar(ch) || isAlphabetic(ch)) {
    throw unexpectedCharacter(ch, at);
  }

  throw unknownCharacter(ch, at);
}

function fromInteger(
  state: LexerState,
  mode: IntegerMode,
  ch: string,
  at: SourceLocation
): Token[] {
  if (isPunctuation(ch)) {
    state.mode = IDLE;
    return [integerToken(mode.value, mode.start, at), punctuation(ch, at)];
  }

  if (isWhitespace(ch)) {
    state.mode = IDLE;
    return [integerToken(mode.value, mode.start, at)];
  }

  if (isIntegerChar(ch)) {
    // The digit conversion decides range validity, not the arithmetic
    const digit = digitValue(ch, mode.radix);
    if (digit === null) {
      throw unexpectedCharacter(ch, at);
    }

    const value = mode.value * BigInt(mode.radix) + BigInt(digit);
    const literal = mode.literal + ch;
    if (value > MAX_INTEGER) {
      throw new LexerError(
        'TINYC-L003',
        `Integer literal out of range: ${literal}`,
        at,
        { literal }
      );
    }

    state.mode = { ...mode, value, literal };
    return [];
  }

  if (isAlphabetic(ch)) {
    throw unexpectedCharacter(ch, at);
  }

  throw unknownCharacter(ch, at);
}

/**
 * Feed one character at the current position. Updates `state.mode` and
 * returns the tokens it completes, in source order. Does not move the
 * position; the caller advances after a successful step.
 *
 * @throws LexerError when the character is invalid in the current mode
 */
export function consumeChar(state: LexerState, ch: string): Token[] {
  const at = currentLocation(state);
  const mode = state.mode;

  switch (mode.kind) {
    case 'idle':
      return fromIdle(state, ch, at);
    case 'identifier':
      return fromIdentifier(state, mode, ch, at);
    case 'leading-zero':
      return fromLeadingZero(state, mode, ch, at);
    case 'integer':
      return fromInteger(state, mode, ch, at);
    default: {
      const exhaustive: never = mode;
      return exhaustive;
    }
  }
}

/**
 * Flush the lexeme in progress at the end of a line and return to `idle`.
 * Lexemes never continue onto the next line.
 */
export function endLine(state: LexerState): Token[] {
  const token = flush(state.mode, currentLocation(state));
  state.mode = IDLE;
  return token === null ? [] : [token];
}
