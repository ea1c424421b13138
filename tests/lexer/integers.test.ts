/**
 * Lexer Tests: Integer Literals
 * Decimal literals, radix prefixes, digit validation and range
 */

import { describe, expect, it } from 'vitest';
import { LexerError, MAX_INTEGER, tokenize } from '../../src/index.js';
import { captureError, lex } from '../helpers/tokens.js';

describe('Lexer: Integer Literals', () => {
  describe('Decimal', () => {
    it('reads zero and multi-digit values', () => {
      expect(lex('0')).toBe('[Integer(0)]');
      expect(lex('42')).toBe('[Integer(42)]');
    });

    it('reads leading zeros as decimal', () => {
      expect(lex('007')).toBe('[Integer(7)]');
    });

    it('ends at whitespace and punctuation', () => {
      expect(lex('1 2;3')).toBe(
        '[Integer(1), Integer(2), Semicolon, Integer(3)]'
      );
      expect(lex('0;')).toBe('[Integer(0), Semicolon]');
    });
  });

  describe('Radix prefixes', () => {
    it('reads hexadecimal with either letter case', () => {
      expect(lex('0x1F')).toBe('[Integer(31)]');
      expect(lex('0xff')).toBe('[Integer(255)]');
    });

    it('reads binary', () => {
      expect(lex('0b101')).toBe('[Integer(5)]');
    });

    it('reads octal', () => {
      expect(lex('0o17')).toBe('[Integer(15)]');
      expect(lex('0o77')).toBe('[Integer(63)]');
    });

    it('reads a bare prefix as zero', () => {
      expect(lex('0b')).toBe('[Integer(0)]');
      expect(lex('0x;')).toBe('[Integer(0), Semicolon]');
    });

    it('carries the value as a bigint', () => {
      const [token] = tokenize('0x2A');
      expect(token).toMatchObject({ type: 'INTEGER', value: 42n });
    });
  });

  describe('Digit validation', () => {
    it.each([
      ['0b2', '2', 3],
      ['0b9', '9', 3],
      ['0o8', '8', 3],
      ['12a', 'a', 3],
      ['0xo', 'o', 3],
    ])('rejects %s: digit out of range for the radix', (source, ch, column) => {
      const err = captureError(() => tokenize(source));
      expect(err).toBeInstanceOf(LexerError);
      expect(err).toMatchObject({
        errorId: 'TINYC-L002',
        message: `Unexpected character: ${ch} at 1:${column}`,
      });
    });

    it.each([
      ['1g', 'g'],
      ['0c', 'c'],
      ['0X', 'X'],
      ['0xg', 'g'],
    ])('rejects %s: letter that is not a digit or prefix', (source, ch) => {
      expect(captureError(() => tokenize(source))).toMatchObject({
        errorId: 'TINYC-L002',
        context: { char: ch },
      });
    });

    it.each([
      ['1-', '-'],
      ['1_000', '_'],
      ['0_', '_'],
    ])('rejects %s: character that cannot continue an integer', (source, ch) => {
      expect(captureError(() => tokenize(source))).toMatchObject({
        errorId: 'TINYC-L001',
        context: { char: ch },
      });
    });
  });

  describe('Range', () => {
    it('accepts the largest unsigned 64-bit value', () => {
      expect(lex('18446744073709551615')).toBe('[Integer(18446744073709551615)]');
      const [token] = tokenize('0xffffffffffffffff');
      expect(token).toMatchObject({ value: MAX_INTEGER });
    });

    it('rejects a decimal literal past the 64-bit range', () => {
      const err = captureError(() => tokenize('18446744073709551616'));
      expect(err).toBeInstanceOf(LexerError);
      expect(err).toMatchObject({
        errorId: 'TINYC-L003',
        message:
          'Integer literal out of range: 18446744073709551616 at 1:20',
        context: { literal: '18446744073709551616' },
      });
    });

    it('rejects a hexadecimal literal past the 64-bit range', () => {
      expect(captureError(() => tokenize('0x10000000000000000'))).toMatchObject({
        errorId: 'TINYC-L003',
        location: { line: 1, column: 19, offset: 18 },
        context: { literal: '0x10000000000000000' },
      });
    });
  });
});
