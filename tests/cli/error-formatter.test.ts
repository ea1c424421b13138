/**
 * CLI Tests: Error Formatter
 */

import { describe, expect, it } from 'vitest';
import {
  extractSnippet,
  formatError,
  renderCaretUnderline,
} from '../../src/cli-error-formatter.js';
import { CliError, LexerError } from '../../src/index.js';

const lexerError = new LexerError(
  'TINYC-L001',
  'Encountered unknown character: @',
  { line: 2, column: 3, offset: 9 },
  { char: '@' }
);

describe('cli-error-formatter', () => {
  describe('extractSnippet', () => {
    it('takes two lines of context on each side', () => {
      const snippet = extractSnippet('a\nb\nc\nd\ne\nf', 4);
      expect(snippet.map((l) => l.lineNumber)).toEqual([2, 3, 4, 5, 6]);
      expect(snippet.filter((l) => l.isErrorLine)).toEqual([
        { lineNumber: 4, content: 'd', isErrorLine: true },
      ]);
    });

    it('clamps context at the start of the source', () => {
      const snippet = extractSnippet('a\nb\nc\n', 1);
      expect(snippet.map((l) => l.content)).toEqual(['a', 'b', 'c']);
    });

    it('throws RangeError for a line past the end', () => {
      expect(() => extractSnippet('a\n', 2)).toThrow(RangeError);
    });

    it('returns nothing for empty source', () => {
      expect(extractSnippet('', 1)).toEqual([]);
    });
  });

  describe('renderCaretUnderline', () => {
    it('underlines the span width', () => {
      expect(
        renderCaretUnderline({
          start: { line: 1, column: 3, offset: 2 },
          end: { line: 1, column: 6, offset: 5 },
        })
      ).toBe('  ^^^');
    });

    it('draws a single caret for an empty span', () => {
      const at = { line: 1, column: 1, offset: 0 };
      expect(renderCaretUnderline({ start: at, end: at })).toBe('^');
    });

    it('throws RangeError when start follows end', () => {
      expect(() =>
        renderCaretUnderline({
          start: { line: 2, column: 1, offset: 5 },
          end: { line: 1, column: 1, offset: 0 },
        })
      ).toThrow(RangeError);
    });
  });

  describe('formatError', () => {
    it('formats human output without source', () => {
      expect(formatError(lexerError, { format: 'human', verbose: false })).toBe(
        'error[TINYC-L001]: Encountered unknown character: @\n  --> 2:3'
      );
    });

    it('adds the help anchor when verbose', () => {
      const output = formatError(lexerError, { format: 'human', verbose: true });
      expect(output.split('\n').at(-1)).toBe('   = see: docs/errors.md#tinyc-l001');
    });

    it('includes neighbouring lines in the snippet', () => {
      const output = formatError(
        lexerError,
        { format: 'human', verbose: false },
        'Int x;\n  @\nReturn x;\n'
      );
      expect(output.split('\n').slice(2)).toEqual([
        '   |',
        ' 1 | Int x;',
        ' 2 |   @',
        '   |   ^',
        ' 3 | Return x;',
        '   |',
      ]);
    });

    it('formats JSON as an LSP diagnostic', () => {
      expect(
        JSON.parse(formatError(lexerError, { format: 'json', verbose: true }))
      ).toEqual({
        errorId: 'TINYC-L001',
        severity: 1,
        message: 'Encountered unknown character: @',
        range: {
          start: { line: 1, character: 2 },
          end: { line: 1, character: 3 },
        },
        source: 'tinyc-lex',
        code: 'TINYC-L001',
        helpUrl: 'docs/errors.md#tinyc-l001',
      });
    });

    it('formats compact output on one line', () => {
      expect(formatError(lexerError, { format: 'compact', verbose: false })).toBe(
        '[TINYC-L001] Encountered unknown character: @ at 2:3'
      );
    });

    it('omits location for errors without one', () => {
      const err = new CliError('TINYC-C002', { option: '--fast' });
      expect(formatError(err, { format: 'compact', verbose: false })).toBe(
        '[TINYC-C002] Unknown option: --fast'
      );
    });
  });
});
