/**
 * Error Taxonomy Tests
 * Registry lookup, template rendering, error classes
 */

import { describe, expect, it } from 'vitest';
import {
  CliError,
  createError,
  ERROR_REGISTRY,
  getHelpUrl,
  LexerError,
  renderMessage,
  TinycError,
  type SourceLocation,
} from '../../src/index.js';

const location: SourceLocation = { line: 1, column: 4, offset: 3 };

describe('Error taxonomy', () => {
  describe('ERROR_REGISTRY', () => {
    it('holds the lexer and cli errors', () => {
      expect([...ERROR_REGISTRY.entries()].map(([id]) => id)).toEqual([
        'TINYC-L001',
        'TINYC-L002',
        'TINYC-L003',
        'TINYC-C001',
        'TINYC-C002',
        'TINYC-C003',
      ]);
      expect(ERROR_REGISTRY.size).toBe(6);
    });

    it('documents every entry', () => {
      for (const [, definition] of ERROR_REGISTRY.entries()) {
        expect(definition.description.length).toBeLessThanOrEqual(50);
        expect(definition.cause).toBeDefined();
        expect(definition.resolution).toBeDefined();
      }
    });

    it('returns undefined for unknown IDs', () => {
      expect(ERROR_REGISTRY.get('TINYC-L999')).toBeUndefined();
      expect(ERROR_REGISTRY.has('TINYC-L999')).toBe(false);
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders', () => {
      expect(renderMessage('Unexpected character: {char}', { char: '9' })).toBe(
        'Unexpected character: 9'
      );
    });

    it('renders missing values as empty strings', () => {
      expect(
        renderMessage('Invalid {option} value: {value}', { option: '--format' })
      ).toBe('Invalid --format value: ');
    });

    it('returns templates with an unclosed brace unchanged', () => {
      expect(renderMessage('broken {char', { char: 'x' })).toBe('broken {char');
    });
  });

  describe('getHelpUrl', () => {
    it('builds a lowercase docs anchor', () => {
      expect(getHelpUrl('TINYC-L002')).toBe('docs/errors.md#tinyc-l002');
    });

    it('returns empty string for malformed IDs', () => {
      expect(getHelpUrl('L002')).toBe('');
      expect(getHelpUrl('TINYC-X001')).toBe('');
    });
  });

  describe('createError', () => {
    it('renders the registry template', () => {
      const err = createError('TINYC-L002', { char: '9' }, location);
      expect(err).toBeInstanceOf(TinycError);
      expect(err.message).toBe('Unexpected character: 9 at 1:4');
      expect(err.helpUrl).toBe('docs/errors.md#tinyc-l002');
    });

    it('throws TypeError for unknown IDs', () => {
      expect(() => createError('TINYC-X999', {})).toThrow(
        'Unknown error ID: TINYC-X999'
      );
    });
  });

  describe('TinycError', () => {
    it('strips the location suffix from structured data', () => {
      const err = createError('TINYC-L001', { char: '@' }, location);
      expect(err.toData()).toEqual({
        errorId: 'TINYC-L001',
        helpUrl: 'docs/errors.md#tinyc-l001',
        message: 'Encountered unknown character: @',
        location,
        context: { char: '@' },
      });
    });
  });

  describe('LexerError', () => {
    it('carries errorId, location and context', () => {
      const err = new LexerError(
        'TINYC-L002',
        'Unexpected character: 9',
        location,
        { char: '9' }
      );
      expect(err.name).toBe('LexerError');
      expect(err.errorId).toBe('TINYC-L002');
      expect(err.message).toBe('Unexpected character: 9 at 1:4');
      expect(err.location).toEqual(location);
      expect(err.context).toEqual({ char: '9' });
    });

    it('throws TypeError for unknown IDs', () => {
      expect(() => new LexerError('TINYC-X999', 'x', location)).toThrow(
        'Unknown error ID: TINYC-X999'
      );
    });

    it('throws TypeError for IDs outside the lexer category', () => {
      expect(() => new LexerError('TINYC-C001', 'x', location)).toThrow(
        'Expected lexer error ID, got: TINYC-C001'
      );
    });
  });

  describe('CliError', () => {
    it('renders its message from the registry', () => {
      const err = new CliError('TINYC-C002', { option: '--fast' });
      expect(err.name).toBe('CliError');
      expect(err.message).toBe('Unknown option: --fast');
      expect(err.location).toBeUndefined();
    });

    it('throws TypeError for IDs outside the cli category', () => {
      expect(() => new CliError('TINYC-L001')).toThrow(
        'Expected cli error ID, got: TINYC-L001'
      );
    });
  });
});
