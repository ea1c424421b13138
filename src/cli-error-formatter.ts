/**
 * CLI Error Formatter
 * Format tinyc errors for human-readable, JSON, or compact output
 */

import type { SourceSpan, TinycError } from './types.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type ErrorFormat = 'human' | 'json' | 'compact';

export interface FormatOptions {
  readonly format: ErrorFormat;
  /** Include help anchors */
  readonly verbose: boolean;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Source lines around the error line, 1-based.
 *
 * @throws {RangeError} When the line is outside the source
 */
export function extractSnippet(
  source: string,
  line: number,
  contextLines: number = 2
): SnippetLine[] {
  if (source === '') {
    return [];
  }

  const lines = source.split('\n').map((l) => l.replace(/\r$/, ''));
  // A final terminator does not start another line
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  if (line < 1 || line > lines.length) {
    throw new RangeError('Line exceeds source bounds');
  }

  const firstLine = Math.max(1, line - contextLines);
  const lastLine = Math.min(lines.length, line + contextLines);

  const snippet: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippet.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum === line,
    });
  }
  return snippet;
}

/**
 * Caret underline for a span on its first line. Columns are 1-based.
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(span: SourceSpan): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const width =
    span.start.line === span.end.line
      ? span.end.column - span.start.column
      : 1;
  return ' '.repeat(span.start.column - 1) + '^'.repeat(Math.max(1, width));
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an error for stderr.
 *
 * @param source - Source text, used for the human snippet when present
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: TinycError,
  options: FormatOptions,
  source?: string
): string {
  switch (options.format) {
    case 'human':
      return formatErrorHuman(error, options, source);
    case 'json':
      return formatErrorJson(error, options);
    case 'compact':
      return formatErrorCompact(error);
    default: {
      const unknown: never = options.format;
      throw new TypeError(`Unknown format: ${String(unknown)}`);
    }
  }
}

/**
 * Human-readable format:
 * ```
 * error[TINYC-L002]: Unexpected character: 2
 *   --> 1:10
 *    |
 *  1 | Return 0b2;
 *    |          ^
 *    |
 * ```
 */
function formatErrorHuman(
  error: TinycError,
  options: FormatOptions,
  source: string | undefined
): string {
  const data = error.toData();
  const lines: string[] = [`error[${data.errorId}]: ${data.message}`];

  const location = data.location;
  if (location) {
    lines.push(`  --> ${location.line}:${location.column}`);

    const snippet =
      source !== undefined ? safeSnippet(source, location.line) : [];
    if (snippet.length > 0) {
      const width = String(
        Math.max(...snippet.map((l) => l.lineNumber))
      ).length;
      const gutter = ' '.repeat(width);

      lines.push(`${gutter}  |`);
      for (const line of snippet) {
        lines.push(
          ` ${String(line.lineNumber).padStart(width, ' ')} | ${line.content}`
        );
        if (line.isErrorLine) {
          const caret = renderCaretUnderline({
            start: location,
            end: location,
          });
          lines.push(` ${gutter} | ${caret}`);
        }
      }
      lines.push(`${gutter}  |`);
    }
  }

  if (options.verbose && data.helpUrl) {
    lines.push(`   = see: ${data.helpUrl}`);
  }

  return lines.join('\n');
}

/** Snippet for the error line, or none when the line is not in `source` */
function safeSnippet(source: string, line: number): SnippetLine[] {
  try {
    return extractSnippet(source, line);
  } catch (err) {
    if (err instanceof RangeError) {
      return [];
    }
    throw err;
  }
}

/**
 * JSON format (LSP Diagnostic compatible).
 */
function formatErrorJson(error: TinycError, options: FormatOptions): string {
  const data = error.toData();
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    range?: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
    helpUrl?: string;
  } = {
    errorId: data.errorId,
    severity: 1, // LSP: 1 = Error
    message: data.message,
    source: 'tinyc-lex',
    code: data.errorId,
  };

  if (data.location) {
    // LSP positions are 0-based
    const line = data.location.line - 1;
    const character = data.location.column - 1;
    diagnostic.range = {
      start: { line, character },
      end: { line, character: character + 1 },
    };
  }

  if (options.verbose && data.helpUrl) {
    diagnostic.helpUrl = data.helpUrl;
  }

  return JSON.stringify(diagnostic, null, 2);
}

/**
 * Compact format (single line for CI).
 */
function formatErrorCompact(error: TinycError): string {
  const data = error.toData();
  const parts: string[] = [`[${data.errorId}]`, data.message];

  if (data.location) {
    parts.push(`at ${data.location.line}:${data.location.column}`);
  }

  return parts.join(' ');
}
