/**
 * Tokenizer
 * Line-oriented driver for the scanner state machine
 */

import { Readable } from 'node:stream';
import type { Token } from '../types.js';
import { LexerError } from './errors.js';
import {
  advance,
  advanceLine,
  createLexerState,
  type LexerState,
} from './state.js';
import { consumeChar, endLine } from './transitions.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Emitted after each token is appended */
export interface TokenEvent {
  /** Token appended */
  token: Token;
  /** Position of the token in the output (0-based) */
  index: number;
}

/** Emitted after each line has been scanned and flushed */
export interface LineEvent {
  /** Line number (1-based) */
  line: number;
  /** Tokens produced by this line */
  tokenCount: number;
}

/** Emitted before a lexical error is thrown */
export interface LexErrorEvent {
  error: LexerError;
}

export interface TokenizerCallbacks {
  onToken?: (event: TokenEvent) => void;
  onLine?: (event: LineEvent) => void;
  onError?: (event: LexErrorEvent) => void;
}

export interface TokenizeOptions {
  callbacks?: TokenizerCallbacks;
}

// ============================================================
// TOKENIZER
// ============================================================

/**
 * Owns the scanner state for one input stream. Feed it lines in order,
 * then call `finish()` for the token sequence.
 */
export class Tokenizer {
  private readonly state: LexerState = createLexerState();
  private readonly tokens: Token[] = [];
  private readonly callbacks: TokenizerCallbacks;
  private finished = false;

  constructor(options: TokenizeOptions = {}) {
    this.callbacks = options.callbacks ?? {};
  }

  /**
   * Scan one line (without its terminator) and flush any pending lexeme.
   *
   * @param breakLength - Code points in the terminator that followed the
   *   line: 1 for `\n`, 2 for `\r\n`
   */
  feedLine(line: string, breakLength: number = 1): void {
    if (this.finished) {
      throw new Error('Tokenizer already finished');
    }

    const before = this.tokens.length;
    try {
      for (const ch of line) {
        this.push(consumeChar(this.state, ch));
        advance(this.state);
      }
      this.push(endLine(this.state));
    } catch (err) {
      if (err instanceof LexerError) {
        this.callbacks.onError?.({ error: err });
      }
      throw err;
    }

    this.callbacks.onLine?.({
      line: this.state.line,
      tokenCount: this.tokens.length - before,
    });
    advanceLine(this.state, breakLength);
  }

  /** Token sequence for every line fed so far */
  finish(): Token[] {
    this.finished = true;
    return this.tokens;
  }

  private push(emitted: Token[]): void {
    for (const token of emitted) {
      this.tokens.push(token);
      this.callbacks.onToken?.({ token, index: this.tokens.length - 1 });
    }
  }
}

/** One line of source text and the length of the terminator after it */
interface SourceLine {
  readonly text: string;
  readonly breakLength: number;
}

/** `raw` is a line still carrying any `\r`; `terminated` if `\n` followed it */
function toSourceLine(raw: string, terminated: boolean): SourceLine {
  const hasReturn = raw.endsWith('\r');
  return {
    text: hasReturn ? raw.slice(0, -1) : raw,
    breakLength: (hasReturn ? 1 : 0) + (terminated ? 1 : 0),
  };
}

function splitSourceLines(source: string): SourceLine[] {
  if (source === '') {
    return [];
  }
  const lines = source.split('\n');
  const last = lines.pop() ?? '';
  const result = lines.map((line) => toSourceLine(line, true));
  if (last !== '') {
    result.push(toSourceLine(last, false));
  }
  return result;
}

/**
 * Split source text into lines: `\n` separates lines, one trailing `\r`
 * is dropped from each, and a final terminator does not start a new line.
 */
export function splitLines(source: string): string[] {
  return splitSourceLines(source).map((line) => line.text);
}

/**
 * Tokenize source text or a sequence of lines.
 *
 * @throws LexerError on the first invalid character; no tokens are returned
 */
export function tokenize(
  input: string | Iterable<string>,
  options?: TokenizeOptions
): Token[] {
  const tokenizer = new Tokenizer(options);

  if (typeof input === 'string') {
    for (const line of splitSourceLines(input)) {
      tokenizer.feedLine(line.text, line.breakLength);
    }
  } else {
    for (const line of input) {
      tokenizer.feedLine(line);
    }
  }

  return tokenizer.finish();
}

async function* readSourceLines(input: Readable): AsyncGenerator<SourceLine> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let pending = '';

  for await (const chunk of input) {
    pending += Buffer.isBuffer(chunk)
      ? decoder.decode(chunk, { stream: true })
      : String(chunk);

    const lines = pending.split('\n');
    pending = lines.pop() ?? '';
    for (const line of lines) {
      yield toSourceLine(line, true);
    }
  }

  pending += decoder.decode();
  if (pending !== '') {
    yield toSourceLine(pending, false);
  }
}

/**
 * Read a byte or text stream as lines, with the same line rules as
 * `splitLines`. Bytes must be valid UTF-8.
 *
 * @throws TypeError from the decoder on invalid UTF-8; stream errors
 *   propagate unchanged
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  for await (const line of readSourceLines(input)) {
    yield line.text;
  }
}

/**
 * Tokenize a line-oriented stream: a Node.js Readable of UTF-8 bytes or
 * text, or an async sequence of lines. Read and decode errors reject
 * unchanged; lexical errors reject with LexerError.
 */
export async function tokenizeStream(
  input: Readable | AsyncIterable<string>,
  options?: TokenizeOptions
): Promise<Token[]> {
  const tokenizer = new Tokenizer(options);

  if (input instanceof Readable) {
    for await (const line of readSourceLines(input)) {
      tokenizer.feedLine(line.text, line.breakLength);
    }
  } else {
    for await (const line of input) {
      tokenizer.feedLine(line);
    }
  }

  return tokenizer.finish();
}
