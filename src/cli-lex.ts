#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements parseArgs(), readSource(), lexSource() and main() for the
 * tinyc-lex binary.
 * Reads one source file (or stdin), tokenizes it and prints the tokens.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { tokenize } from './lexer/index.js';
import { CliError, type Token } from './types.js';
import type { ErrorFormat } from './cli-error-formatter.js';
import {
  detectHelpVersionFlag,
  formatError,
  formatOutput,
  OUTPUT_FORMATS,
  VERSION,
  type OutputFormat,
} from './cli-shared.js';
import { explainError } from './cli-explain.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'lex';
      file: string;
      format: OutputFormat;
      errors: ErrorFormat;
      verbose: boolean;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const ERROR_FORMATS: readonly ErrorFormat[] = ['human', 'json', 'compact'];

/** Flags followed by a value */
const VALUE_FLAGS = ['--format', '--errors', '--explain'];

const KNOWN_FLAGS = ['--help', '-h', '--version', '-v', '--verbose', ...VALUE_FLAGS];

function readChoice<T extends string>(
  option: string,
  value: string | undefined,
  allowed: readonly T[]
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CliError('TINYC-C003', {
      option,
      value: value ?? '',
      allowed: allowed.join(', '),
    });
  }
  return match;
}

/**
 * Parse command-line arguments into a structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws CliError on unknown options, bad option values or a missing file
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flag = detectHelpVersionFlag(argv);
  if (flag) {
    return flag;
  }

  let format: OutputFormat = 'debug';
  let errors: ErrorFormat = 'human';
  let verbose = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new CliError('TINYC-C002', { option: arg });
      }

      switch (arg) {
        case '--verbose':
          verbose = true;
          break;
        case '--format':
          format = readChoice(arg, argv[++i], OUTPUT_FORMATS);
          break;
        case '--errors':
          errors = readChoice(arg, argv[++i], ERROR_FORMATS);
          break;
        case '--explain': {
          const errorId = argv[++i];
          if (errorId === undefined) {
            throw new CliError('TINYC-C003', {
              option: arg,
              value: '',
              allowed: 'an error ID such as TINYC-L001',
            });
          }
          return { mode: 'explain', errorId };
        }
      }
      continue;
    }

    positional.push(arg);
  }

  const file = positional[0];
  if (file === undefined) {
    throw new CliError('TINYC-C001');
  }

  return { mode: 'lex', file, format, errors, verbose };
}

/**
 * Read a UTF-8 source file, or stdin for '-'
 *
 * @throws TypeError from the decoder when the bytes are not valid UTF-8
 */
export async function readSource(file: string): Promise<string> {
  const bytes = file === '-' ? fsSync.readFileSync(0) : await fs.readFile(file);
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/** Tokenize source text, reporting per-line progress on stderr when verbose */
export function lexSource(source: string, options?: { verbose?: boolean }): Token[] {
  return tokenize(source, {
    callbacks: options?.verbose
      ? {
          onLine: ({ line, tokenCount }) =>
            console.error(`line ${line}: ${tokenCount} tokens`),
        }
      : {},
  });
}

const USAGE = `Usage:
  tinyc-lex <file>                 Tokenize a source file
  tinyc-lex -                      Read source from stdin
  tinyc-lex --help                 Show this help message
  tinyc-lex --version              Show version information
  tinyc-lex --explain TINYC-XXXX   Show error documentation

Options:
  --format <format>   Token output: debug, json, yaml (default: debug)
  --errors <format>   Error output: human, json, compact (default: human)
  --verbose           Report per-line progress and error help anchors

Examples:
  tinyc-lex main.tc
  tinyc-lex --format json main.tc
  tinyc-lex --explain TINYC-L002
  echo "Return 0;" | tinyc-lex -`;

/**
 * Entry point for the tinyc-lex binary
 *
 * Writes tokens to stdout and errors to stderr.
 *
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  let source: string | undefined;
  let errors: ErrorFormat = 'human';
  let verbose = false;

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          console.error(
            'Error ID must be in format TINYC-{L|C}{3-digit}, e.g., TINYC-L001'
          );
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'lex': {
        errors = parsed.errors;
        verbose = parsed.verbose;

        source = await readSource(parsed.file);
        const tokens = lexSource(source, { verbose });
        console.log(formatOutput(tokens, parsed.format));
        return 0;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source, { format: errors, verbose }));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
