/**
 * CLI Shared Utilities
 * Output and error formatting for tinyc-lex
 */

import { formatTokens, tokensToJson, tokensToYaml } from './format.js';
import {
  formatError as formatTinycError,
  type FormatOptions,
} from './cli-error-formatter.js';
import { TinycError, type Token } from './types.js';
import { VERSION } from './version.js';

export type OutputFormat = 'debug' | 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['debug', 'json', 'yaml'];

/**
 * Render the token sequence for stdout.
 *
 * YAML output ends with its own newline; it is trimmed so every format
 * can be printed with console.log.
 */
export function formatOutput(tokens: readonly Token[], format: OutputFormat): string {
  switch (format) {
    case 'debug':
      return formatTokens(tokens);
    case 'json':
      return tokensToJson(tokens);
    case 'yaml':
      return tokensToYaml(tokens).trimEnd();
  }
}

/**
 * Format any error for stderr.
 *
 * Registry-backed errors go through the error formatter; missing files
 * and other I/O errors get a one-line message.
 */
export function formatError(
  err: Error,
  source?: string,
  options?: Partial<FormatOptions>
): string {
  if (err instanceof TinycError) {
    return formatTinycError(
      err,
      {
        format: options?.format ?? 'human',
        verbose: options?.verbose ?? false,
      },
      source
    );
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 */
export function detectHelpVersionFlag(
  argv: string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

export { VERSION };
