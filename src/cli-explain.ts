/**
 * tinyc-lex --explain
 * Registry entries rendered as plain-text help
 */

import { ERROR_REGISTRY, type ErrorExample } from './types.js';

const ERROR_ID = /^TINYC-[LC]\d{3}$/;

function section(title: string, body: string[]): string[] {
  return [`${title}:`, ...body, ''];
}

function exampleLines(example: ErrorExample): string[] {
  return [
    `  ${example.description}`,
    '',
    ...example.code.split('\n').map((line) => `    ${line}`),
    '',
  ];
}

/**
 * Help text for one error ID: heading, cause, resolution and examples.
 * Returns null for a malformed or unregistered ID.
 *
 * @example
 * explainError('TINYC-L003')?.split('\n')[0]
 * // 'TINYC-L003: Integer literal out of range'
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const lines = [`${definition.errorId}: ${definition.description}`, ''];
  if (definition.cause) {
    lines.push(...section('Cause', [`  ${definition.cause}`]));
  }
  if (definition.resolution) {
    lines.push(...section('Resolution', [`  ${definition.resolution}`]));
  }
  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    lines.push('Examples:', ...examples.flatMap(exampleLines));
  }

  return lines.join('\n').trimEnd();
}
