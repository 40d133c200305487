/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isConcordError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode = 'INVALID_ARGUMENT' | 'UNKNOWN_COMMAND' | 'REQUEST_REJECTED' | 'STORAGE_ERROR';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `concord help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `concord help` to list the available commands.',
  REQUEST_REJECTED: 'Run `concord objectives` and `concord conflicts` to see the vocabulary and its trade-offs.',
  STORAGE_ERROR: 'Check the --db path, or drop --db to keep state in memory.',
};

/** Process exit codes. */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  usage: 2,
  rejected: 3,
} as const;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    const lines = [`Error [${error.code}]: ${error.message}`];
    if (error.suggestion) lines.push('', `Suggestion: ${error.suggestion}`);
    return lines.join('\n');
  }
  if (isConcordError(error)) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    if (error.message.includes('ENOENT')) {
      return `Error: File or directory not found: ${error.message}`;
    }
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

export function formatErrorJson(error: unknown): string {
  if (error instanceof CliError) {
    return JSON.stringify({ error: { code: error.code, message: error.message, suggestion: error.suggestion } });
  }
  if (isConcordError(error)) {
    const { code, message, details } = error.toJSON();
    return JSON.stringify({ error: { code, message, details } });
  }
  return JSON.stringify({ error: { code: 'INTERNAL', message: error instanceof Error ? error.message : String(error) } });
}

export function getExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.code === 'INVALID_ARGUMENT' || error.code === 'UNKNOWN_COMMAND') return EXIT_CODES.usage;
    if (error.code === 'REQUEST_REJECTED') return EXIT_CODES.rejected;
    return EXIT_CODES.failure;
  }
  if (isConcordError(error)) {
    if (error.code === 'VALIDATION_ERROR') return EXIT_CODES.usage;
    if (error.code === 'UNKNOWN_OBJECTIVE' || error.code === 'UNRESOLVABLE_CONFLICT') return EXIT_CODES.rejected;
  }
  return EXIT_CODES.failure;
}
