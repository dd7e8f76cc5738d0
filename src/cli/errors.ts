/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ConfigError, isBibsearchError } from '../core/errors.js';

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

export type CliErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'INVALID_ARGUMENT'
  | 'TERMINAL_REQUIRED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  CONFIG_NOT_FOUND: 'You can generate an example config file using option -g.\nFor more information, please use option -h for help.',
  CONFIG_INVALID: 'Fix the entries listed above, or regenerate an example with `bibsearch -g -f <file>`.',
  INVALID_ARGUMENT: 'Run `bibsearch --help` for usage information.',
  TERMINAL_REQUIRED: 'Run bibsearch from an interactive terminal.',
};

const EXIT_CODES: Record<CliErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID: 2,
  INVALID_ARGUMENT: 2,
  TERMINAL_REQUIRED: 3,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/** Lift a configuration failure into a CLI error carrying its issue list. */
export function fromConfigError(error: ConfigError): CliError {
  return createError('CONFIG_INVALID', error.message, { path: error.configPath, issues: error.issues });
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    const lines = [`Error [${error.code}]: ${error.message}`];
    const issues = error.details?.issues;
    if (Array.isArray(issues)) {
      for (const issue of issues) lines.push(`  - ${String(issue)}`);
    }
    if (error.suggestion) lines.push('', error.suggestion);
    return lines.join('\n');
  }
  if (error instanceof ConfigError) {
    return formatError(fromConfigError(error));
  }
  if (isBibsearchError(error)) {
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

export function getExitCode(error: unknown): number {
  if (error instanceof CliError) return EXIT_CODES[error.code];
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_INVALID;
  return 1;
}
