import type { ExitCode } from './types.js';

export interface StructuredError {
  code: string;
  message: string;
  suggestion?: string;
  exitCode: ExitCode;
}

export class CliError extends Error implements StructuredError {
  code: string;

  suggestion?: string;

  exitCode: ExitCode;

  constructor(error: StructuredError, options?: { cause?: unknown }) {
    super(error.message, { cause: options?.cause });
    this.name = 'CliError';
    this.code = error.code;
    this.suggestion = error.suggestion;
    this.exitCode = error.exitCode;
  }
}

export function isCliError(value: unknown): value is CliError {
  return value instanceof CliError;
}
