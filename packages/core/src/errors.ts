/**
 * Error types raised by the import pipeline.
 */

import type { AttributePath, GroupVersionKind } from '@kubeimport/types';

/**
 * Base class of every import failure
 */
export class ImportError extends Error {
  readonly errorCause?: unknown;
  /** Hint telling the operator what to do next */
  readonly suggestion?: string;

  constructor(message: string, options?: { cause?: unknown; suggestion?: string }) {
    super(message);
    this.name = 'ImportError';
    if (options?.cause !== undefined) {
      this.errorCause = options.cause;
    }
    this.suggestion = options?.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed import identifier
 */
export class ParseError extends ImportError {
  /** The identifier as supplied */
  readonly input: string;

  constructor(message: string, options: { input: string; suggestion?: string }) {
    super(message, { suggestion: options.suggestion });
    this.name = 'ParseError';
    this.input = options.input;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ResolutionFailure = 'unknown-type' | 'unreachable' | 'unknown-type-name';

export interface ResolutionErrorOptions {
  reason: ResolutionFailure;
  gvk?: GroupVersionKind;
  cause?: unknown;
  suggestion?: string;
}

/**
 * The type registry does not know the type, or could not be reached
 */
export class ResolutionError extends ImportError {
  readonly reason: ResolutionFailure;
  readonly gvk?: GroupVersionKind;

  constructor(message: string, options: ResolutionErrorOptions) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'ResolutionError';
    this.reason = options.reason;
    this.gvk = options.gvk;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FetchFailure = 'not-found' | 'invalid-name' | 'transport';

/**
 * The live object could not be read
 */
export class FetchError extends ImportError {
  readonly reason: FetchFailure;
  /** HTTP status, when the store answered */
  readonly status?: number;

  constructor(
    message: string,
    options: { reason: FetchFailure; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.reason = options.reason;
    this.status = options.status;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The caller aborted the import
 */
export class CanceledError extends ImportError {
  constructor(message = 'import was canceled', options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'CanceledError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * No usable schema for the type
 */
export class SchemaError extends ImportError {
  readonly gvk?: GroupVersionKind;
  /** Location inside a schema document, for malformed definitions */
  readonly path?: string;

  constructor(
    message: string,
    options: { gvk?: GroupVersionKind; path?: string; cause?: unknown; suggestion?: string } = {},
  ) {
    super(message, { cause: options.cause, suggestion: options.suggestion });
    this.name = 'SchemaError';
    this.gvk = options.gvk;
    this.path = options.path;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Live data cannot be represented in the schema's shape
 */
export class ConversionError extends ImportError {
  readonly path: AttributePath;

  constructor(message: string, options: { path: AttributePath; cause?: unknown }) {
    const location = options.path.isRoot ? '(root)' : options.path.toString();
    super(`${location}: ${message}`, { cause: options.cause });
    this.name = 'ConversionError';
    this.path = options.path;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Broken invariant while packaging the imported state
 */
export class AssemblyError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'AssemblyError';

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isImportError(value: unknown): value is ImportError {
  return value instanceof ImportError;
}

/**
 * Message of an unknown thrown value
 */
export function describeCause(error: unknown): string {
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  return String(error);
}
