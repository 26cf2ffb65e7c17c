import {
  formatGroupVersionKind,
  type Diagnostic,
  type GroupVersionKind,
  type ResourceIdentity,
} from '@kubeimport/types';
import {
  AssemblyError,
  CanceledError,
  ConversionError,
  FetchError,
  ImportError,
  ParseError,
  ResolutionError,
  SchemaError,
  describeCause,
} from '../errors.js';
import { formatImportId } from '../identifier/parser.js';

/**
 * Pipeline stage an import failed in
 */
export type ImportFailureKind =
  | 'parse'
  | 'resource-type'
  | 'resolution'
  | 'fetch'
  | 'canceled'
  | 'schema'
  | 'conversion'
  | 'assembly'
  | 'unexpected';

export interface DiagnosticContext {
  /** Identifier as supplied by the caller */
  id?: string;
  identity?: ResourceIdentity;
}

/**
 * Maps a pipeline failure to the diagnostic shown to the operator
 */
export function toDiagnostic(error: unknown, context: DiagnosticContext = {}): Diagnostic {
  return {
    severity: 'error',
    summary: summarize(error, context),
    detail: detailOf(error),
  };
}

export function classifyFailure(error: unknown): ImportFailureKind {
  if (error instanceof ParseError) {
    return 'parse';
  }
  if (error instanceof ResolutionError) {
    return error.reason === 'unknown-type-name' ? 'resource-type' : 'resolution';
  }
  if (error instanceof FetchError) {
    return 'fetch';
  }
  if (error instanceof CanceledError) {
    return 'canceled';
  }
  if (error instanceof SchemaError) {
    return 'schema';
  }
  if (error instanceof ConversionError) {
    return 'conversion';
  }
  if (error instanceof AssemblyError) {
    return 'assembly';
  }
  return 'unexpected';
}

function summarize(error: unknown, context: DiagnosticContext): string {
  if (error instanceof ParseError) {
    return 'Failed to parse import ID';
  }
  if (error instanceof ResolutionError) {
    switch (error.reason) {
      case 'unknown-type-name':
        return 'Failed to determine resource type';
      case 'unknown-type':
        return `Failed to resolve resource type ${describeType(error.gvk ?? context.identity)}`;
      case 'unreachable':
        return 'Failed to reach the type registry';
    }
  }
  if (error instanceof FetchError) {
    const target = context.identity ? formatImportId(context.identity) : (context.id ?? 'object');
    return `Failed to get resource ${target} from API`;
  }
  if (error instanceof CanceledError) {
    return 'Import canceled';
  }
  if (error instanceof SchemaError) {
    return `Failed to determine resource type from GVK: ${describeType(error.gvk ?? context.identity)}`;
  }
  if (error instanceof ConversionError) {
    return 'Failed to convert unstructured object to typed value';
  }
  if (error instanceof AssemblyError) {
    return 'Failed to construct imported state';
  }
  return 'Unexpected error during import';
}

function detailOf(error: unknown): string {
  const message = describeCause(error);
  if (error instanceof ImportError && error.suggestion) {
    return `${message}\n${error.suggestion}`;
  }
  return message;
}

function describeType(gvk: GroupVersionKind | undefined): string {
  return gvk ? formatGroupVersionKind(gvk) : 'unknown';
}
