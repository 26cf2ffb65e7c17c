/**
 * Import of a live object into managed state
 *
 * parse -> resolve type -> (fetch object | resolve schema) -> filter
 *   -> convert -> backfill -> assemble
 *
 * @example
 * ```typescript
 * const result = await importResourceState(
 *   { typeName: 'kubernetes_manifest', id: 'apps/v1#Deployment#default#web' },
 *   { typeRegistry, objectStore, schemaResolver },
 *   { signal: AbortSignal.timeout(30_000) },
 * );
 * if (hasErrors(result.diagnostics)) {
 *   // report
 * }
 * ```
 */

import {
  formatGroupVersionKind,
  type Diagnostic,
  type EndpointDescriptor,
  type JsonObject,
  type ObjectSchema,
  type ResourceIdentity,
} from '@kubeimport/types';
import { backfillUnknowns, narrowTopLevelPending } from '../convert/backfill.js';
import { toTypedValue } from '../convert/to-value.js';
import { fetchObject, type ObjectStore } from '../fetcher/object-fetcher.js';
import { removeServerSideFields } from '../filter/server-fields.js';
import { formatImportId, parseImportId } from '../identifier/parser.js';
import { resolveType, type TypeRegistry } from '../resolver/type-resolver.js';
import type { SchemaResolver } from '../schema/resolver.js';
import { createLinkedAbortController, throwIfAborted } from '../utils/abort.js';
import { assembleImportedState, serializeImportedState, type SerializedState } from './assembler.js';
import { classifyFailure, toDiagnostic, type ImportFailureKind } from './diagnostics.js';
import { getResourceType } from './resource-types.js';

export interface ImportRequest {
  /** Resource type receiving the state, e.g. "kubernetes_manifest" */
  typeName: string;
  /** Import identifier, see {@link parseImportId} */
  id: string;
}

export interface ImportDependencies {
  typeRegistry: TypeRegistry;
  objectStore: ObjectStore;
  schemaResolver: SchemaResolver;
}

export interface ImportOptions {
  signal?: AbortSignal;
  logger?: Console;
}

export interface ImportedResource {
  typeName: string;
  state: SerializedState;
}

export interface ImportResult {
  diagnostics: Diagnostic[];
  importedResources: ImportedResource[];
  /** Set when the import failed */
  failure?: ImportFailureKind;
}

/**
 * Imports one live object. Never rejects: every failure becomes a single
 * error diagnostic and the result then holds no imported resource.
 */
export async function importResourceState(
  request: ImportRequest,
  deps: ImportDependencies,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const { signal, logger } = options;
  const diagnostics: Diagnostic[] = [];
  let identity: ResourceIdentity | undefined;

  try {
    identity = parseImportId(request.id);
    logger?.debug?.(`[importResourceState] ${request.typeName} ${formatImportId(identity)}`);

    const resourceType = getResourceType(request.typeName);
    const resolution = await resolveType(identity, deps.typeRegistry, { signal, logger });
    if (resolution.scopeMismatch) {
      diagnostics.push({
        severity: 'warning',
        summary: 'Namespace does not match the resource scope',
        detail: resolution.scopeMismatch,
      });
    }

    const [live, schema] = await readObjectAndSchema(
      identity,
      resolution.endpoint,
      resolution.namespaced,
      deps,
      options,
    );
    throwIfAborted(signal);

    const filtered = removeServerSideFields(live);
    const converted = toTypedValue(filtered, schema);
    const object = narrowTopLevelPending(schema, backfillUnknowns(schema, converted));
    const state = serializeImportedState(assembleImportedState(object), resourceType, schema);
    logger?.debug?.(
      `[importResourceState] ${formatGroupVersionKind(identity)} imported with ${state.pending.length} pending value(s)`,
    );

    return {
      diagnostics,
      importedResources: [{ typeName: request.typeName, state }],
    };
  } catch (error) {
    const diagnostic = toDiagnostic(error, { id: request.id, identity });
    logger?.error?.(`[importResourceState] ${diagnostic.summary}: ${diagnostic.detail}`);
    diagnostics.push(diagnostic);
    return { diagnostics, importedResources: [], failure: classifyFailure(error) };
  }
}

/**
 * Reads the live object and its type's schema concurrently. The first
 * failure cancels the outstanding read.
 */
async function readObjectAndSchema(
  identity: ResourceIdentity,
  endpoint: EndpointDescriptor,
  namespaced: boolean,
  deps: ImportDependencies,
  options: ImportOptions,
): Promise<[JsonObject, ObjectSchema]> {
  const { controller, dispose } = createLinkedAbortController(options.signal);
  try {
    return await Promise.all([
      fetchObject(deps.objectStore, endpoint, identity, namespaced, {
        signal: controller.signal,
        logger: options.logger,
      }),
      deps.schemaResolver.schemaFor(identity),
    ]);
  } catch (error) {
    controller.abort(error);
    throw error;
  } finally {
    dispose();
  }
}
