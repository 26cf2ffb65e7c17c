/**
 * kubeimport core - import of live cluster objects into typed state
 *
 * @packageDocumentation
 */

// Errors
export * from './errors.js';

// Identifier
export { IMPORT_ID_SEPARATOR, parseImportId, formatImportId } from './identifier/parser.js';

// Type resolution
export { resolveType, describeScopeMismatch } from './resolver/type-resolver.js';
export type { TypeRegistry, TypeResolution, ResolveTypeOptions } from './resolver/type-resolver.js';

// Object fetch
export { fetchObject } from './fetcher/object-fetcher.js';
export type { ObjectStore, FetchObjectOptions } from './fetcher/object-fetcher.js';

// Server-side field filter
export {
  SERVER_SIDE_ROOT_FIELDS,
  SERVER_SIDE_METADATA_FIELDS,
  removeServerSideFields,
} from './filter/server-fields.js';

// Schemas
export { SchemaCache } from './schema/cache.js';
export { parseFieldSchema } from './schema/definition.js';
export { InMemorySchemaRegistry, YamlSchemaRegistry, parseSchemaDocument } from './schema/registry.js';
export { SchemaResolver } from './schema/resolver.js';
export type { SchemaRegistry, SchemaResolverOptions } from './schema/resolver.js';

// Conversion
export { toTypedValue } from './convert/to-value.js';
export { backfillUnknowns, narrowTopLevelPending } from './convert/backfill.js';

// Import
export {
  STATE_SCHEMA_VERSION,
  assembleImportedState,
  serializeImportedState,
} from './import/assembler.js';
export type { ImportedState, SerializedState } from './import/assembler.js';
export { toDiagnostic, classifyFailure } from './import/diagnostics.js';
export type { DiagnosticContext, ImportFailureKind } from './import/diagnostics.js';
export {
  MANIFEST_RESOURCE_TYPE,
  MANIFEST_SCHEMA,
  WAIT_FOR_SCHEMA,
  listResourceTypes,
  getResourceType,
} from './import/resource-types.js';
export type { ResourceTypeDefinition } from './import/resource-types.js';
export { importResourceState } from './import/pipeline.js';
export type {
  ImportRequest,
  ImportDependencies,
  ImportOptions,
  ImportedResource,
  ImportResult,
} from './import/pipeline.js';

// API server clients
export { DiscoveryTypeRegistry, discoveryPath, parseApiResourceList } from './kube/discovery.js';
export type { ApiResource } from './kube/discovery.js';
export { HttpObjectStore, objectPath } from './kube/object-store.js';
export { KubeApiError, getJson, normalizeServerUrl } from './kube/http.js';
export type { KubeConnection, KubeGetResult } from './kube/http.js';

// Utils
export { isAbortError, throwIfAborted, raceAbort, createLinkedAbortController } from './utils/abort.js';
