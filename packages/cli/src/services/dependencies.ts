import {
  DiscoveryTypeRegistry,
  HttpObjectStore,
  SchemaResolver,
  YamlSchemaRegistry,
  type ImportDependencies,
  type KubeConnection,
} from '@kubeimport/core';
import { CliError } from '../errors.js';
import type { KubeimportConfig } from '../utils/config.js';

export function toConnection(config: KubeimportConfig): KubeConnection {
  if (!config.server) {
    throw new CliError({
      code: 'MISSING_SERVER',
      message: 'no API server configured',
      suggestion: 'Pass --server, set KUBEIMPORT_SERVER, or add server to .kubeimportrc.',
      exitCode: 3,
    });
  }
  return {
    server: config.server,
    token: config.token,
    timeoutMs: config.timeoutMs,
  };
}

/**
 * Wires the HTTP-backed registries used by `kubeimport import`
 */
export function createImportDependencies(
  config: KubeimportConfig,
  logger?: Console,
): ImportDependencies {
  const connection = toConnection(config);

  if (!config.schemaFile) {
    throw new CliError({
      code: 'MISSING_SCHEMA_FILE',
      message: 'no schema file configured',
      suggestion: 'Pass --schema-file, set KUBEIMPORT_SCHEMA_FILE, or add schemaFile to .kubeimportrc.',
      exitCode: 3,
    });
  }

  return {
    typeRegistry: new DiscoveryTypeRegistry(connection),
    objectStore: new HttpObjectStore(connection),
    schemaResolver: new SchemaResolver(new YamlSchemaRegistry(config.schemaFile), { logger }),
  };
}
