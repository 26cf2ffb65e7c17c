/**
 * Type registry backed by API discovery documents
 */

import {
  formatGroupVersion,
  isPlainObject,
  type EndpointDescriptor,
  type GroupVersion,
  type GroupVersionKind,
} from '@kubeimport/types';
import type { TypeRegistry } from '../resolver/type-resolver.js';
import { raceAbort } from '../utils/abort.js';
import { getJson, type KubeConnection } from './http.js';

export interface ApiResource {
  /** Plural resource name; subresources look like "deployments/scale" */
  name: string;
  kind: string;
  namespaced: boolean;
}

/**
 * Path of the discovery document of a group/version
 */
export function discoveryPath(groupVersion: GroupVersion): string {
  if (groupVersion.group.length === 0) {
    return `/api/${encodeURIComponent(groupVersion.version)}`;
  }
  return `/apis/${encodeURIComponent(groupVersion.group)}/${encodeURIComponent(groupVersion.version)}`;
}

/**
 * Reads the `resources` of an APIResourceList, skipping malformed entries
 */
export function parseApiResourceList(body: unknown): ApiResource[] | undefined {
  if (!isPlainObject(body)) {
    return undefined;
  }

  const resources = body['resources'];
  if (!Array.isArray(resources)) {
    return undefined;
  }

  const parsed: ApiResource[] = [];
  for (const entry of resources) {
    if (!isPlainObject(entry)) {
      continue;
    }
    const name = entry['name'];
    const kind = entry['kind'];
    const namespaced = entry['namespaced'];
    if (typeof name !== 'string' || typeof kind !== 'string' || typeof namespaced !== 'boolean') {
      continue;
    }
    parsed.push({ name, kind, namespaced });
  }
  return parsed;
}

/**
 * Resolves kinds through `/api/<v>` and `/apis/<g>/<v>`. Each discovery
 * document is requested once per registry instance. The shared request runs
 * without any caller's signal; an aborting caller stops waiting for it while
 * the others keep theirs.
 */
export class DiscoveryTypeRegistry implements TypeRegistry {
  private readonly connection: KubeConnection;
  private readonly documents = new Map<string, Promise<ApiResource[] | undefined>>();

  constructor(connection: KubeConnection) {
    this.connection = connection;
  }

  async lookupEndpoint(gvk: GroupVersionKind, signal?: AbortSignal): Promise<EndpointDescriptor | undefined> {
    const resource = await this.findResource(gvk, signal);
    if (!resource) {
      return undefined;
    }
    return {
      group: gvk.group,
      version: gvk.version,
      kind: gvk.kind,
      resource: resource.name,
      namespaced: resource.namespaced,
    };
  }

  async isNamespaceScoped(gvk: GroupVersionKind, signal?: AbortSignal): Promise<boolean | undefined> {
    const resource = await this.findResource(gvk, signal);
    return resource?.namespaced;
  }

  private async findResource(gvk: GroupVersionKind, signal?: AbortSignal): Promise<ApiResource | undefined> {
    if (gvk.version.length === 0 || gvk.kind.length === 0) {
      return undefined;
    }
    const resources = await this.discover(gvk, signal);
    return resources?.find((resource) => resource.kind === gvk.kind && !resource.name.includes('/'));
  }

  private discover(groupVersion: GroupVersion, signal?: AbortSignal): Promise<ApiResource[] | undefined> {
    const key = formatGroupVersion(groupVersion);
    let loading = this.documents.get(key);
    if (!loading) {
      loading = this.fetchDocument(groupVersion).catch((error: unknown) => {
        this.documents.delete(key);
        throw error;
      });
      this.documents.set(key, loading);
    }
    return raceAbort(loading, signal);
  }

  private async fetchDocument(groupVersion: GroupVersion): Promise<ApiResource[] | undefined> {
    const result = await getJson(this.connection, discoveryPath(groupVersion));
    if (!result.found) {
      return undefined;
    }

    const resources = parseApiResourceList(result.body);
    if (!resources) {
      throw new Error(`malformed discovery document for ${formatGroupVersion(groupVersion)}`);
    }
    return resources;
  }
}
