/**
 * Object store reading live objects over the REST API
 */

import { isJsonObject, type EndpointDescriptor, type JsonObject } from '@kubeimport/types';
import type { ObjectStore } from '../fetcher/object-fetcher.js';
import { discoveryPath } from './discovery.js';
import { getJson, type KubeConnection } from './http.js';

/**
 * REST path of one object. An empty or missing namespace addresses the
 * object cluster-wide.
 */
export function objectPath(
  endpoint: EndpointDescriptor,
  namespace: string | undefined,
  name: string,
): string {
  const scope = namespace ? `/namespaces/${encodeURIComponent(namespace)}` : '';
  return `${discoveryPath(endpoint)}${scope}/${encodeURIComponent(endpoint.resource)}/${encodeURIComponent(name)}`;
}

export class HttpObjectStore implements ObjectStore {
  private readonly connection: KubeConnection;

  constructor(connection: KubeConnection) {
    this.connection = connection;
  }

  async get(
    endpoint: EndpointDescriptor,
    namespace: string | undefined,
    name: string,
    signal?: AbortSignal,
  ): Promise<JsonObject | undefined> {
    const result = await getJson(this.connection, objectPath(endpoint, namespace, name), signal);
    if (!result.found) {
      return undefined;
    }
    if (!isJsonObject(result.body)) {
      throw new Error(`response for ${endpoint.resource}/${name} is not a JSON object`);
    }
    return result.body;
  }
}
