/**
 * Reads live objects from a dynamic object store
 */

import {
  formatGroupVersionKind,
  type EndpointDescriptor,
  type JsonObject,
  type ResourceIdentity,
} from '@kubeimport/types';
import { CanceledError, FetchError, describeCause } from '../errors.js';
import { isAbortError, throwIfAborted } from '../utils/abort.js';

/**
 * Schemaless object access. `get` resolves to `undefined` when the object
 * does not exist and rejects on any other failure.
 */
export interface ObjectStore {
  get(
    endpoint: EndpointDescriptor,
    namespace: string | undefined,
    name: string,
    signal?: AbortSignal,
  ): Promise<JsonObject | undefined>;
}

export interface FetchObjectOptions {
  signal?: AbortSignal;
  logger?: Console;
}

/**
 * Reads the live object. Namespaced types are read in the identity's
 * namespace; cluster-scoped types by name only. Never retried.
 *
 * @throws FetchError empty name, not found or transport failure
 * @throws CanceledError when `signal` aborts
 */
export async function fetchObject(
  store: ObjectStore,
  endpoint: EndpointDescriptor,
  identity: ResourceIdentity,
  namespaced: boolean,
  options: FetchObjectOptions = {},
): Promise<JsonObject> {
  const { signal, logger } = options;
  const namespace = namespaced ? identity.namespace : undefined;

  throwIfAborted(signal);
  // An empty name would address the collection instead of one object
  if (identity.name.length === 0) {
    throw new FetchError('resource name may not be empty', { reason: 'invalid-name' });
  }
  logger?.debug?.(
    `[fetchObject] GET ${endpoint.resource}/${identity.name}` +
      (namespace === undefined ? '' : ` in namespace "${namespace}"`),
  );

  let object: JsonObject | undefined;
  try {
    object = await store.get(endpoint, namespace, identity.name, signal);
  } catch (error) {
    if (error instanceof FetchError || error instanceof CanceledError) {
      throw error;
    }
    if (isAbortError(error) || signal?.aborted) {
      throw new CanceledError('import was canceled', { cause: error });
    }
    throw new FetchError(describeCause(error), { reason: 'transport', cause: error });
  }

  if (!object) {
    const where = namespace === undefined ? '' : ` in namespace "${namespace}"`;
    throw new FetchError(
      `${endpoint.resource} "${identity.name}" not found${where} (${formatGroupVersionKind(identity)})`,
      { reason: 'not-found', status: 404 },
    );
  }

  return object;
}
