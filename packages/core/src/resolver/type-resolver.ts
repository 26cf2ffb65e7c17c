/**
 * Resource type resolution against a type registry
 */

import {
  formatGroupVersion,
  formatGroupVersionKind,
  toGroupVersionKind,
  type EndpointDescriptor,
  type GroupVersionKind,
  type ResourceIdentity,
} from '@kubeimport/types';
import { CanceledError, ResolutionError, describeCause } from '../errors.js';
import { isAbortError, throwIfAborted } from '../utils/abort.js';

/**
 * Maps types to endpoints. A lookup that finds nothing resolves to
 * `undefined`; a registry that cannot answer rejects.
 */
export interface TypeRegistry {
  lookupEndpoint(gvk: GroupVersionKind, signal?: AbortSignal): Promise<EndpointDescriptor | undefined>;
  isNamespaceScoped(gvk: GroupVersionKind, signal?: AbortSignal): Promise<boolean | undefined>;
}

export interface TypeResolution {
  endpoint: EndpointDescriptor;
  namespaced: boolean;
  /** Set when the identifier's namespace disagrees with the type's scope */
  scopeMismatch?: string;
}

export interface ResolveTypeOptions {
  signal?: AbortSignal;
  logger?: Console;
}

/**
 * Resolves the endpoint and namespace scope of the identity's type.
 *
 * A namespace/scope mismatch is reported through `scopeMismatch` and does
 * not fail resolution; the read that follows fails instead.
 *
 * @throws ResolutionError unknown type or unreachable registry
 * @throws CanceledError when `signal` aborts
 */
export async function resolveType(
  identity: ResourceIdentity,
  registry: TypeRegistry,
  options: ResolveTypeOptions = {},
): Promise<TypeResolution> {
  const { signal, logger } = options;
  const gvk = toGroupVersionKind(identity);

  const endpoint = await askRegistry(gvk, signal, () => registry.lookupEndpoint(gvk, signal));
  if (!endpoint) {
    throw unknownType(gvk);
  }

  const namespaced = await askRegistry(gvk, signal, () => registry.isNamespaceScoped(gvk, signal));
  if (namespaced === undefined) {
    throw unknownType(gvk);
  }

  logger?.debug?.(
    `[resolveType] ${formatGroupVersionKind(gvk)} -> ${endpoint.resource} (namespaced=${namespaced})`,
  );

  const scopeMismatch = describeScopeMismatch(identity, namespaced);
  if (scopeMismatch) {
    logger?.warn?.(`[resolveType] ${scopeMismatch}`);
    return { endpoint, namespaced, scopeMismatch };
  }

  return { endpoint, namespaced };
}

export function describeScopeMismatch(
  identity: ResourceIdentity,
  namespaced: boolean,
): string | undefined {
  const hasNamespace = identity.namespace.length > 0;
  if (namespaced && !hasNamespace) {
    return `${identity.kind} is namespaced but the import ID does not name a namespace`;
  }
  if (!namespaced && hasNamespace) {
    return `${identity.kind} is cluster-scoped; namespace "${identity.namespace}" will be ignored`;
  }
  return undefined;
}

async function askRegistry<T>(
  gvk: GroupVersionKind,
  signal: AbortSignal | undefined,
  call: () => Promise<T>,
): Promise<T> {
  throwIfAborted(signal);
  try {
    return await call();
  } catch (error) {
    if (error instanceof ResolutionError || error instanceof CanceledError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new CanceledError('import was canceled', { cause: error });
    }
    throw new ResolutionError(
      `type registry is unreachable: ${describeCause(error)}`,
      { reason: 'unreachable', gvk, cause: error },
    );
  }
}

function unknownType(gvk: GroupVersionKind): ResolutionError {
  return new ResolutionError(`no matches for kind "${gvk.kind}" in version "${formatGroupVersion(gvk)}"`, {
    reason: 'unknown-type',
    gvk,
    suggestion: 'Check the apiVersion and Kind, and that the CRD is installed.',
  });
}
