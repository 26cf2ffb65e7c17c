export interface GroupVersion {
  /** API group; empty for the core group */
  group: string;
  version: string;
}

export interface GroupVersionKind extends GroupVersion {
  kind: string;
}

/**
 * Fully-qualified identity of a live object. `namespace` is empty for
 * cluster-scoped objects.
 */
export interface ResourceIdentity extends GroupVersionKind {
  namespace: string;
  name: string;
}

/**
 * Where objects of one type are read from, as resolved by a type registry.
 */
export interface EndpointDescriptor extends GroupVersionKind {
  /** Plural REST resource name, e.g. "deployments" */
  resource: string;
  namespaced: boolean;
}

/**
 * Splits an apiVersion string such as "apps/v1" or "v1".
 * A value with more than one slash does not name a group/version and
 * yields empty fields.
 */
export function parseGroupVersion(apiVersion: string): GroupVersion {
  const parts = apiVersion.split("/");
  if (parts.length === 1) {
    return { group: "", version: apiVersion };
  }

  const [group, version] = parts;
  if (parts.length === 2 && group !== undefined && version !== undefined) {
    return { group, version };
  }

  return { group: "", version: "" };
}

export function formatGroupVersion(value: GroupVersion): string {
  if (value.group.length === 0) {
    return value.version;
  }
  return `${value.group}/${value.version}`;
}

/** Cache key for a type: "apps/v1/Deployment", "v1/Secret". */
export function gvkKey(value: GroupVersionKind): string {
  return `${formatGroupVersion(value)}/${value.kind}`;
}

/** Human form used in messages: "apps/v1, Kind=Deployment". */
export function formatGroupVersionKind(value: GroupVersionKind): string {
  return `${formatGroupVersion(value)}, Kind=${value.kind}`;
}

export function createResourceIdentity(input: {
  group: string;
  version: string;
  kind: string;
  namespace?: string;
  name: string;
}): ResourceIdentity {
  return Object.freeze({
    group: input.group,
    version: input.version,
    kind: input.kind,
    namespace: input.namespace ?? "",
    name: input.name,
  });
}

export function toGroupVersionKind(value: GroupVersionKind): GroupVersionKind {
  return { group: value.group, version: value.version, kind: value.kind };
}
