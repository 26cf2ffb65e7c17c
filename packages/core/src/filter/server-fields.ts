/**
 * Removal of fields owned by the remote system
 */

import { isJsonObject, type JsonObject } from '@kubeimport/types';

/** Top-level keys written only by the server */
export const SERVER_SIDE_ROOT_FIELDS: readonly string[] = ['status'];

/** `metadata` keys written only by the server */
export const SERVER_SIDE_METADATA_FIELDS: readonly string[] = [
  'uid',
  'creationTimestamp',
  'resourceVersion',
  'generation',
  'managedFields',
  'selfLink',
];

/**
 * Returns a copy of `object` without server-managed fields. Only the root
 * and `metadata` are inspected; everything else, `spec` included, is kept
 * as is. The input is not modified.
 */
export function removeServerSideFields(object: JsonObject): JsonObject {
  const result = omitKeys(object, SERVER_SIDE_ROOT_FIELDS);

  const metadata = result['metadata'];
  if (isJsonObject(metadata)) {
    result['metadata'] = omitKeys(metadata, SERVER_SIDE_METADATA_FIELDS);
  }

  return result;
}

function omitKeys(source: JsonObject, keys: readonly string[]): JsonObject {
  return Object.fromEntries(Object.entries(source).filter(([key]) => !keys.includes(key)));
}
