/**
 * Import identifier parsing
 *
 * Format: `<apiGroup/><apiVersion>#<Kind>#[<namespace>#]<name>`
 *
 * @example
 * ```typescript
 * parseImportId('v1#Secret#default#default-token-qgm6s');
 * // { group: '', version: 'v1', kind: 'Secret', namespace: 'default', name: 'default-token-qgm6s' }
 *
 * parseImportId('apps/v1#Deployment#my-app');
 * // { group: 'apps', version: 'v1', kind: 'Deployment', namespace: '', name: 'my-app' }
 * ```
 */

import {
  createResourceIdentity,
  formatGroupVersion,
  parseGroupVersion,
  type ResourceIdentity,
} from '@kubeimport/types';
import { ParseError } from '../errors.js';

export const IMPORT_ID_SEPARATOR = '#';

/**
 * Parses an import identifier. Segment contents are not validated here;
 * an unknown kind or an illegal name surfaces when the type is resolved or
 * the object is read.
 *
 * @throws ParseError when the identifier does not have 3 or 4 segments
 */
export function parseImportId(id: string): ResourceIdentity {
  const parts = id.split(IMPORT_ID_SEPARATOR);
  const [apiVersion, kind, third, fourth] = parts;

  if (
    apiVersion === undefined ||
    kind === undefined ||
    third === undefined ||
    parts.length > 4
  ) {
    throw new ParseError(`invalid format for import ID [${id}]`, {
      input: id,
      suggestion:
        'Use "<apiGroup/apiVersion>#<Kind>#<name>" for cluster-scoped resources or ' +
        '"<apiGroup/apiVersion>#<Kind>#<namespace>#<name>" for namespaced ones.',
    });
  }

  const { group, version } = parseGroupVersion(apiVersion);

  if (fourth === undefined) {
    return createResourceIdentity({ group, version, kind, name: third });
  }

  return createResourceIdentity({ group, version, kind, namespace: third, name: fourth });
}

/**
 * Inverse of {@link parseImportId}
 */
export function formatImportId(identity: ResourceIdentity): string {
  const segments = [formatGroupVersion(identity), identity.kind];
  if (identity.namespace.length > 0) {
    segments.push(identity.namespace);
  }
  segments.push(identity.name);
  return segments.join(IMPORT_ID_SEPARATOR);
}
