/**
 * Resource types that can receive imported state
 */

import {
  mapSchema,
  objectSchema,
  scalarSchema,
  type ObjectSchema,
} from '@kubeimport/types';
import { ResolutionError } from '../errors.js';

export const MANIFEST_RESOURCE_TYPE = 'kubernetes_manifest';

/** Declarative configuration slot; empty until the operator writes one */
export const MANIFEST_SCHEMA: ObjectSchema = objectSchema({});

/** Readiness conditions slot */
export const WAIT_FOR_SCHEMA: ObjectSchema = objectSchema(
  { fields: mapSchema(scalarSchema('string')) },
  ['fields'],
);

export interface ResourceTypeDefinition {
  name: string;
  /** Schema of the whole state record for a given object schema */
  stateSchema(object: ObjectSchema): ObjectSchema;
}

const manifestResourceType: ResourceTypeDefinition = {
  name: MANIFEST_RESOURCE_TYPE,
  stateSchema(object) {
    return objectSchema(
      {
        manifest: MANIFEST_SCHEMA,
        object,
        wait_for: WAIT_FOR_SCHEMA,
      },
      ['object', 'wait_for'],
    );
  },
};

const RESOURCE_TYPES = new Map<string, ResourceTypeDefinition>([
  [manifestResourceType.name, manifestResourceType],
]);

export function listResourceTypes(): string[] {
  return [...RESOURCE_TYPES.keys()];
}

/**
 * @throws ResolutionError when `typeName` is not a known resource type
 */
export function getResourceType(typeName: string): ResourceTypeDefinition {
  const definition = RESOURCE_TYPES.get(typeName);
  if (!definition) {
    throw new ResolutionError(`unknown resource type "${typeName}"`, {
      reason: 'unknown-type-name',
      suggestion: `Supported resource types: ${listResourceTypes().join(', ')}`,
    });
  }
  return definition;
}
