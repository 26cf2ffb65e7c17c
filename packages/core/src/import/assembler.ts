/**
 * Packaging of imported state
 */

import {
  AttributePath,
  describeSchema,
  flattenValue,
  nullValue,
  objectValue,
  visitValue,
  type FieldSchema,
  type JsonValue,
  type NullValue,
  type ObjectSchema,
  type PendingValue,
  type TypedValue,
} from '@kubeimport/types';
import { AssemblyError } from '../errors.js';
import { WAIT_FOR_SCHEMA, type ResourceTypeDefinition } from './resource-types.js';

export const STATE_SCHEMA_VERSION = 1;

export interface ImportedState {
  /** Always an empty object: imported objects have no configuration text yet */
  manifest: TypedValue;
  object: TypedValue;
  waitFor: NullValue;
}

/**
 * Wire form of an imported state. Pending and null positions both flatten
 * to `null` in `value`; `pending` lists the paths that are pending.
 */
export interface SerializedState {
  schemaVersion: typeof STATE_SCHEMA_VERSION;
  type: ObjectSchema;
  value: JsonValue;
  pending: string[];
}

export function assembleImportedState(object: TypedValue): ImportedState {
  return {
    manifest: objectValue<never>([]),
    object,
    waitFor: nullValue(WAIT_FOR_SCHEMA),
  };
}

/**
 * @throws AssemblyError when the state does not conform to the resource
 * type's state schema
 */
export function serializeImportedState(
  state: ImportedState,
  resourceType: ResourceTypeDefinition,
  objectSchema: ObjectSchema,
): SerializedState {
  const type = resourceType.stateSchema(objectSchema);
  const value = objectValue<PendingValue | NullValue>([
    ['manifest', state.manifest],
    ['object', state.object],
    ['wait_for', state.waitFor],
  ]);

  verifyShape(type, value, AttributePath.root);

  const pending: string[] = [];
  visitValue(value, (node, path) => {
    if (node.kind === 'pending') {
      pending.push(path.toString());
    }
  });

  return {
    schemaVersion: STATE_SCHEMA_VERSION,
    type,
    value: flattenValue(value),
    pending,
  };
}

function verifyShape(schema: FieldSchema, value: TypedValue, path: AttributePath): void {
  switch (value.kind) {
    case 'pending':
    case 'null':
      return;
    case 'string':
    case 'number':
    case 'bool':
    case 'dynamic':
      if (schema.type !== 'scalar' || schema.kind !== value.kind) {
        throw shapeMismatch(schema, value.kind, path);
      }
      return;
    case 'object':
      if (schema.type !== 'object') {
        throw shapeMismatch(schema, value.kind, path);
      }
      for (const [name, child] of value.attributes) {
        const attributeSchema = schema.attributes[name];
        if (!Object.hasOwn(schema.attributes, name) || !attributeSchema) {
          throw new AssemblyError(`unexpected attribute "${name}" at ${describePath(path)}`);
        }
        verifyShape(attributeSchema, child, path.withAttribute(name));
      }
      for (const name of Object.keys(schema.attributes)) {
        if (!value.attributes.has(name)) {
          throw new AssemblyError(`missing attribute "${name}" at ${describePath(path)}`);
        }
      }
      return;
    case 'map':
      if (schema.type !== 'map') {
        throw shapeMismatch(schema, value.kind, path);
      }
      for (const [key, child] of value.entries) {
        verifyShape(schema.value, child, path.withKey(key));
      }
      return;
    case 'list':
    case 'set':
      if ((schema.type !== 'list' && schema.type !== 'set') || schema.type !== value.kind) {
        throw shapeMismatch(schema, value.kind, path);
      }
      value.elements.forEach((child, index) => {
        verifyShape(schema.element, child, path.withIndex(index));
      });
      return;
  }
}

function shapeMismatch(schema: FieldSchema, actual: string, path: AttributePath): AssemblyError {
  return new AssemblyError(
    `value at ${describePath(path)} is ${actual}, schema expects ${describeSchema(schema)}`,
  );
}

function describePath(path: AttributePath): string {
  return path.isRoot ? '(root)' : path.toString();
}
