/**
 * FieldSchema documents
 *
 * A definition is either a bare scalar kind (`string`, `number`, `bool`,
 * `dynamic`) or a mapping with a `type`:
 *
 * ```yaml
 * type: object
 * attributes:
 *   replicas: number
 *   selector:
 *     type: map
 *     value: string
 * optional: [selector]
 * ```
 */

import {
  isPlainObject,
  isScalarKind,
  SCALAR_KINDS,
  type FieldSchema,
} from '@kubeimport/types';
import { SchemaError } from '../errors.js';

/**
 * Validates an untyped definition and returns it as a FieldSchema
 *
 * @param input parsed YAML/JSON
 * @param path location of `input` in its document, for messages
 * @throws SchemaError when the definition is malformed
 */
export function parseFieldSchema(input: unknown, path = ''): FieldSchema {
  if (typeof input === 'string') {
    if (!isScalarKind(input)) {
      throw invalid(path, `unknown scalar kind "${input}" (expected one of ${SCALAR_KINDS.join(', ')})`);
    }
    return { type: 'scalar', kind: input };
  }

  if (!isPlainObject(input)) {
    throw invalid(path, 'schema must be a scalar kind or a mapping with a "type"');
  }

  const type = input['type'];
  switch (type) {
    case 'scalar': {
      const kind = input['kind'];
      if (!isScalarKind(kind)) {
        throw invalid(joinPath(path, 'kind'), `expected one of ${SCALAR_KINDS.join(', ')}`);
      }
      return { type: 'scalar', kind };
    }
    case 'list':
    case 'set':
      return { type, element: parseFieldSchema(input['element'], joinPath(path, 'element')) };
    case 'map':
      return { type: 'map', value: parseFieldSchema(input['value'], joinPath(path, 'value')) };
    case 'object':
      return parseObjectSchema(input, path);
    default:
      if (isScalarKind(type)) {
        return { type: 'scalar', kind: type };
      }
      throw invalid(joinPath(path, 'type'), `unknown schema type ${JSON.stringify(type)}`);
  }
}

function parseObjectSchema(input: Record<string, unknown>, path: string): FieldSchema {
  const rawAttributes = input['attributes'] ?? {};
  if (!isPlainObject(rawAttributes)) {
    throw invalid(joinPath(path, 'attributes'), 'attributes must be a mapping');
  }

  const attributes: Record<string, FieldSchema> = Object.fromEntries(
    Object.entries(rawAttributes).map(([name, definition]): [string, FieldSchema] => [
      name,
      parseFieldSchema(definition, joinPath(joinPath(path, 'attributes'), name)),
    ]),
  );

  const rawOptional = input['optional'] ?? [];
  if (!Array.isArray(rawOptional)) {
    throw invalid(joinPath(path, 'optional'), 'optional must be a list of attribute names');
  }

  const optional: string[] = [];
  rawOptional.forEach((name: unknown, index) => {
    const itemPath = `${joinPath(path, 'optional')}[${index}]`;
    if (typeof name !== 'string') {
      throw invalid(itemPath, 'attribute name must be a string');
    }
    if (!Object.prototype.hasOwnProperty.call(attributes, name)) {
      throw invalid(itemPath, `"${name}" is not a declared attribute`);
    }
    optional.push(name);
  });

  return { type: 'object', attributes, optional };
}

function joinPath(base: string, segment: string): string {
  return base.length === 0 ? segment : `${base}.${segment}`;
}

function invalid(path: string, message: string): SchemaError {
  const location = path.length === 0 ? '(root)' : path;
  return new SchemaError(`invalid schema at ${location}: ${message}`, { path: location });
}
