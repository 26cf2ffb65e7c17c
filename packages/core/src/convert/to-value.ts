/**
 * Schema-directed conversion of schemaless data into typed values
 */

import {
  AttributePath,
  absentValue,
  boolValue,
  canonicalJson,
  describeSchema,
  dynamicValue,
  flattenValue,
  listValue,
  mapValue,
  numberValue,
  objectValue,
  setValue,
  stringValue,
  type AbsentValue,
  type ConvertedValue,
  type FieldSchema,
  type JsonObject,
  type JsonValue,
  type ObjectSchema,
  type ScalarSchema,
} from '@kubeimport/types';
import { ConversionError } from '../errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_STRINGS: readonly string[] = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_STRINGS: readonly string[] = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

/**
 * Converts `raw` into a value shaped by `schema`.
 *
 * The schema decides the shape: raw keys it does not declare are dropped,
 * and every declared position missing from `raw` (or `null` in it) becomes
 * an `absent` placeholder for the backfill pass.
 *
 * @throws ConversionError when a raw value cannot take the schema's shape
 */
export function toTypedValue(
  raw: JsonValue | undefined,
  schema: FieldSchema,
  path: AttributePath = AttributePath.root,
): ConvertedValue {
  if (raw === undefined || raw === null) {
    return absentValue(schema);
  }

  switch (schema.type) {
    case 'scalar':
      return toScalar(raw, schema, path);
    case 'object':
      return toObject(requireObject(raw, schema, path), schema, path);
    case 'map': {
      const entries = Object.entries(requireObject(raw, schema, path));
      return mapValue<AbsentValue>(
        entries.map(([key, child]): [string, ConvertedValue] => [
          key,
          toTypedValue(child, schema.value, path.withKey(key)),
        ]),
      );
    }
    case 'list':
      return listValue<AbsentValue>(
        requireArray(raw, schema, path).map((child, index) =>
          toTypedValue(child, schema.element, path.withIndex(index)),
        ),
      );
    case 'set':
      return setValue<AbsentValue>(
        uniqueElements(
          requireArray(raw, schema, path).map((child, index) =>
            toTypedValue(child, schema.element, path.withIndex(index)),
          ),
        ),
      );
  }
}

function toObject(raw: JsonObject, schema: ObjectSchema, path: AttributePath): ConvertedValue {
  const attributes: [string, ConvertedValue][] = [];
  for (const [name, attributeSchema] of Object.entries(schema.attributes)) {
    const child = Object.hasOwn(raw, name) ? raw[name] : undefined;
    attributes.push([name, toTypedValue(child, attributeSchema, path.withAttribute(name))]);
  }
  return objectValue<AbsentValue>(attributes);
}

function toScalar(
  raw: Exclude<JsonValue, null>,
  schema: ScalarSchema,
  path: AttributePath,
): ConvertedValue {
  switch (schema.kind) {
    case 'dynamic':
      return dynamicValue(raw);
    case 'string':
      if (typeof raw === 'string') {
        return stringValue(raw);
      }
      // int-or-string positions arrive as numbers
      if (typeof raw === 'number') {
        return stringValue(formatPlainNumber(raw));
      }
      break;
    case 'number':
      if (typeof raw === 'number') {
        return numberValue(raw);
      }
      if (typeof raw === 'string') {
        if (!INTEGER_PATTERN.test(raw)) {
          throw new ConversionError(`cannot parse "${raw}" as number`, { path });
        }
        const parsed = Number.parseInt(raw, 10);
        if (!Number.isSafeInteger(parsed)) {
          throw new ConversionError(`integer "${raw}" is too large to represent exactly`, { path });
        }
        return numberValue(parsed);
      }
      break;
    case 'bool':
      if (typeof raw === 'boolean') {
        return boolValue(raw);
      }
      if (typeof raw === 'string') {
        if (TRUE_STRINGS.includes(raw)) {
          return boolValue(true);
        }
        if (FALSE_STRINGS.includes(raw)) {
          return boolValue(false);
        }
        throw new ConversionError(`cannot parse "${raw}" as bool`, { path });
      }
      break;
  }

  throw mismatch(raw, schema, path);
}

function requireObject(raw: Exclude<JsonValue, null>, schema: FieldSchema, path: AttributePath): JsonObject {
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw mismatch(raw, schema, path);
  }
  return raw;
}

function requireArray(raw: Exclude<JsonValue, null>, schema: FieldSchema, path: AttributePath): JsonValue[] {
  if (!Array.isArray(raw)) {
    throw mismatch(raw, schema, path);
  }
  return raw;
}

/** Keeps the first of every group of equal elements. */
function uniqueElements(elements: ConvertedValue[]): ConvertedValue[] {
  const seen = new Set<string>();
  return elements.filter((element) => {
    const key = canonicalJson(flattenValue(element));
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

function mismatch(raw: Exclude<JsonValue, null>, schema: FieldSchema, path: AttributePath): ConversionError {
  return new ConversionError(`expected ${describeSchema(schema)}, got ${describeRaw(raw)}`, { path });
}

function describeRaw(raw: Exclude<JsonValue, null>): string {
  if (Array.isArray(raw)) {
    return 'array';
  }
  if (typeof raw === 'boolean') {
    return 'bool';
  }
  return typeof raw;
}

/**
 * Decimal text of a number without exponent notation: `1e+21` renders as
 * `1000000000000000000000`, `1.5e-7` as `0.00000015`.
 */
export function formatPlainNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
