/**
 * Pending-value backfill for freshly converted values
 */

import {
  absentValue,
  isOptionalAttribute,
  listValue,
  mapValue,
  nullValue,
  objectValue,
  pendingValue,
  setValue,
  type ConvertedValue,
  type FieldSchema,
  type NullValue,
  type ObjectSchema,
  type PendingValue,
  type TypedValue,
} from '@kubeimport/types';

type Resolved = PendingValue | NullValue;

/**
 * Walks `schema` and `value` together and replaces every `absent`
 * placeholder with a `pending` marker of the position's declared schema.
 *
 * A placeholder is replaced as a whole: a collection is either carried over
 * with its elements or becomes a single pending marker, never a mix. Object
 * attributes the value lacks are treated as placeholders.
 */
export function backfillUnknowns(schema: FieldSchema, value: ConvertedValue): TypedValue {
  switch (value.kind) {
    case 'absent':
      return pendingValue(schema);
    case 'string':
    case 'number':
    case 'bool':
    case 'dynamic':
      return value;
    case 'object': {
      if (schema.type !== 'object') {
        return resolvePlaceholders(value);
      }
      const attributes = Object.entries(schema.attributes).map(
        ([name, attributeSchema]): [string, TypedValue] => [
          name,
          backfillUnknowns(attributeSchema, value.attributes.get(name) ?? absentValue(attributeSchema)),
        ],
      );
      return objectValue<Resolved>(attributes);
    }
    case 'map': {
      if (schema.type !== 'map') {
        return resolvePlaceholders(value);
      }
      const entries = Array.from(value.entries, ([key, child]): [string, TypedValue] => [
        key,
        backfillUnknowns(schema.value, child),
      ]);
      return mapValue<Resolved>(entries);
    }
    case 'list':
      if (schema.type !== 'list') {
        return resolvePlaceholders(value);
      }
      return listValue<Resolved>(value.elements.map((child) => backfillUnknowns(schema.element, child)));
    case 'set':
      if (schema.type !== 'set') {
        return resolvePlaceholders(value);
      }
      return setValue<Resolved>(value.elements.map((child) => backfillUnknowns(schema.element, child)));
  }
}

/**
 * Turns pending top-level attributes that the schema marks optional into
 * explicit nulls. Those are operator-settable and a fresh import has not
 * configured them; nested pending values are left alone.
 */
export function narrowTopLevelPending(schema: ObjectSchema, value: TypedValue): TypedValue {
  if (value.kind !== 'object') {
    return value;
  }

  const attributes = Array.from(value.attributes, ([name, child]): [string, TypedValue] => {
    if (child.kind === 'pending' && isOptionalAttribute(schema, name)) {
      return [name, nullValue(child.schema)];
    }
    return [name, child];
  });
  return objectValue<Resolved>(attributes);
}

/**
 * Fallback for nodes the schema does not describe: placeholders become
 * pending markers of the schema they were created with.
 */
function resolvePlaceholders(value: ConvertedValue): TypedValue {
  switch (value.kind) {
    case 'absent':
      return pendingValue(value.schema);
    case 'string':
    case 'number':
    case 'bool':
    case 'dynamic':
      return value;
    case 'object':
      return objectValue<Resolved>(
        Array.from(value.attributes, ([name, child]): [string, TypedValue] => [name, resolvePlaceholders(child)]),
      );
    case 'map':
      return mapValue<Resolved>(
        Array.from(value.entries, ([key, child]): [string, TypedValue] => [key, resolvePlaceholders(child)]),
      );
    case 'list':
      return listValue<Resolved>(value.elements.map((child) => resolvePlaceholders(child)));
    case 'set':
      return setValue<Resolved>(value.elements.map((child) => resolvePlaceholders(child)));
  }
}
