import { AttributePath } from "./attribute-path.js";
import type { JsonObject, JsonValue } from "./json.js";
import type { FieldSchema } from "./schema.js";

export interface StringValue {
  kind: "string";
  value: string;
}

export interface NumberValue {
  kind: "number";
  value: number;
}

export interface BoolValue {
  kind: "bool";
  value: boolean;
}

/** Untyped JSON kept verbatim at a `dynamic` schema position. */
export interface DynamicValue {
  kind: "dynamic";
  value: JsonValue;
}

export type ScalarValue = StringValue | NumberValue | BoolValue | DynamicValue;

export interface ObjectValue<M> {
  kind: "object";
  attributes: Map<string, ValueNode<M>>;
}

export interface ListValue<M> {
  kind: "list";
  elements: ValueNode<M>[];
}

export interface SetValue<M> {
  kind: "set";
  elements: ValueNode<M>[];
}

export interface MapValue<M> {
  kind: "map";
  entries: Map<string, ValueNode<M>>;
}

export type CollectionValue<M> = ObjectValue<M> | ListValue<M> | SetValue<M> | MapValue<M>;

/**
 * A value tree whose interior nodes are collections and scalars, and whose
 * remaining positions may hold one of the markers in `M`.
 */
export type ValueNode<M> = ScalarValue | CollectionValue<M> | M;

/** The value exists but is not known yet; it will be computed later. */
export interface PendingValue {
  kind: "pending";
  schema: FieldSchema;
}

/** The value is known to be unset. */
export interface NullValue {
  kind: "null";
  schema: FieldSchema;
}

/** Nothing could be read for this position. Only produced during conversion. */
export interface AbsentValue {
  kind: "absent";
  schema: FieldSchema;
}

export type Marker = PendingValue | NullValue | AbsentValue;

/** Final value model: every position is concrete, pending or null. */
export type TypedValue = ValueNode<PendingValue | NullValue>;

/** Converter output: concrete values plus absent placeholders. */
export type ConvertedValue = ValueNode<AbsentValue>;

export function stringValue(value: string): StringValue {
  return { kind: "string", value };
}

export function numberValue(value: number): NumberValue {
  return { kind: "number", value };
}

export function boolValue(value: boolean): BoolValue {
  return { kind: "bool", value };
}

export function dynamicValue(value: JsonValue): DynamicValue {
  return { kind: "dynamic", value };
}

export function objectValue<M>(attributes: Iterable<[string, ValueNode<M>]>): ObjectValue<M> {
  return { kind: "object", attributes: new Map(attributes) };
}

export function listValue<M>(elements: ValueNode<M>[]): ListValue<M> {
  return { kind: "list", elements };
}

export function setValue<M>(elements: ValueNode<M>[]): SetValue<M> {
  return { kind: "set", elements };
}

export function mapValue<M>(entries: Iterable<[string, ValueNode<M>]>): MapValue<M> {
  return { kind: "map", entries: new Map(entries) };
}

export function pendingValue(schema: FieldSchema): PendingValue {
  return { kind: "pending", schema };
}

export function nullValue(schema: FieldSchema): NullValue {
  return { kind: "null", schema };
}

export function absentValue(schema: FieldSchema): AbsentValue {
  return { kind: "absent", schema };
}

/** Any value tree, whichever markers it holds. */
export type AnyValue = ValueNode<Marker>;

export type ValueVisitor = (node: AnyValue, path: AttributePath) => void;

/** Depth-first, parents before children. */
export function visitValue(
  value: AnyValue,
  visitor: ValueVisitor,
  path: AttributePath = AttributePath.root,
): void {
  visitor(value, path);

  switch (value.kind) {
    case "object":
      for (const [name, child] of value.attributes) {
        visitValue(child, visitor, path.withAttribute(name));
      }
      return;
    case "map":
      for (const [key, child] of value.entries) {
        visitValue(child, visitor, path.withKey(key));
      }
      return;
    case "list":
    case "set":
      value.elements.forEach((child, index) => {
        visitValue(child, visitor, path.withIndex(index));
      });
      return;
    default:
      return;
  }
}

/**
 * Plain JSON view of a value tree. Every marker flattens to `null`, so the
 * result alone cannot tell pending from null positions.
 */
export function flattenValue(value: AnyValue): JsonValue {
  switch (value.kind) {
    case "string":
    case "number":
    case "bool":
    case "dynamic":
      return value.value;
    case "object":
      return flattenEntries(value.attributes);
    case "map":
      return flattenEntries(value.entries);
    case "list":
    case "set":
      return value.elements.map((child) => flattenValue(child));
    case "pending":
    case "null":
    case "absent":
      return null;
  }
}

function flattenEntries(entries: Map<string, AnyValue>): JsonObject {
  return Object.fromEntries(
    Array.from(entries, ([key, child]): [string, JsonValue] => [key, flattenValue(child)]),
  );
}
