/**
 * Runtime description of the shape a typed value must have. Schemas are
 * discovered per resource type and passed around as data.
 */

export type ScalarKind = "string" | "number" | "bool" | "dynamic";

export interface ScalarSchema {
  type: "scalar";
  kind: ScalarKind;
}

export interface ObjectSchema {
  type: "object";
  attributes: Record<string, FieldSchema>;
  /** Attribute names that may be left unset */
  optional?: string[];
}

export interface ListSchema {
  type: "list";
  element: FieldSchema;
}

export interface SetSchema {
  type: "set";
  element: FieldSchema;
}

export interface MapSchema {
  type: "map";
  value: FieldSchema;
}

export type FieldSchema = ScalarSchema | ObjectSchema | ListSchema | SetSchema | MapSchema;

export const SCALAR_KINDS: readonly ScalarKind[] = ["string", "number", "bool", "dynamic"];

export function isScalarKind(value: unknown): value is ScalarKind {
  return typeof value === "string" && SCALAR_KINDS.some((kind) => kind === value);
}

export function scalarSchema(kind: ScalarKind): ScalarSchema {
  return { type: "scalar", kind };
}

export function objectSchema(
  attributes: Record<string, FieldSchema>,
  optional: string[] = [],
): ObjectSchema {
  return { type: "object", attributes, optional };
}

export function listSchema(element: FieldSchema): ListSchema {
  return { type: "list", element };
}

export function setSchema(element: FieldSchema): SetSchema {
  return { type: "set", element };
}

export function mapSchema(value: FieldSchema): MapSchema {
  return { type: "map", value };
}

export function isOptionalAttribute(schema: ObjectSchema, name: string): boolean {
  return schema.optional?.includes(name) ?? false;
}

/** Short type expression for messages, e.g. "list(map(string))". */
export function describeSchema(schema: FieldSchema): string {
  switch (schema.type) {
    case "scalar":
      return schema.kind;
    case "object":
      return "object";
    case "list":
      return `list(${describeSchema(schema.element)})`;
    case "set":
      return `set(${describeSchema(schema.element)})`;
    case "map":
      return `map(${describeSchema(schema.value)})`;
  }
}
