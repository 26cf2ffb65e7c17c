/**
 * Schema registries backed by local definitions
 */

import { readFile } from 'node:fs/promises';
import { parseDocument } from 'yaml';
import {
  gvkKey,
  isPlainObject,
  type FieldSchema,
  type GroupVersionKind,
} from '@kubeimport/types';
import { SchemaError, describeCause } from '../errors.js';
import { parseFieldSchema } from './definition.js';
import type { SchemaRegistry } from './resolver.js';

/**
 * Fixed set of schemas, keyed like `apps/v1/Deployment` or `v1/Secret`
 */
export class InMemorySchemaRegistry implements SchemaRegistry {
  private readonly schemas: Map<string, FieldSchema>;

  constructor(schemas: Iterable<[string, FieldSchema]> = []) {
    this.schemas = new Map(schemas);
  }

  register(gvk: GroupVersionKind, schema: FieldSchema): void {
    this.schemas.set(gvkKey(gvk), schema);
  }

  async schemaFor(gvk: GroupVersionKind): Promise<FieldSchema | undefined> {
    return this.schemas.get(gvkKey(gvk));
  }

  keys(): string[] {
    return [...this.schemas.keys()];
  }
}

/**
 * Parses a schema document:
 *
 * ```yaml
 * schemas:
 *   v1/ConfigMap:
 *     type: object
 *     attributes: { ... }
 * ```
 *
 * @param source file path used in messages
 * @throws SchemaError on YAML syntax errors or malformed definitions
 */
export function parseSchemaDocument(content: string, source?: string): InMemorySchemaRegistry {
  const where = source ? ` in ${source}` : '';
  const doc = parseDocument(content);
  const firstError = doc.errors[0];
  if (firstError) {
    throw new SchemaError(`invalid schema document${where}: ${firstError.message}`, {
      cause: firstError,
    });
  }

  const parsed: unknown = doc.toJS();
  const schemas = isPlainObject(parsed) ? parsed['schemas'] : undefined;
  if (!isPlainObject(schemas)) {
    throw new SchemaError(`schema document${where} must have a "schemas" mapping`, {
      path: 'schemas',
    });
  }

  const entries: [string, FieldSchema][] = [];
  for (const [key, definition] of Object.entries(schemas)) {
    try {
      entries.push([key, parseFieldSchema(definition, `schemas.${key}`)]);
    } catch (error) {
      if (error instanceof SchemaError && source) {
        throw new SchemaError(`${error.message} (${source})`, { path: error.path, cause: error });
      }
      throw error;
    }
  }

  return new InMemorySchemaRegistry(entries);
}

/**
 * Reads schemas from a YAML (or JSON) file on first use
 */
export class YamlSchemaRegistry implements SchemaRegistry {
  private readonly filePath: string;
  private loaded?: Promise<InMemorySchemaRegistry>;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async schemaFor(gvk: GroupVersionKind): Promise<FieldSchema | undefined> {
    const registry = await this.load();
    return registry.schemaFor(gvk);
  }

  private load(): Promise<InMemorySchemaRegistry> {
    if (!this.loaded) {
      this.loaded = this.read().catch((error: unknown) => {
        this.loaded = undefined;
        throw error;
      });
    }
    return this.loaded;
  }

  private async read(): Promise<InMemorySchemaRegistry> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new SchemaError(`cannot read schema file ${this.filePath}: ${describeCause(error)}`, {
        cause: error,
        suggestion: 'Pass --schema-file or set schemaFile in .kubeimportrc.',
      });
    }
    return parseSchemaDocument(content, this.filePath);
  }
}
