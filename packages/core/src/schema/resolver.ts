/**
 * Schema lookup for resource types
 */

import {
  formatGroupVersionKind,
  toGroupVersionKind,
  type FieldSchema,
  type GroupVersionKind,
  type ObjectSchema,
} from '@kubeimport/types';
import { SchemaError, describeCause } from '../errors.js';
import { SchemaCache } from './cache.js';

/**
 * Source of type schemas. Resolves to `undefined` for unknown types.
 */
export interface SchemaRegistry {
  schemaFor(gvk: GroupVersionKind): Promise<FieldSchema | undefined>;
}

export interface SchemaResolverOptions {
  /** Shared cache handle; a private one is created when omitted */
  cache?: SchemaCache;
  logger?: Console;
}

export class SchemaResolver {
  readonly cache: SchemaCache;
  private readonly registry: SchemaRegistry;
  private readonly logger?: Console;

  constructor(registry: SchemaRegistry, options: SchemaResolverOptions = {}) {
    this.registry = registry;
    this.cache = options.cache ?? new SchemaCache();
    this.logger = options.logger;
  }

  /**
   * Object schema of a resource type
   *
   * @throws SchemaError when the registry has no usable definition
   */
  async schemaFor(gvk: GroupVersionKind): Promise<ObjectSchema> {
    const key = toGroupVersionKind(gvk);
    const schema = await this.cache.getOrLoad(key, () => this.load(key));
    if (schema.type !== 'object') {
      throw new SchemaError(
        `schema for ${formatGroupVersionKind(key)} must describe an object, got ${schema.type}`,
        { gvk: key },
      );
    }
    return schema;
  }

  private async load(gvk: GroupVersionKind): Promise<FieldSchema> {
    this.logger?.debug?.(`[SchemaResolver] loading schema for ${formatGroupVersionKind(gvk)}`);

    let schema: FieldSchema | undefined;
    try {
      schema = await this.registry.schemaFor(gvk);
    } catch (error) {
      if (error instanceof SchemaError) {
        throw error;
      }
      throw new SchemaError(
        `schema registry failed for ${formatGroupVersionKind(gvk)}: ${describeCause(error)}`,
        { gvk, cause: error },
      );
    }

    if (!schema) {
      throw new SchemaError(`no schema registered for ${formatGroupVersionKind(gvk)}`, {
        gvk,
        suggestion: 'Add a definition for this type to the schema file.',
      });
    }
    return schema;
  }
}
