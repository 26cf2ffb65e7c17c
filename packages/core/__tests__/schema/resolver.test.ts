/**
 * Schema resolution
 */
import { describe, it, expect, vi } from 'vitest';
import { objectSchema, scalarSchema } from '@kubeimport/types';
import { SchemaError } from '../../src/errors.js';
import { SchemaCache } from '../../src/schema/cache.js';
import { InMemorySchemaRegistry } from '../../src/schema/registry.js';
import { SchemaResolver, type SchemaRegistry } from '../../src/schema/resolver.js';

const deployment = { group: 'apps', version: 'v1', kind: 'Deployment' };
const deploymentSchema = objectSchema({ spec: objectSchema({ replicas: scalarSchema('number') }) });

describe('SchemaResolver', () => {
  it('returns the object schema of a type', async () => {
    const resolver = new SchemaResolver(new InMemorySchemaRegistry([['apps/v1/Deployment', deploymentSchema]]));
    await expect(resolver.schemaFor(deployment)).resolves.toEqual(deploymentSchema);
  });

  it('asks the registry once per type', async () => {
    const registry: SchemaRegistry = { schemaFor: vi.fn(async () => deploymentSchema) };
    const resolver = new SchemaResolver(registry);

    await Promise.all([
      resolver.schemaFor(deployment),
      resolver.schemaFor({ ...deployment, namespace: 'default', name: 'web' }),
    ]);
    await resolver.schemaFor(deployment);

    expect(registry.schemaFor).toHaveBeenCalledTimes(1);
  });

  it('shares a cache handed in by the caller', async () => {
    const cache = new SchemaCache();
    const registry = new InMemorySchemaRegistry([['apps/v1/Deployment', deploymentSchema]]);
    await new SchemaResolver(registry, { cache }).schemaFor(deployment);
    expect(cache.has(deployment)).toBe(true);
  });

  it('fails for types without a schema', async () => {
    const resolver = new SchemaResolver(new InMemorySchemaRegistry());
    await expect(resolver.schemaFor(deployment)).rejects.toThrow(
      'no schema registered for apps/v1, Kind=Deployment',
    );
  });

  it('fails for schemas that do not describe an object', async () => {
    const resolver = new SchemaResolver(
      new InMemorySchemaRegistry([['apps/v1/Deployment', scalarSchema('string')]]),
    );
    await expect(resolver.schemaFor(deployment)).rejects.toThrow(
      'schema for apps/v1, Kind=Deployment must describe an object, got scalar',
    );
  });

  it('wraps registry failures and retries on the next lookup', async () => {
    const schemaFor = vi
      .fn<SchemaRegistry['schemaFor']>()
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockResolvedValueOnce(deploymentSchema);
    const resolver = new SchemaResolver({ schemaFor });

    const failure = resolver.schemaFor(deployment);
    await expect(failure).rejects.toBeInstanceOf(SchemaError);
    await expect(failure).rejects.toThrow(
      'schema registry failed for apps/v1, Kind=Deployment: connection refused',
    );
    await expect(resolver.schemaFor(deployment)).resolves.toEqual(deploymentSchema);
  });
});
