/**
 * Resource type resolution
 */
import { describe, it, expect, vi } from 'vitest';
import { createResourceIdentity } from '@kubeimport/types';
import { CanceledError, ResolutionError } from '../../src/errors.js';
import { describeScopeMismatch, resolveType, type TypeRegistry } from '../../src/resolver/type-resolver.js';
import { FakeTypeRegistry, createSilentConsole, endpoint } from '../fakes.js';

const apps = { group: 'apps', version: 'v1' };
const core = { group: '', version: 'v1' };
const deployments = endpoint(apps, 'Deployment', 'deployments', true);
const namespaces = endpoint(core, 'Namespace', 'namespaces', false);

const web = createResourceIdentity({ ...apps, kind: 'Deployment', namespace: 'default', name: 'web' });

describe('resolveType', () => {
  it('returns the endpoint and scope of a known type', async () => {
    const registry = new FakeTypeRegistry([deployments, namespaces]);
    await expect(resolveType(web, registry)).resolves.toEqual({ endpoint: deployments, namespaced: true });
  });

  it('fails for a type the registry does not know', async () => {
    const registry = new FakeTypeRegistry([namespaces]);
    const resolution = resolveType(web, registry);

    await expect(resolution).rejects.toBeInstanceOf(ResolutionError);
    await expect(resolution).rejects.toMatchObject({
      reason: 'unknown-type',
      message: 'no matches for kind "Deployment" in version "apps/v1"',
    });
  });

  it('reports an unreachable registry', async () => {
    const registry: TypeRegistry = {
      lookupEndpoint: vi.fn(async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:6443');
      }),
      isNamespaceScoped: vi.fn(async () => true),
    };

    await expect(resolveType(web, registry)).rejects.toMatchObject({
      reason: 'unreachable',
      message: 'type registry is unreachable: connect ECONNREFUSED 127.0.0.1:6443',
    });
  });

  it('does not ask the registry once the signal is aborted', async () => {
    const registry = new FakeTypeRegistry([deployments]);
    const controller = new AbortController();
    controller.abort();

    await expect(resolveType(web, registry, { signal: controller.signal })).rejects.toBeInstanceOf(
      CanceledError,
    );
    expect(registry.lookups).toBe(0);
  });

  it('reports a namespace on a cluster-scoped type without failing', async () => {
    const registry = new FakeTypeRegistry([namespaces]);
    const logger = createSilentConsole();
    const warn = vi.spyOn(logger, 'warn');
    const identity = createResourceIdentity({ ...core, kind: 'Namespace', namespace: 'default', name: 'team-a' });

    const resolution = await resolveType(identity, registry, { logger });

    expect(resolution.namespaced).toBe(false);
    expect(resolution.scopeMismatch).toBe('Namespace is cluster-scoped; namespace "default" will be ignored');
    expect(warn).toHaveBeenCalledWith(
      '[resolveType] Namespace is cluster-scoped; namespace "default" will be ignored',
    );
  });
});

describe('describeScopeMismatch', () => {
  it('flags a namespaced type without a namespace', () => {
    const identity = createResourceIdentity({ ...apps, kind: 'Deployment', name: 'web' });
    expect(describeScopeMismatch(identity, true)).toBe(
      'Deployment is namespaced but the import ID does not name a namespace',
    );
  });

  it('accepts matching scopes', () => {
    expect(describeScopeMismatch(web, true)).toBeUndefined();
    expect(
      describeScopeMismatch(createResourceIdentity({ ...core, kind: 'Namespace', name: 'team-a' }), false),
    ).toBeUndefined();
  });
});
