/**
 * Server-side field removal
 */
import { describe, it, expect } from 'vitest';
import type { JsonObject } from '@kubeimport/types';
import { removeServerSideFields } from '../../src/filter/server-fields.js';

function liveDeployment(): JsonObject {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name: 'web',
      namespace: 'default',
      labels: { app: 'web' },
      uid: '00000000-0000-0000-0000-000000000001',
      creationTimestamp: '2026-01-01T00:00:00Z',
      resourceVersion: '42',
      generation: 3,
      managedFields: [{ manager: 'kubectl' }],
      selfLink: '/apis/apps/v1/namespaces/default/deployments/web',
    },
    spec: {
      replicas: 2,
      status: 'kept because it is not top-level',
    },
    status: { readyReplicas: 2 },
  };
}

describe('removeServerSideFields', () => {
  it('removes status and server-owned metadata', () => {
    expect(removeServerSideFields(liveDeployment())).toEqual({
      apiVersion: 'apps/v1',
      kind: 'Deployment',
      metadata: {
        name: 'web',
        namespace: 'default',
        labels: { app: 'web' },
      },
      spec: {
        replicas: 2,
        status: 'kept because it is not top-level',
      },
    });
  });

  it('does not modify its input', () => {
    const input = liveDeployment();
    const before = JSON.stringify(input);
    removeServerSideFields(input);
    expect(JSON.stringify(input)).toBe(before);
  });

  it('leaves objects without metadata or status as they are', () => {
    expect(removeServerSideFields({ kind: 'Thing', data: { a: '1' } })).toEqual({
      kind: 'Thing',
      data: { a: '1' },
    });
  });

  it('ignores a metadata field that is not an object', () => {
    expect(removeServerSideFields({ metadata: 'odd', status: {} })).toEqual({ metadata: 'odd' });
  });
});
