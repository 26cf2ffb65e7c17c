import { gvkKey, type FieldSchema, type GroupVersionKind } from '@kubeimport/types';

/**
 * Process-wide schema store, keyed by group/version/kind.
 *
 * Entries are filled on first use and never evicted: a type's schema does
 * not change while the process runs. Concurrent lookups of the same type
 * share one load. A failed load is dropped so the next lookup retries.
 */
export class SchemaCache {
  private readonly entries = new Map<string, Promise<FieldSchema>>();

  getOrLoad(gvk: GroupVersionKind, load: () => Promise<FieldSchema>): Promise<FieldSchema> {
    const key = gvkKey(gvk);
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const loading = load().catch((error: unknown) => {
      this.entries.delete(key);
      throw error;
    });
    this.entries.set(key, loading);
    return loading;
  }

  has(gvk: GroupVersionKind): boolean {
    return this.entries.has(gvkKey(gvk));
  }

  get size(): number {
    return this.entries.size;
  }
}
