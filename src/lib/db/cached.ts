import type { ZodType, ZodTypeDef } from 'zod';
import type { ResolvedConfig } from '../config';
import { CacheCorruptError } from '../errors';
import type { CacheStore } from '../store/cacheStore';
import type { VestaClient } from '../vesta/client';

export interface DbContext {
  client: VestaClient;
  store: CacheStore;
  config: ResolvedConfig;
}

/**
 * Reads a catalog from the cache, or fetches and persists it. A corrupt file
 * is dropped and refetched.
 */
export async function fromCacheOrFetch<T>(
  store: CacheStore,
  key: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fetchItems: () => Promise<T[]>,
  options: { reload?: boolean } = {}
): Promise<T[]> {
  if (!options.reload) {
    try {
      const cached = await store.readCatalog(key, schema);
      if (cached) return cached;
    } catch (err) {
      if (!(err instanceof CacheCorruptError)) throw err;
      console.warn(`Discarding corrupt cache entry ${key}:`, err.message);
      await store.remove(key);
    }
  }

  const items = await fetchItems();
  await store.writeCatalog(key, items);
  return items;
}
