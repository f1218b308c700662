import { Catalog } from '../catalog';
import { resolveConfig, type ComeposOptions, type ResolvedConfig } from '../config';
import { NotFoundError } from '../errors';
import { CacheStore, cacheKeys } from '../store/cacheStore';
import { CachedBuildingSchema } from '../store/schemas';
import { VestaClient } from '../vesta/client';
import { listBuildings } from '../vesta/queries';
import type { Building } from '../vesta/types';
import { BuildingDB } from './building';
import { fromCacheOrFetch, type DbContext } from './cached';

/**
 * Entry point: holds the credentials, the HTTP client and the on-disk cache,
 * and hands out one BuildingDB per building.
 *
 * ```ts
 * const db = new ComeposDB({ username: 'me', password: 'secret' });
 * const building = await db.getBuilding('B1');
 * const temp = await building.findSensor('svc', 'temp');
 * const readings = await temp.refresh();
 * ```
 */
export class ComeposDB {
  readonly config: ResolvedConfig;
  readonly client: VestaClient;
  readonly store: CacheStore;
  private readonly buildingCatalog: Catalog<Building>;
  private readonly buildings = new Map<string, Promise<BuildingDB>>();

  constructor(options: ComeposOptions) {
    this.config = resolveConfig(options);
    this.client = new VestaClient({
      username: this.config.username,
      password: this.config.password,
      baseUrl: this.config.baseUrl,
      retry: this.config.retry,
      tokenTtlMs: this.config.tokenTtlMs,
      fetch: this.config.fetch,
    });
    this.store = new CacheStore(this.config.cacheDir);
    this.buildingCatalog = new Catalog((reload) =>
      fromCacheOrFetch(
        this.store,
        cacheKeys.buildings(),
        CachedBuildingSchema,
        () => listBuildings(this.client),
        { reload }
      )
    );
  }

  private get context(): DbContext {
    return { client: this.client, store: this.store, config: this.config };
  }

  getBuildings(): Promise<readonly Building[]> {
    return this.buildingCatalog.get();
  }

  async reloadBuildings(): Promise<readonly Building[]> {
    const buildings = await this.buildingCatalog.reload();
    this.buildings.clear();
    return buildings;
  }

  async invalidateBuildings(): Promise<void> {
    this.buildingCatalog.invalidate();
    this.buildings.clear();
    await this.store.remove(cacheKeys.buildings());
  }

  /**
   * Concurrent calls for one id share a single BuildingDB.
   */
  getBuilding(buildingId: string): Promise<BuildingDB> {
    const existing = this.buildings.get(buildingId);
    if (existing) return existing;

    const pending: Promise<BuildingDB> = this.openBuilding(buildingId).catch((err: unknown) => {
      if (this.buildings.get(buildingId) === pending) this.buildings.delete(buildingId);
      throw err;
    });
    this.buildings.set(buildingId, pending);
    return pending;
  }

  private async openBuilding(buildingId: string): Promise<BuildingDB> {
    const info = (await this.getBuildings()).find((b) => b.id === buildingId);
    if (!info) {
      throw new NotFoundError('Building', buildingId, { context: { buildingId } });
    }
    return new BuildingDB(info, this.context);
  }

  /**
   * Removes the whole cache directory.
   */
  async clean(): Promise<void> {
    this.buildingCatalog.invalidate();
    this.buildings.clear();
    await this.store.clear();
  }

  async close(): Promise<void> {
    await this.client.logout();
  }
}
