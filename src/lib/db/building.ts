import { Catalog } from '../catalog';
import {
  BatchRefreshError,
  NotFoundError,
  describeError,
  withContext,
  type RefreshFailure,
} from '../errors';
import { runPool } from '../pool';
import { toWideTable, type WideRow } from '../series';
import { cacheKeys } from '../store/cacheStore';
import { CachedSensorSchema, CachedZoneSchema } from '../store/schemas';
import { getBuildingStatus, listSensors, listZones } from '../vesta/queries';
import type { Building, BuildingStatus, Reading, Sensor, Zone } from '../vesta/types';
import { fromCacheOrFetch, type DbContext } from './cached';
import { SensorHandle } from './sensor';

export interface RefreshAllOptions {
  concurrency?: number;
  /** Aborting lets started sensors finish and skips the rest. */
  signal?: AbortSignal;
  /** Throw a BatchRefreshError after the batch instead of only reporting. */
  throwOnFailure?: boolean;
}

export interface RefreshReport {
  refreshed: string[];
  failed: RefreshFailure[];
  skipped: string[];
}

export class BuildingDB {
  private statusPromise: Promise<BuildingStatus> | null = null;
  private readonly sensorCatalog: Catalog<Sensor>;
  private readonly zoneCatalog: Catalog<Zone>;
  private readonly handles = new Map<string, SensorHandle>();

  constructor(
    readonly info: Building,
    private readonly ctx: DbContext
  ) {
    const { client, store } = ctx;
    this.sensorCatalog = new Catalog((reload) =>
      fromCacheOrFetch(
        store,
        cacheKeys.sensorsInfo(info.id),
        CachedSensorSchema,
        () => this.withBuildingContext(listSensors(client, info.id)),
        { reload }
      )
    );
    this.zoneCatalog = new Catalog((reload) =>
      fromCacheOrFetch(
        store,
        cacheKeys.zones(info.id),
        CachedZoneSchema,
        () => this.withBuildingContext(listZones(client, info.id)),
        { reload }
      )
    );
  }

  get id(): string {
    return this.info.id;
  }

  /**
   * First / last measurement dates. Fetched once per handle unless `reload`
   * is set; sliced history fetches always reload it.
   */
  getStatus(options: { reload?: boolean } = {}): Promise<BuildingStatus> {
    if (!this.statusPromise || options.reload) {
      const pending: Promise<BuildingStatus> = this.withBuildingContext(
        getBuildingStatus(this.ctx.client, this.id)
      ).catch((err: unknown) => {
        if (this.statusPromise === pending) this.statusPromise = null;
        throw err;
      });
      this.statusPromise = pending;
    }
    return this.statusPromise;
  }

  getZones(): Promise<readonly Zone[]> {
    return this.zoneCatalog.get();
  }

  getSensors(): Promise<readonly Sensor[]> {
    return this.sensorCatalog.get();
  }

  async reloadSensors(): Promise<readonly Sensor[]> {
    const sensors = await this.sensorCatalog.reload();
    this.handles.clear();
    return sensors;
  }

  async invalidateSensors(): Promise<void> {
    this.sensorCatalog.invalidate();
    this.handles.clear();
    await this.ctx.store.remove(cacheKeys.sensorsInfo(this.id));
  }

  async sensors(): Promise<Map<string, SensorHandle>> {
    const list = await this.getSensors();
    const result = new Map<string, SensorHandle>();
    for (const sensor of list) {
      let handle = this.handles.get(sensor.slug);
      if (!handle) {
        handle = new SensorHandle(sensor, this.ctx, () => this.getStatus({ reload: true }));
        this.handles.set(sensor.slug, handle);
      }
      result.set(sensor.slug, handle);
    }
    return result;
  }

  /**
   * Looks a sensor up by slug or by its vendor unique id.
   */
  async getSensor(slugOrUniqueId: string): Promise<SensorHandle> {
    const handles = await this.sensors();
    const direct = handles.get(slugOrUniqueId);
    if (direct) return direct;

    for (const handle of handles.values()) {
      if (handle.sensor.uniqueId === slugOrUniqueId) return handle;
    }
    throw new NotFoundError('Sensor', slugOrUniqueId, { context: { buildingId: this.id } });
  }

  async findSensor(serviceName: string, variableName: string): Promise<SensorHandle> {
    const handles = await this.sensors();
    for (const handle of handles.values()) {
      const { sensor } = handle;
      if (sensor.serviceName === serviceName && sensor.variableName === variableName) {
        return handle;
      }
    }
    throw new NotFoundError('Sensor', `${serviceName}/${variableName}`, {
      context: { buildingId: this.id },
    });
  }

  /**
   * Refreshes every sensor of the building. One sensor failing never stops
   * the others; failures are collected into the report.
   */
  async refreshAllSensors(options: RefreshAllOptions = {}): Promise<RefreshReport> {
    const handles = [...(await this.sensors()).values()];
    const { onProgress } = this.ctx.config;

    const outcomes = await runPool(handles, (handle) => handle.refresh(), {
      concurrency: options.concurrency ?? this.ctx.config.concurrency,
      signal: options.signal,
      onSettled: (completed, total) =>
        onProgress?.({ phase: 'sensors', label: this.id, completed, total }),
    });

    const report: RefreshReport = { refreshed: [], failed: [], skipped: [] };
    for (const outcome of outcomes) {
      const { slug } = outcome.item;
      if (outcome.status === 'fulfilled') {
        report.refreshed.push(slug);
      } else if (outcome.status === 'rejected') {
        const error = withContext(outcome.error, { buildingId: this.id, sensor: slug });
        console.error(`Error refreshing ${describeError(error)}`);
        report.failed.push({ slug, error });
      } else {
        report.skipped.push(slug);
      }
    }

    if (report.skipped.length > 0) {
      console.warn(`Interrupted: ${report.skipped.length} sensor(s) of ${this.id} were not refreshed.`);
    }
    if (options.throwOnFailure && report.failed.length > 0) {
      throw new BatchRefreshError(report.failed);
    }
    return report;
  }

  /**
   * Cached series of every sensor, keyed by slug. Sensors are read one after
   * the other.
   */
  async sensorsData(): Promise<Record<string, Reading[]>> {
    const result: Record<string, Reading[]> = {};
    for (const [slug, handle] of await this.sensors()) {
      result[slug] = await handle.data();
    }
    return result;
  }

  async sensorsTable(): Promise<WideRow[]> {
    return toWideTable(await this.sensorsData());
  }

  /**
   * Drops every cached file of this building.
   */
  async clean(): Promise<void> {
    this.sensorCatalog.invalidate();
    this.zoneCatalog.invalidate();
    this.handles.clear();
    await this.ctx.store.removeTree(cacheKeys.building(this.id));
  }

  private async withBuildingContext<T>(task: Promise<T>): Promise<T> {
    try {
      return await task;
    } catch (err) {
      throw withContext(err, { buildingId: this.id });
    }
  }
}
