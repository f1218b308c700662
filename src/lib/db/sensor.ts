import { CacheCorruptError, withContext } from '../errors';
import { mergeReadings } from '../series';
import { cacheKeys, type SeriesEntry } from '../store/cacheStore';
import { fetchReadings, getVariableHistorySize } from '../vesta/queries';
import type { BuildingStatus, Reading, Sensor, SensorRef } from '../vesta/types';
import type { DbContext } from './cached';

/**
 * Cached time series of one sensor. The cache entry is an append-only,
 * prefix-complete log whose watermark is its last timestamp.
 */
export class SensorHandle {
  readonly key: string;

  constructor(
    readonly sensor: Sensor,
    private readonly ctx: DbContext,
    private readonly getStatus: () => Promise<BuildingStatus>
  ) {
    this.key = cacheKeys.sensor(sensor.buildingId, sensor.slug);
  }

  get slug(): string {
    return this.sensor.slug;
  }

  get ref(): SensorRef {
    return {
      buildingId: this.sensor.buildingId,
      serviceName: this.sensor.serviceName,
      variableName: this.sensor.variableName,
      slug: this.sensor.slug,
    };
  }

  /**
   * Cached series, fetching the full history first when nothing is cached.
   */
  async data(): Promise<Reading[]> {
    const entry = await this.readEntry();
    if (entry) return entry.readings;

    const readings = await this.fetch(null);
    const written = await this.ctx.store.writeSeries(this.key, readings);
    return written.readings;
  }

  /**
   * Appends readings newer than the watermark and returns the full series.
   * The file is left untouched when the service has nothing new.
   */
  async refresh(): Promise<Reading[]> {
    const entry = await this.readEntry();
    const incoming = await this.fetch(entry?.watermark ?? null);

    const existing = entry?.readings ?? [];
    const merged = mergeReadings(existing, incoming);
    if (entry && merged.length === existing.length) return existing;

    const written = await this.ctx.store.writeSeries(this.key, merged);
    return written.readings;
  }

  async lastRetrievedValue(): Promise<number | null> {
    const entry = await this.readEntry();
    return entry?.watermark ?? null;
  }

  async onlineLength(start?: Date | number): Promise<number> {
    try {
      return await getVariableHistorySize(this.ctx.client, this.ref, { start });
    } catch (err) {
      throw withContext(err, { buildingId: this.sensor.buildingId, sensor: this.slug });
    }
  }

  async length(): Promise<number> {
    return (await this.data()).length;
  }

  async invalidate(): Promise<void> {
    await this.ctx.store.remove(this.key);
  }

  private async readEntry(): Promise<SeriesEntry | null> {
    try {
      return await this.ctx.store.readSeries(this.key);
    } catch (err) {
      if (!(err instanceof CacheCorruptError)) throw err;
      console.warn(`Discarding corrupt cache entry for ${this.slug}:`, err.message);
      await this.ctx.store.remove(this.key);
      return null;
    }
  }

  private async fetch(since: number | null): Promise<Reading[]> {
    try {
      return await fetchReadings(this.ctx.client, this.ref, {
        since,
        getStatus: this.getStatus,
        onProgress: this.ctx.config.onProgress,
      });
    } catch (err) {
      throw withContext(err, { buildingId: this.sensor.buildingId, sensor: this.slug });
    }
  }
}
