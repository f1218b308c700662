import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import { CACHE_FORMAT_VERSION } from '../constants';
import { CacheCorruptError } from '../errors';
import { isStrictlyAscending, lastTimestamp } from '../series';
import { slugify } from '../slug';
import type { Reading } from '../vesta/types';
import { CatalogFileSchema, SeriesFileSchema, type SeriesFile } from './schemas';

export interface SeriesEntry {
  key: string;
  watermark: number | null;
  readings: Reading[];
}

export const cacheKeys = {
  buildings: () => 'buildings',
  building: (buildingId: string) => slugify(buildingId),
  sensorsInfo: (buildingId: string) => `${slugify(buildingId)}/sensors_info`,
  zones: (buildingId: string) => `${slugify(buildingId)}/zones`,
  sensor: (buildingId: string, slug: string) => `${slugify(buildingId)}/sensors/${slug}`,
};

let tmpCounter = 0;

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per key under `<cacheDir>/store`. Keys are `/`-separated
 * slugs, e.g. `b1/sensors/svc_temp`.
 */
export class CacheStore {
  readonly root: string;

  constructor(cacheDir: string) {
    this.root = path.join(cacheDir, 'store');
  }

  pathFor(key: string): string {
    const segments = key.split('/').filter(Boolean);
    if (segments.length === 0 || segments.some((s) => s === '.' || s === '..')) {
      throw new RangeError(`Invalid cache key: ${key}`);
    }
    return `${path.join(this.root, ...segments)}.json`;
  }

  async readCatalog<T>(key: string, itemSchema: ZodType<T, ZodTypeDef, unknown>): Promise<T[] | null> {
    const file = this.pathFor(key);
    const raw = await this.readJson(file);
    if (raw === undefined) return null;

    const parsed = CatalogFileSchema.safeParse(raw);
    if (!parsed.success || parsed.data.key !== key) {
      throw new CacheCorruptError(file, parsed.success ? 'key mismatch' : parsed.error.issues[0]?.message ?? 'invalid');
    }

    const items: T[] = [];
    for (const item of parsed.data.items) {
      const result = itemSchema.safeParse(item);
      if (!result.success) {
        throw new CacheCorruptError(file, result.error.issues[0]?.message ?? 'invalid item');
      }
      items.push(result.data);
    }
    return items;
  }

  async writeCatalog<T>(key: string, items: readonly T[]): Promise<void> {
    await this.writeJson(this.pathFor(key), { version: CACHE_FORMAT_VERSION, key, items });
  }

  async readSeries(key: string): Promise<SeriesEntry | null> {
    const file = this.pathFor(key);
    const raw = await this.readJson(file);
    if (raw === undefined) return null;

    const parsed = SeriesFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CacheCorruptError(file, parsed.error.issues[0]?.message ?? 'invalid');
    }
    if (parsed.data.key !== key) {
      throw new CacheCorruptError(file, `holds ${parsed.data.key}`);
    }

    const readings = parsed.data.readings.map(([timestamp, value]) => ({ timestamp, value }));
    if (!isStrictlyAscending(readings)) {
      throw new CacheCorruptError(file, 'readings out of order');
    }
    if (parsed.data.watermark !== lastTimestamp(readings)) {
      throw new CacheCorruptError(file, 'watermark does not match the last reading');
    }
    return { key, watermark: parsed.data.watermark, readings };
  }

  async writeSeries(key: string, readings: readonly Reading[]): Promise<SeriesEntry> {
    if (!isStrictlyAscending(readings)) {
      throw new RangeError(`Refusing to cache unordered readings for ${key}`);
    }
    const watermark = lastTimestamp(readings);
    const file: SeriesFile = {
      version: CACHE_FORMAT_VERSION,
      key,
      watermark,
      readings: readings.map((r) => [r.timestamp, r.value]),
    };
    await this.writeJson(this.pathFor(key), file);
    return { key, watermark, readings: [...readings] };
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  /**
   * Removes every key below `prefix` (and the prefix's own file, if any).
   */
  async removeTree(prefix: string): Promise<void> {
    const file = this.pathFor(prefix);
    await rm(file.slice(0, -'.json'.length), { recursive: true, force: true });
    await rm(file, { force: true });
  }

  async clear(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }

  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new CacheCorruptError(file, 'not valid JSON', { cause: err });
    }
  }

  private async writeJson(file: string, data: unknown): Promise<void> {
    await mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.${++tmpCounter}.tmp`;
    await writeFile(tmp, JSON.stringify(data), 'utf8');
    await rename(tmp, file);
  }
}
