import type { Reading } from './vesta/types';

export type Aggregate = 'mean' | 'min' | 'max' | 'sum' | 'last' | 'count';

export interface Bucket {
  bucketStart: number; // epoch ms
  value: number;
  count: number;
}

export interface WideRow {
  timestamp: number;
  [slug: string]: number | null;
}

export function toTimestamp(value: Date | number | string): number {
  const ms = value instanceof Date ? value.getTime() : typeof value === 'number' ? value : new Date(value).getTime();
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Invalid timestamp: ${String(value)}`);
  }
  return ms;
}

export function lastTimestamp(readings: readonly Reading[]): number | null {
  return readings.length > 0 ? readings[readings.length - 1].timestamp : null;
}

/**
 * Ascending by timestamp with duplicates removed. On a tie the first reading
 * seen wins, so values already cached are never overwritten.
 */
export function mergeReadings(existing: readonly Reading[], incoming: readonly Reading[]): Reading[] {
  const byTs = new Map<number, Reading>();
  for (const r of existing) {
    if (!byTs.has(r.timestamp)) byTs.set(r.timestamp, r);
  }
  for (const r of incoming) {
    if (!byTs.has(r.timestamp)) byTs.set(r.timestamp, r);
  }
  return [...byTs.values()].sort((a, b) => a.timestamp - b.timestamp);
}

export function isStrictlyAscending(readings: readonly Reading[]): boolean {
  for (let i = 1; i < readings.length; i++) {
    if (readings[i].timestamp <= readings[i - 1].timestamp) return false;
  }
  return true;
}

export function filterRange(
  readings: readonly Reading[],
  range: { start?: Date | number | string; end?: Date | number | string }
): Reading[] {
  const start = range.start === undefined ? -Infinity : toTimestamp(range.start);
  const end = range.end === undefined ? Infinity : toTimestamp(range.end);
  return readings.filter((r) => r.timestamp >= start && r.timestamp <= end);
}

function aggregate(values: number[], how: Aggregate): number {
  switch (how) {
    case 'mean':
      return values.reduce((sum, v) => sum + v, 0) / values.length;
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
    case 'sum':
      return values.reduce((sum, v) => sum + v, 0);
    case 'last':
      return values[values.length - 1];
    case 'count':
      return values.length;
  }
}

/**
 * Groups readings into fixed buckets aligned on multiples of `bucketMs` since
 * the epoch. Buckets without readings are left out.
 */
export function resample(
  readings: readonly Reading[],
  options: { bucketMs: number; aggregate?: Aggregate }
): Bucket[] {
  const { bucketMs } = options;
  if (!Number.isFinite(bucketMs) || bucketMs <= 0) {
    throw new RangeError(`bucketMs must be positive, got ${bucketMs}`);
  }
  const how = options.aggregate ?? 'mean';

  const groups = new Map<number, number[]>();
  for (const r of readings) {
    const bucketStart = Math.floor(r.timestamp / bucketMs) * bucketMs;
    const values = groups.get(bucketStart) || [];
    values.push(r.value);
    groups.set(bucketStart, values);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([bucketStart, values]) => ({
      bucketStart,
      value: aggregate(values, how),
      count: values.length,
    }));
}

/**
 * Outer join of several series on timestamp, one column per slug.
 */
export function toWideTable(seriesBySlug: Record<string, readonly Reading[]>): WideRow[] {
  const slugs = Object.keys(seriesBySlug);
  const rows = new Map<number, WideRow>();

  for (const slug of slugs) {
    for (const r of seriesBySlug[slug]) {
      let row = rows.get(r.timestamp);
      if (!row) {
        row = { timestamp: r.timestamp };
        for (const s of slugs) row[s] = null;
        rows.set(r.timestamp, row);
      }
      row[slug] = r.value;
    }
  }

  return [...rows.values()].sort((a, b) => a.timestamp - b.timestamp);
}

export function toDateRows(readings: readonly Reading[]): { date: string; value: number }[] {
  return readings.map((r) => ({ date: new Date(r.timestamp).toISOString(), value: r.value }));
}
