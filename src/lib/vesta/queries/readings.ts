import { ENDPOINTS, MAX_LINE_PER_REQUEST } from '../../constants';
import type { ProgressListener } from '../../config';
import { mergeReadings, toTimestamp } from '../../series';
import { splitPeriod, toEpochSeconds } from '../../timeRange';
import type { VestaClient } from '../client';
import { HistoryPayloadSchema, HistorySizePayloadSchema } from '../schemas';
import type { BuildingStatus, Reading, SensorRef, TimeBounds } from '../types';

function refParams(ref: SensorRef, bounds: TimeBounds) {
  return {
    building: ref.buildingId,
    serviceName: ref.serviceName,
    variableName: ref.variableName,
    start: toEpochSeconds(bounds.start),
    end: toEpochSeconds(bounds.end),
  };
}

function refContext(ref: SensorRef) {
  return {
    buildingId: ref.buildingId,
    sensor: ref.slug ?? `${ref.serviceName}/${ref.variableName}`,
  };
}

function parseNumeric(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? NaN : Number(trimmed);
}

export async function getVariableHistory(
  client: VestaClient,
  ref: SensorRef,
  bounds: TimeBounds = {}
): Promise<Reading[]> {
  const raw = await client.get(
    ENDPOINTS.history,
    refParams(ref, bounds),
    HistoryPayloadSchema,
    refContext(ref)
  );

  const readings: Reading[] = [];
  let skipped = 0;
  for (const point of raw || []) {
    const value = typeof point.value === 'string' ? parseNumeric(point.value) : point.value;
    if (value === null || !Number.isFinite(value)) {
      skipped++;
      continue;
    }
    readings.push({ timestamp: point.date, value });
  }

  if (skipped > 0) {
    console.warn(`Skipped ${skipped} non-numeric readings for ${refContext(ref).sensor}`);
  }
  return mergeReadings([], readings);
}

export async function getVariableHistorySize(
  client: VestaClient,
  ref: SensorRef,
  bounds: TimeBounds = {}
): Promise<number> {
  return client.get(
    ENDPOINTS.historySize,
    refParams(ref, bounds),
    HistorySizePayloadSchema,
    refContext(ref)
  );
}

export interface FetchReadingsOptions {
  /** Only readings strictly after this instant are returned. */
  since?: Date | number | null;
  /** Needed only when the history has to be sliced; should return a fresh status. */
  getStatus?: () => Promise<BuildingStatus>;
  onProgress?: ProgressListener;
  maxLinesPerRequest?: number;
}

/**
 * Full (or since-watermark) history of one sensor. Histories larger than the
 * per-request limit are fetched in evenly sized time windows.
 */
export async function fetchReadings(
  client: VestaClient,
  ref: SensorRef,
  options: FetchReadingsOptions = {}
): Promise<Reading[]> {
  const since = options.since === null || options.since === undefined ? null : toTimestamp(options.since);
  const maxLines = options.maxLinesPerRequest ?? MAX_LINE_PER_REQUEST;
  const label = refContext(ref).sensor;

  const size = await getVariableHistorySize(client, ref, { start: since });
  if (size === 0) return [];

  let readings: Reading[];
  if (size < maxLines || !options.getStatus) {
    readings = await getVariableHistory(client, ref, { start: since });
    options.onProgress?.({ phase: 'pages', label, completed: 1, total: 1 });
  } else {
    const status = await options.getStatus();
    const periodStart = since ?? status.firstMeasurementDate.getTime();
    const periodEnd = status.lastVariableValueChangedDate.getTime();
    const windows: Array<[number, number]> =
      periodEnd > periodStart
        ? splitPeriod(periodStart, periodEnd, Math.ceil(size / maxLines))
        : [[periodStart, periodEnd]];

    readings = [];
    for (let i = 0; i < windows.length; i++) {
      const [start, end] = windows[i];
      // The last window stays open: rows may land after the status was read.
      const last = i === windows.length - 1;
      const page = await getVariableHistory(client, ref, { start, end: last ? undefined : end });
      readings = mergeReadings(readings, page);
      options.onProgress?.({ phase: 'pages', label, completed: i + 1, total: windows.length });
    }
  }

  return since === null ? readings : readings.filter((r) => r.timestamp > since);
}
