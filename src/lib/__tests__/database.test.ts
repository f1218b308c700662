import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ProgressEvent } from '../config';
import { ComeposDB } from '../db';
import { MAX_LINE_PER_REQUEST } from '../constants';
import {
  BatchRefreshError,
  ComeposErrorType,
  InternalError,
  NotFoundError,
  TransportError,
} from '../errors';
import { CachedBuildingSchema } from '../store/schemas';
import { BASE_URL, historyKey, makeFakeVesta, sensorPayload } from './fakeVesta';

const T1 = Date.UTC(2024, 0, 1, 0, 0);
const T2 = Date.UTC(2024, 0, 1, 0, 10);
const T3 = Date.UTC(2024, 0, 1, 0, 20);

const TEMP = historyKey('B1', 'svc', 'temp');
const HUM = historyKey('B1', 'svc', 'hum');

describe('ComeposDB', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'comepos-db-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function setup(onProgress?: (event: ProgressEvent) => void) {
    const vesta = makeFakeVesta({
      buildings: [{ id: 'B1', name: 'Maison A', address: '1 rue X' }],
      sensors: { B1: [sensorPayload(1, 'svc', 'temp'), sensorPayload(2, 'svc', 'hum')] },
      zones: { B1: [{ id: 1, name: 'Zone 1' }] },
      status: {
        B1: [
          {
            firstMeasurementDate: T1,
            lastMeasurementDate: T2,
            lastVariableValueChangedDate: T2,
          },
        ],
      },
      history: {
        [TEMP]: [
          { date: T1, value: 20.1 },
          { date: T2, value: 20.3 },
        ],
        [HUM]: [{ date: T1, value: 45 }],
      },
    });
    const db = new ComeposDB({
      username: 'user',
      password: 'test-secret',
      cacheDir: dir,
      baseUrl: BASE_URL,
      retry: { maxAttempts: 1 },
      fetch: vesta.fetch,
      onProgress,
    });
    return { vesta, db };
  }

  it('fetches the full history on first access, then appends on refresh', async () => {
    const { vesta, db } = setup();
    const building = await db.getBuilding('B1');
    const sensor = await building.findSensor('svc', 'temp');

    expect(await sensor.data()).toEqual([
      { timestamp: T1, value: 20.1 },
      { timestamp: T2, value: 20.3 },
    ]);
    expect(await sensor.lastRetrievedValue()).toBe(T2);

    vesta.state.history[TEMP].push({ date: T3, value: 20.5 });
    expect(await sensor.refresh()).toEqual([
      { timestamp: T1, value: 20.1 },
      { timestamp: T2, value: 20.3 },
      { timestamp: T3, value: 20.5 },
    ]);
    expect(await sensor.lastRetrievedValue()).toBe(T3);

    const [, refreshCall] = vesta.calls('getSensorHistory.php');
    expect(refreshCall.searchParams.get('start')).toBe(String(T2 / 1000));
  });

  it('reloads the building status before slicing a large backlog', async () => {
    const { vesta, db } = setup();
    const building = await db.getBuilding('B1');
    const sensor = await building.getSensor('svc_temp');
    await building.getStatus();
    await sensor.data();

    const backlog = Array.from({ length: MAX_LINE_PER_REQUEST + 1 }, (_, i) => ({
      date: T2 + (i + 1) * 1000,
      value: i,
    }));
    const lastDate = backlog[backlog.length - 1].date;
    vesta.state.history[TEMP] = vesta.state.history[TEMP].concat(backlog);
    vesta.state.status.B1[0].lastVariableValueChangedDate = lastDate;

    expect(await sensor.refresh()).toHaveLength(MAX_LINE_PER_REQUEST + 3);
    expect(await sensor.lastRetrievedValue()).toBe(lastDate);
    expect(vesta.calls('getStatus.php')).toHaveLength(2);
    expect((await building.getStatus()).lastVariableValueChangedDate.getTime()).toBe(lastDate);
  }, 30_000);

  it('serves data() from the cache once populated', async () => {
    const { vesta, db } = setup();
    const sensor = await (await db.getBuilding('B1')).getSensor('svc_temp');

    await sensor.data();
    await sensor.data();
    expect(vesta.calls('getSensorHistory.php')).toHaveLength(1);
  });

  it('leaves the cache file byte-identical when nothing is new', async () => {
    const { db } = setup();
    const sensor = await (await db.getBuilding('B1')).getSensor('svc_temp');
    const file = db.store.pathFor(sensor.key);

    await sensor.refresh();
    const before = await readFile(file, 'utf8');
    const watermark = await sensor.lastRetrievedValue();

    await sensor.refresh();
    expect(await readFile(file, 'utf8')).toBe(before);
    expect(await sensor.lastRetrievedValue()).toBe(watermark);
  });

  it('refresh on an absent entry fetches from the beginning', async () => {
    const { vesta, db } = setup();
    const sensor = await (await db.getBuilding('B1')).getSensor('svc_temp');

    expect(await sensor.refresh()).toHaveLength(2);
    expect(vesta.calls('getSensorHistory.php')[0].searchParams.has('start')).toBe(false);
  });

  it('rebuilds a corrupt cache entry with a full fetch', async () => {
    const { vesta, db } = setup();
    const sensor = await (await db.getBuilding('B1')).getSensor('svc_temp');
    await sensor.data();

    await writeFile(db.store.pathFor(sensor.key), 'not json', 'utf8');
    expect(await sensor.data()).toHaveLength(2);
    expect(vesta.calls('getSensorHistory.php')).toHaveLength(2);
    expect(await db.store.readSeries(sensor.key)).toMatchObject({ watermark: T2 });
    expect(console.warn).toHaveBeenCalled();
  });

  it('refreshes every sensor and isolates failures', async () => {
    const { vesta, db } = setup();
    vesta.state.failing.add(HUM);
    const building = await db.getBuilding('B1');

    const report = await building.refreshAllSensors();
    expect(report.refreshed).toEqual(['svc_temp']);
    expect(report.skipped).toEqual([]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].slug).toBe('svc_hum');
    expect(report.failed[0].error).toBeInstanceOf(TransportError);
    expect(report.failed[0].error.context).toMatchObject({ buildingId: 'B1', sensor: 'svc_hum' });

    const temp = await building.getSensor('svc_temp');
    expect(await db.store.readSeries(temp.key)).toMatchObject({ watermark: T2 });
  });

  it('can raise the batch failures once the batch is done', async () => {
    const { vesta, db } = setup();
    vesta.state.failing.add(HUM);
    const building = await db.getBuilding('B1');

    const error = await building.refreshAllSensors({ throwOnFailure: true }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BatchRefreshError);
    expect((error as BatchRefreshError).failures.map((f) => f.slug)).toEqual(['svc_hum']);
    expect(await (await building.getSensor('svc_temp')).lastRetrievedValue()).toBe(T2);
  });

  it('skips the remaining sensors when aborted', async () => {
    const { db } = setup();
    const building = await db.getBuilding('B1');
    const controller = new AbortController();
    controller.abort();

    const report = await building.refreshAllSensors({ signal: controller.signal });
    expect(report.refreshed).toEqual([]);
    expect(report.skipped).toEqual(['svc_temp', 'svc_hum']);
  });

  it('reports local cache failures as internal errors', async () => {
    const { db } = setup();
    const building = await db.getBuilding('B1');
    await building.getSensors();
    await writeFile(path.join(dir, 'store', 'b1', 'sensors'), 'in the way', 'utf8');

    const report = await building.refreshAllSensors();
    expect(report.refreshed).toEqual([]);
    expect(report.failed.map((f) => f.slug)).toEqual(['svc_temp', 'svc_hum']);

    const [{ error }] = report.failed;
    expect(error).toBeInstanceOf(InternalError);
    expect(error).not.toBeInstanceOf(TransportError);
    expect(error.type).toBe(ComeposErrorType.INTERNAL);
    expect(error).toMatchObject({ code: 'ENOTDIR' });
    expect(error.context).toEqual({ buildingId: 'B1', sensor: 'svc_temp' });
  });

  it('reports progress for pages and sensors', async () => {
    const events: ProgressEvent[] = [];
    const { db } = setup((e) => events.push(e));
    const building = await db.getBuilding('B1');

    await building.refreshAllSensors({ concurrency: 1 });
    expect(events).toEqual([
      { phase: 'pages', label: 'svc_temp', completed: 1, total: 1 },
      { phase: 'sensors', label: 'B1', completed: 1, total: 2 },
      { phase: 'pages', label: 'svc_hum', completed: 1, total: 1 },
      { phase: 'sensors', label: 'B1', completed: 2, total: 2 },
    ]);
  });

  it('persists catalogs for the next handle', async () => {
    const first = setup();
    await (await first.db.getBuilding('B1')).getSensors();

    const second = setup();
    const building = await second.db.getBuilding('B1');
    expect((await building.getSensors()).map((s) => s.slug)).toEqual(['svc_temp', 'svc_hum']);
    expect(second.vesta.calls('getBuildingList.php')).toHaveLength(0);
    expect(second.vesta.calls('getSensors.php')).toHaveLength(0);
  });

  it('hands concurrent callers the same building handle', async () => {
    const { vesta, db } = setup();
    const [first, second] = await Promise.all([db.getBuilding('B1'), db.getBuilding('B1')]);

    expect(second).toBe(first);
    expect(await db.getBuilding('B1')).toBe(first);
    expect(vesta.calls('getBuildingList.php')).toHaveLength(1);
  });

  it('refetches the building catalog after invalidation', async () => {
    const { vesta, db } = setup();
    await db.getBuildings();
    vesta.state.buildings.push({ id: 'B2', name: 'Maison B' });

    expect((await db.getBuildings()).map((b) => b.id)).toEqual(['B1']);
    await db.invalidateBuildings();
    expect((await db.getBuildings()).map((b) => b.id)).toEqual(['B1', 'B2']);
  });

  it('raises NotFoundError for unknown buildings and sensors', async () => {
    const { db } = setup();
    await expect(db.getBuilding('B9')).rejects.toBeInstanceOf(NotFoundError);

    const building = await db.getBuilding('B1');
    await expect(building.getSensor('nope')).rejects.toThrow('Sensor with ID nope not found');
    await expect(building.findSensor('svc', 'co2')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('exposes zones, status and a joined table', async () => {
    const { db } = setup();
    const building = await db.getBuilding('B1');

    expect((await building.getZones()).map((z) => z.name)).toEqual(['Zone 1']);
    expect((await building.getStatus()).lastVariableValueChangedDate.getTime()).toBe(T2);
    expect(await building.sensorsTable()).toEqual([
      { timestamp: T1, svc_temp: 20.1, svc_hum: 45 },
      { timestamp: T2, svc_temp: 20.3, svc_hum: null },
    ]);
  });

  it('clean() removes cached series', async () => {
    const { db } = setup();
    const building = await db.getBuilding('B1');
    const sensor = await building.getSensor('svc_temp');
    await sensor.data();

    await building.clean();
    expect(await db.store.readSeries(sensor.key)).toBeNull();

    await db.clean();
    expect(await db.store.readCatalog('buildings', CachedBuildingSchema)).toBeNull();
  });

  it('logs out on close', async () => {
    const { vesta, db } = setup();
    await db.getBuildings();
    await db.close();
    expect(vesta.calls('logout.php')).toHaveLength(1);
  });
});
