import { toTimestamp } from './series';

export function toEpochSeconds(value: Date | number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  return Math.floor(toTimestamp(value) / 1000);
}

/**
 * Splits [start, end] into `slices` consecutive windows of equal length.
 * Neighbouring windows share their boundary.
 */
export function splitPeriod(start: number, end: number, slices: number): Array<[number, number]> {
  const count = Math.max(1, Math.floor(slices));
  if (end <= start) return [[start, end]];

  const step = (end - start) / count;
  const points: number[] = [];
  for (let i = 0; i <= count; i++) {
    points.push(i === count ? end : Math.round(start + step * i));
  }

  const windows: Array<[number, number]> = [];
  for (let i = 0; i < count; i++) {
    windows.push([points[i], points[i + 1]]);
  }
  return windows;
}
