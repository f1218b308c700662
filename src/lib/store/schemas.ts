import { z } from 'zod';
import { CACHE_FORMAT_VERSION } from '../constants';

export const CachedBuildingSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  address: z.string().nullable(),
  metadata: z.record(z.unknown()),
});

export const CachedZoneSchema = z.object({
  id: z.string(),
  buildingId: z.string(),
  name: z.string().nullable(),
  metadata: z.record(z.unknown()),
});

export const CachedSensorSchema = z.object({
  id: z.string(),
  buildingId: z.string(),
  zone: z.string().nullable(),
  device: z.string().nullable(),
  label: z.string().nullable(),
  type: z.string().nullable(),
  serviceName: z.string(),
  variableName: z.string(),
  uniqueId: z.string(),
  unit: z.string().nullable(),
  historics: z.boolean(),
  slug: z.string(),
});

export const CatalogFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  key: z.string(),
  items: z.array(z.unknown()),
});

export const SeriesFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  key: z.string(),
  watermark: z.number().nullable(),
  readings: z.array(z.tuple([z.number(), z.number()])),
});

export type SeriesFile = z.infer<typeof SeriesFileSchema>;
