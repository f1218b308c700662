import { z } from 'zod';

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === '' ? null : String(value)));

const epochMs = z
  .union([z.number(), z.string().regex(/^-?\d+(\.\d+)?$/)])
  .transform(Number)
  .pipe(z.number().finite());

const flag = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((value) => value === true || value === 1 || value === '1' || value === 'true');

export const BuildingPayloadSchema = z
  .object({
    id: identifier,
    name: optionalText,
    address: optionalText,
  })
  .passthrough();

export const BuildingListPayloadSchema = z.array(BuildingPayloadSchema);

export const ZonePayloadSchema = z
  .object({
    id: identifier,
    name: optionalText,
  })
  .passthrough();

export const ZoneListPayloadSchema = z.array(ZonePayloadSchema);

export const StatusPayloadSchema = z
  .array(
    z
      .object({
        firstMeasurementDate: epochMs,
        lastMeasurementDate: epochMs.nullish(),
        lastVariableValueChangedDate: epochMs,
      })
      .passthrough()
  )
  .min(1, { message: 'Empty building status' });

export const SensorPayloadSchema = z
  .object({
    id: identifier,
    zone: optionalText,
    device: optionalText,
    label: optionalText,
    type: optionalText,
    serviceName: z.string().min(1),
    variableName: z.string().min(1),
    uniqueId: identifier,
    unit: optionalText,
    historics: flag,
  })
  .passthrough();

export const SensorListPayloadSchema = z.array(SensorPayloadSchema);

export const HistoryPointSchema = z.object({
  date: epochMs,
  value: z.union([z.number(), z.string(), z.null()]),
});

export const HistoryPayloadSchema = z.array(HistoryPointSchema).nullable();

export const HistorySizePayloadSchema = z
  .union([z.number(), z.string().regex(/^\d+$/)])
  .transform(Number)
  .pipe(z.number().int().nonnegative());

export type BuildingPayload = z.infer<typeof BuildingPayloadSchema>;
export type ZonePayload = z.infer<typeof ZonePayloadSchema>;
export type SensorPayload = z.infer<typeof SensorPayloadSchema>;
export type HistoryPoint = z.infer<typeof HistoryPointSchema>;
