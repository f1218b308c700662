import { ENDPOINTS } from '../../constants';
import { slugify } from '../../slug';
import type { VestaClient } from '../client';
import { SensorListPayloadSchema } from '../schemas';
import type { Sensor } from '../types';

export async function listSensors(client: VestaClient, buildingId: string): Promise<Sensor[]> {
  const raw = await client.get(
    ENDPOINTS.sensors,
    { building: buildingId },
    SensorListPayloadSchema,
    { buildingId }
  );

  // The vendor also sends the last sample (`date`, `value`); it is not part
  // of the descriptor.
  return raw.map((s) => ({
    id: s.id,
    buildingId,
    zone: s.zone,
    device: s.device,
    label: s.label,
    type: s.type,
    serviceName: s.serviceName,
    variableName: s.variableName,
    uniqueId: s.uniqueId,
    unit: s.unit,
    historics: s.historics,
    slug: slugify(s.uniqueId),
  }));
}
