import { ENDPOINTS } from '../../constants';
import type { VestaClient } from '../client';
import {
  BuildingListPayloadSchema,
  StatusPayloadSchema,
  ZoneListPayloadSchema,
} from '../schemas';
import type { Building, BuildingStatus, Zone } from '../types';

export async function listBuildings(client: VestaClient): Promise<Building[]> {
  const raw = await client.get(ENDPOINTS.buildings, {}, BuildingListPayloadSchema);
  return raw.map(({ id, name, address, ...metadata }) => ({ id, name, address, metadata }));
}

export async function getBuildingStatus(
  client: VestaClient,
  buildingId: string
): Promise<BuildingStatus> {
  const [status] = await client.get(
    ENDPOINTS.status,
    { building: buildingId },
    StatusPayloadSchema,
    { buildingId }
  );
  return {
    firstMeasurementDate: new Date(status.firstMeasurementDate),
    lastMeasurementDate:
      status.lastMeasurementDate === null || status.lastMeasurementDate === undefined
        ? null
        : new Date(status.lastMeasurementDate),
    lastVariableValueChangedDate: new Date(status.lastVariableValueChangedDate),
  };
}

export async function listZones(client: VestaClient, buildingId: string): Promise<Zone[]> {
  const raw = await client.get(
    ENDPOINTS.zones,
    { building: buildingId },
    ZoneListPayloadSchema,
    { buildingId }
  );
  return raw.map(({ id, name, ...metadata }) => ({ id, buildingId, name, metadata }));
}
