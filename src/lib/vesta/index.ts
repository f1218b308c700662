export { VestaClient, decodeBody } from './client';
export type { VestaClientOptions, QueryValue } from './client';

export type {
  Credentials,
  Building,
  Zone,
  BuildingStatus,
  Sensor,
  SensorRef,
  Reading,
  TimeBounds,
} from './types';

export {
  listBuildings,
  getBuildingStatus,
  listZones,
  listSensors,
  getVariableHistory,
  getVariableHistorySize,
  fetchReadings,
} from './queries/index';
export type { FetchReadingsOptions } from './queries/index';
