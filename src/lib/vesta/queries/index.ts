export { listBuildings, getBuildingStatus, listZones } from './buildings';
export { listSensors } from './sensors';
export { getVariableHistory, getVariableHistorySize, fetchReadings } from './readings';
export type { FetchReadingsOptions } from './readings';
