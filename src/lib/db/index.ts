export { ComeposDB } from './database';
export { BuildingDB } from './building';
export type { RefreshAllOptions, RefreshReport } from './building';
export { SensorHandle } from './sensor';
