export interface Credentials {
  username: string;
  password: string;
}

export interface Building {
  id: string;
  name: string | null;
  address: string | null;
  metadata: Record<string, unknown>;
}

export interface Zone {
  id: string;
  buildingId: string;
  name: string | null;
  metadata: Record<string, unknown>;
}

export interface BuildingStatus {
  firstMeasurementDate: Date;
  lastMeasurementDate: Date | null;
  lastVariableValueChangedDate: Date;
}

export interface Sensor {
  id: string;
  buildingId: string;
  zone: string | null;
  device: string | null;
  label: string | null;
  type: string | null;
  serviceName: string;
  variableName: string;
  uniqueId: string;
  unit: string | null;
  historics: boolean;
  slug: string;
}

/**
 * What the vendor needs to address one variable's history.
 */
export type SensorRef = Pick<Sensor, 'buildingId' | 'serviceName' | 'variableName'> & {
  slug?: string;
};

export interface Reading {
  timestamp: number; // epoch ms
  value: number;
}

export interface TimeBounds {
  start?: Date | number | null;
  end?: Date | number | null;
}
