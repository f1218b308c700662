export const APP_NAME = 'comepos_fetcher';

export const DEFAULT_BASE_URL = 'http://37.187.134.115/VestaEnergy/Application/service/';

// The vendor closes sessions after roughly half an hour.
export const TOKEN_TTL_MS = 30 * 60 * 1000;

// Larger histories are sliced into several requests.
export const MAX_LINE_PER_REQUEST = 100_000;

export const DEFAULT_CONCURRENCY = 2;

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 8_000,
} as const;

export const CACHE_FORMAT_VERSION = 1;

export const ENDPOINTS = {
  login: 'login.php',
  logout: 'logout.php',
  buildings: 'getBuildingList.php',
  status: 'getStatus.php',
  zones: 'getZones.php',
  sensors: 'getSensors.php',
  history: 'getSensorHistory.php',
  historySize: 'getSensorHistorySize.php',
} as const;
