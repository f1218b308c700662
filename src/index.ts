export { ComeposDB, BuildingDB, SensorHandle } from './lib/db';
export type { RefreshAllOptions, RefreshReport } from './lib/db';

export { resolveConfig, userDataDir } from './lib/config';
export type {
  ComeposOptions,
  ResolvedConfig,
  FetchLike,
  ProgressEvent,
  ProgressListener,
} from './lib/config';

export {
  ComeposError,
  ComeposErrorType,
  AuthError,
  TransportError,
  DecodeError,
  NotFoundError,
  CacheCorruptError,
  InternalError,
  BatchRefreshError,
  isComeposError,
  describeError,
} from './lib/errors';
export type { ErrorContext, RefreshFailure } from './lib/errors';

export { RetryPolicy } from './lib/retry';
export type { RetryPolicyOptions } from './lib/retry';

export { CacheStore, cacheKeys } from './lib/store/cacheStore';
export type { SeriesEntry } from './lib/store/cacheStore';

export {
  mergeReadings,
  filterRange,
  resample,
  toWideTable,
  toDateRows,
} from './lib/series';
export type { Aggregate, Bucket, WideRow } from './lib/series';

export * from './lib/vesta';
