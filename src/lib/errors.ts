import type { ZodIssue } from 'zod';

export enum ComeposErrorType {
  AUTH_FAILED = 'AUTH_FAILED',
  TRANSPORT = 'TRANSPORT',
  DECODE = 'DECODE',
  NOT_FOUND = 'NOT_FOUND',
  CACHE_CORRUPT = 'CACHE_CORRUPT',
  INTERNAL = 'INTERNAL',
}

/**
 * Building / sensor the failing call was made for.
 */
export interface ErrorContext {
  buildingId?: string;
  sensor?: string;
  endpoint?: string;
}

export class ComeposError extends Error {
  public context: ErrorContext;

  constructor(
    public readonly type: ComeposErrorType,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ComeposError';
    this.context = { ...options.context };
  }
}

/**
 * Bad credentials or a rejected session. Never retried.
 */
export class AuthError extends ComeposError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(ComeposErrorType.AUTH_FAILED, message, options);
    this.name = 'AuthError';
  }
}

export class TransportError extends ComeposError {
  public readonly httpStatus?: number;

  constructor(
    message: string,
    options: { httpStatus?: number; context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(ComeposErrorType.TRANSPORT, message, options);
    this.name = 'TransportError';
    this.httpStatus = options.httpStatus;
  }

  // Network failures, throttling and server-side errors are worth another attempt.
  get retryable(): boolean {
    if (this.httpStatus === undefined) return true;
    return this.httpStatus === 429 || this.httpStatus >= 500;
  }
}

export class DecodeError extends ComeposError {
  public readonly issues: ZodIssue[];

  constructor(
    message: string,
    options: { issues?: ZodIssue[]; context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(ComeposErrorType.DECODE, message, options);
    this.name = 'DecodeError';
    this.issues = options.issues ?? [];
  }
}

export class NotFoundError extends ComeposError {
  constructor(
    public readonly resource: string,
    public readonly id: string,
    options: { context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(ComeposErrorType.NOT_FOUND, `${resource} with ID ${id} not found`, options);
    this.name = 'NotFoundError';
  }
}

export class CacheCorruptError extends ComeposError {
  constructor(
    public readonly path: string,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(ComeposErrorType.CACHE_CORRUPT, `Unreadable cache file ${path}: ${message}`, options);
    this.name = 'CacheCorruptError';
  }
}

/**
 * A local failure (cache file I/O, an unexpected exception) surfaced with the
 * building / sensor it happened for. The original error is kept as `cause`.
 */
export class InternalError extends ComeposError {
  /** Node system error code of the cause, e.g. `ENOTDIR`. */
  public readonly code?: string;

  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(ComeposErrorType.INTERNAL, message, options);
    this.name = 'InternalError';
    const { cause } = options;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
      this.code = cause.code;
    }
  }
}

export function isComeposError(error: unknown): error is ComeposError {
  return error instanceof ComeposError;
}

/**
 * Annotates an error raised deeper in the stack with the building / sensor it
 * was raised for. Non-library errors are wrapped in an InternalError.
 */
export function withContext(error: unknown, context: ErrorContext): ComeposError {
  if (error instanceof ComeposError) {
    error.context = { ...context, ...error.context };
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { context, cause: error });
}

export function describeError(error: unknown): string {
  if (error instanceof ComeposError) {
    const where = [error.context.buildingId, error.context.sensor].filter(Boolean).join('/');
    return where ? `${error.name} (${where}): ${error.message}` : `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface RefreshFailure {
  slug: string;
  error: ComeposError;
}

/**
 * Raised after a batch refresh completes when at least one sensor failed.
 */
export class BatchRefreshError extends AggregateError {
  constructor(public readonly failures: RefreshFailure[]) {
    super(
      failures.map((f) => f.error),
      `${failures.length} sensor(s) failed to refresh: ${failures.map((f) => f.slug).join(', ')}`
    );
    this.name = 'BatchRefreshError';
  }
}
