import type { ZodType, ZodTypeDef } from 'zod';
import { ENDPOINTS, TOKEN_TTL_MS } from '../constants';
import type { FetchLike } from '../config';
import {
  AuthError,
  DecodeError,
  NotFoundError,
  TransportError,
  type ErrorContext,
} from '../errors';
import { RetryPolicy } from '../retry';
import type { Credentials } from './types';

export type QueryValue = string | number | null | undefined;

export interface VestaClientOptions extends Credentials {
  baseUrl: string;
  retry?: RetryPolicy;
  tokenTtlMs?: number;
  fetch?: FetchLike;
  now?: () => number;
}

interface Session {
  token: string;
  obtainedAt: number;
}

/**
 * Thin HTTP client for the Vesta Energy web service. Holds the credentials
 * and the session token; the per-endpoint queries live in `./queries`.
 */
export class VestaClient {
  readonly baseUrl: string;
  readonly retry: RetryPolicy;
  private readonly username: string;
  private readonly password: string;
  private readonly tokenTtlMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private session: Session | null = null;
  private pendingLogin: Promise<string> | null = null;

  constructor(options: VestaClientOptions) {
    this.baseUrl = options.baseUrl;
    this.username = options.username;
    this.password = options.password;
    this.retry = options.retry ?? new RetryPolicy();
    this.tokenTtlMs = options.tokenTtlMs ?? TOKEN_TTL_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  get isAuthenticated(): boolean {
    return this.session !== null && !this.isExpired(this.session);
  }

  /**
   * Logs in and returns a fresh token. Concurrent callers share one login.
   */
  authenticate(): Promise<string> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  async getToken(): Promise<string> {
    if (this.session && !this.isExpired(this.session)) return this.session.token;
    return this.authenticate();
  }

  async logout(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;

    try {
      const res = await this.fetchImpl(this.buildUrl(ENDPOINTS.logout, { token: session.token }));
      if (!res.ok) {
        console.error(`Error logging out: ${res.status} ${res.statusText}`);
      }
    } catch (err) {
      console.error('Error logging out:', err);
    }
  }

  /**
   * Authenticated GET returning the decoded JSON body. An empty body decodes
   * as `null` before validation.
   */
  async get<T>(
    endpoint: string,
    params: Record<string, QueryValue>,
    schema: ZodType<T, ZodTypeDef, unknown>,
    context: ErrorContext = {}
  ): Promise<T> {
    const ctx = { ...context, endpoint };
    return this.retry.run(endpoint, async () => {
      const token = await this.getToken();
      const res = await this.send(this.buildUrl(endpoint, { ...params, token }), ctx);

      if (res.status === 401 || res.status === 403) {
        this.session = null;
        throw new AuthError(`Session rejected by ${endpoint}: ${res.status}`, { context: ctx });
      }
      if (res.status === 404) {
        throw ctx.sensor
          ? new NotFoundError('Sensor', ctx.sensor, { context: ctx })
          : new NotFoundError('Building', String(params.building ?? ctx.buildingId), { context: ctx });
      }
      if (!res.ok) {
        const body = await res.text().catch(() => res.statusText);
        throw new TransportError(`${endpoint} failed: ${res.status} ${body}`.trim(), {
          httpStatus: res.status,
          context: ctx,
        });
      }

      return decodeBody(await res.text(), schema, ctx);
    });
  }

  buildUrl(endpoint: string, params: Record<string, QueryValue> = {}): string {
    const url = new URL(endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value === null || value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async login(): Promise<string> {
    const url = this.buildUrl(ENDPOINTS.login, {
      login: this.username,
      password: this.password,
    });
    const ctx = { endpoint: ENDPOINTS.login };

    const token = await this.retry.run(ENDPOINTS.login, async () => {
      const res = await this.send(url, ctx);
      if (!res.ok) {
        throw new AuthError(`Login failed: ${res.status} ${res.statusText}`.trim(), {
          context: ctx,
        });
      }
      return (await res.text()).trim();
    });

    if (!token) {
      throw new AuthError('Login failed: empty token', { context: ctx });
    }
    this.session = { token, obtainedAt: this.now() };
    return token;
  }

  private async send(url: string, context: ErrorContext): Promise<Response> {
    try {
      return await this.fetchImpl(url);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Network error on ${context.endpoint}: ${message}`, {
        context,
        cause: err,
      });
    }
  }

  private isExpired(session: Session): boolean {
    return this.now() - session.obtainedAt >= this.tokenTtlMs;
  }
}

export function decodeBody<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  context: ErrorContext = {}
): T {
  let raw: unknown = null;
  if (text.trim()) {
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new DecodeError(`Invalid JSON from ${context.endpoint ?? 'service'}`, {
        context,
        cause: err,
      });
    }
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(
      `Unexpected payload from ${context.endpoint ?? 'service'}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      { issues: parsed.error.issues, context }
    );
  }
  return parsed.data;
}
