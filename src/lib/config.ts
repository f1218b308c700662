import os from 'node:os';
import path from 'node:path';
import { APP_NAME, DEFAULT_BASE_URL, DEFAULT_CONCURRENCY, TOKEN_TTL_MS } from './constants';
import { AuthError } from './errors';
import { RetryPolicy, type RetryPolicyOptions } from './retry';

export type ProgressPhase = 'pages' | 'sensors';

export interface ProgressEvent {
  phase: ProgressPhase;
  label: string;
  completed: number;
  total: number;
}

export type ProgressListener = (event: ProgressEvent) => void;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ComeposOptions {
  username: string;
  password: string;
  /** Where the cache lives. Defaults to the per-user data directory. */
  cacheDir?: string;
  baseUrl?: string;
  concurrency?: number;
  retry?: RetryPolicy | RetryPolicyOptions;
  tokenTtlMs?: number;
  fetch?: FetchLike;
  onProgress?: ProgressListener;
}

export interface ResolvedConfig {
  username: string;
  password: string;
  cacheDir: string;
  baseUrl: string;
  concurrency: number;
  retry: RetryPolicy;
  tokenTtlMs: number;
  fetch: FetchLike;
  onProgress?: ProgressListener;
}

type Env = Record<string, string | undefined>;

export function userDataDir(
  appName = APP_NAME,
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home = os.homedir()
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA?.trim() || path.join(home, 'AppData', 'Local');
    return path.join(base, appName);
  }
  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', appName);
  }
  const xdg = env.XDG_DATA_HOME?.trim();
  return path.join(xdg || path.join(home, '.local', 'share'), appName);
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function resolveConfig(options: ComeposOptions, env: Env = process.env): ResolvedConfig {
  const username = options.username?.trim();
  const password = options.password;
  if (!username || !password) {
    throw new AuthError('Missing username or password');
  }

  const baseUrl = options.baseUrl || env.COMEPOS_BASE_URL?.trim() || DEFAULT_BASE_URL;
  const cacheDir = options.cacheDir || env.COMEPOS_CACHE_DIR?.trim() || userDataDir(APP_NAME, env);
  const retry =
    options.retry instanceof RetryPolicy ? options.retry : new RetryPolicy(options.retry);

  return {
    username,
    password,
    cacheDir: path.resolve(cacheDir),
    baseUrl: withTrailingSlash(baseUrl),
    concurrency: Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY)),
    retry,
    tokenTtlMs: options.tokenTtlMs ?? TOKEN_TTL_MS,
    fetch: options.fetch ?? ((input, init) => fetch(input, init)),
    onProgress: options.onProgress,
  };
}
