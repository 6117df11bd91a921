// src/config/engine.ts
export interface EngineConfig {
  port: number;
  sharedSecret: string | null;
  batchSize: number;
  concurrency: number;
  schedulerIntervalMs: number;
  resolveIntervalMs: number;
  requestLostAfterMs: number;
  claimTimeoutMs: number;
  defaultRetryLimit: number;
  redirectStatus: number;
  rateLimitDefaultDelaySeconds: number;
  pollLeaseSeconds: number;
  pollMaxClockSkewSeconds: number;
  defaultFunctionSchema: string;
  httpTimeoutMs: number;
  rowLocking: boolean;
  autoMigrate: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  port: 4000,
  sharedSecret: null,
  batchSize: 100,
  concurrency: 1,
  schedulerIntervalMs: 60_000,
  resolveIntervalMs: 10_000,
  requestLostAfterMs: 900_000,
  claimTimeoutMs: 600_000,
  defaultRetryLimit: 10,
  redirectStatus: 210,
  rateLimitDefaultDelaySeconds: 600,
  pollLeaseSeconds: 60,
  pollMaxClockSkewSeconds: 2,
  defaultFunctionSchema: 'public',
  httpTimeoutMs: 0,
  rowLocking: true,
  autoMigrate: true
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: "${raw}" (expected an integer >= ${min})`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const s = raw.trim().toLowerCase();
  if (s === 'true' || s === '1') return true;
  if (s === 'false' || s === '0') return false;
  throw new Error(`Invalid ${name}: "${raw}" (expected true or false)`);
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;

  return {
    port: readInt(env, 'PORT', d.port, 1),
    sharedSecret: env.MIDDLEWARE_SHARED_SECRET || null,
    batchSize: readInt(env, 'JOBS_BATCH_SIZE', d.batchSize, 1),
    concurrency: readInt(env, 'JOBS_CONCURRENCY', d.concurrency, 1),
    schedulerIntervalMs: readInt(env, 'SCHEDULER_INTERVAL_MS', d.schedulerIntervalMs, 1),
    resolveIntervalMs: readInt(env, 'RESOLVE_INTERVAL_MS', d.resolveIntervalMs, 1),
    requestLostAfterMs: readInt(env, 'REQUEST_LOST_AFTER_MS', d.requestLostAfterMs, 1),
    claimTimeoutMs: readInt(env, 'CLAIM_TIMEOUT_MS', d.claimTimeoutMs, 1),
    defaultRetryLimit: readInt(env, 'DEFAULT_RETRY_LIMIT', d.defaultRetryLimit),
    redirectStatus: readInt(env, 'REDIRECT_STATUS', d.redirectStatus, 100),
    rateLimitDefaultDelaySeconds: readInt(
      env,
      'RATE_LIMIT_DEFAULT_DELAY_SECONDS',
      d.rateLimitDefaultDelaySeconds
    ),
    pollLeaseSeconds: readInt(env, 'POLL_LEASE_SECONDS', d.pollLeaseSeconds, 1),
    pollMaxClockSkewSeconds: readInt(env, 'POLL_MAX_CLOCK_SKEW_SECONDS', d.pollMaxClockSkewSeconds),
    defaultFunctionSchema: env.DEFAULT_FUNCTION_SCHEMA || d.defaultFunctionSchema,
    httpTimeoutMs: readInt(env, 'HTTP_TIMEOUT_MS', d.httpTimeoutMs),
    rowLocking: readBool(env, 'DB_ROW_LOCKING', d.rowLocking),
    autoMigrate: readBool(env, 'DB_AUTO_MIGRATE', d.autoMigrate)
  };
}
