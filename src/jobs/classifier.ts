// src/jobs/classifier.ts
import { JOB_TYPES } from '../types/job';
import type { AttemptResult, Job, JobHeaders, JobStatus, JobType } from '../types/job';
import { getHeader, hasHeader, isHeaderMap } from '../utils/headers';
import { backoffDelaySeconds, rateLimitDelaySeconds } from './backoff';
import type { OutcomeCategory } from './errors';

export const JOB_FINISHED_HEADER = 'x-job-finished';

export interface ClassifierOptions {
  redirectStatus: number;
  rateLimitDefaultDelaySeconds: number;
}

/** A job to create because the target answered with the redirect status. */
export interface SpawnRequest {
  target: string;
  jobType: JobType | null;
  payload: unknown;
  headers: JobHeaders;
  runAt: number | null;
}

export interface ClassifierDecision {
  category: OutcomeCategory;
  status: JobStatus;
  retryCount: number;
  /** Set only when the job is rescheduled. */
  runAt: number | null;
  responseStatus: number;
  responseContent: string | null;
  responseHeaders: JobHeaders;
  logFailure: boolean;
  spawn: SpawnRequest | null;
}

type RetryState = Pick<Job, 'retryCount' | 'retryLimit'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJobType(value: unknown): value is JobType {
  return typeof value === 'string' && JOB_TYPES.some((type) => type === value);
}

/**
 * Reads the job description carried by a redirect response: a JSON body
 * `{ url, job_type?, payload?, headers?, run_at? }`, with the Location
 * header standing in for a missing url.
 */
export function parseSpawnRequest(result: AttemptResult): SpawnRequest | null {
  let body: Record<string, unknown> = {};

  if (result.body) {
    try {
      const parsed: unknown = JSON.parse(result.body);
      if (isRecord(parsed)) body = parsed;
    } catch {
      body = {};
    }
  }

  const url = typeof body.url === 'string' && body.url ? body.url : getHeader(result.headers, 'location');
  if (!url) return null;

  if (body.job_type !== undefined && !isJobType(body.job_type)) return null;

  let runAt: number | null = null;
  if (typeof body.run_at === 'string') {
    const parsed = Date.parse(body.run_at);
    if (Number.isNaN(parsed)) return null;
    runAt = parsed;
  }

  return {
    target: url,
    jobType: isJobType(body.job_type) ? body.job_type : null,
    payload: body.payload ?? {},
    headers: isHeaderMap(body.headers) ? body.headers : {},
    runAt
  };
}

function failure(
  job: RetryState,
  result: AttemptResult,
  category: OutcomeCategory,
  delaySeconds: number,
  nowMs: number
): ClassifierDecision {
  const exhausted = job.retryCount + 1 > job.retryLimit;

  return {
    category: exhausted ? 'RetriesExhausted' : category,
    status: exhausted ? 'too_many' : 'failed',
    retryCount: job.retryCount + 1,
    runAt: exhausted ? null : nowMs + delaySeconds * 1000,
    responseStatus: result.error !== undefined ? 0 : result.status,
    responseContent: result.error !== undefined ? result.error : result.body,
    responseHeaders: result.headers,
    logFailure: true,
    spawn: null
  };
}

function settled(
  job: RetryState,
  result: AttemptResult,
  category: OutcomeCategory,
  status: JobStatus,
  spawn: SpawnRequest | null = null
): ClassifierDecision {
  return {
    category,
    status,
    retryCount: job.retryCount,
    runAt: null,
    responseStatus: result.status,
    responseContent: result.body,
    responseHeaders: result.headers,
    logFailure: false,
    spawn
  };
}

/**
 * Maps one finished attempt to the job's next state.
 */
export function classifyAttempt(
  job: RetryState,
  result: AttemptResult,
  nowMs: number,
  options: ClassifierOptions
): ClassifierDecision {
  if (result.error !== undefined) {
    return failure(job, result, 'InternalExecutionError', backoffDelaySeconds(job.retryCount), nowMs);
  }

  const { status } = result;

  if (status === options.redirectStatus) {
    const spawn = parseSpawnRequest(result);
    return spawn
      ? settled(job, result, 'Redirected', 'redirected', spawn)
      : settled(job, result, 'Unclassified', 'other');
  }

  if (status >= 200 && status <= 299) {
    return settled(job, result, 'Success', 'completed');
  }

  if (status === 429) {
    const delay = rateLimitDelaySeconds(
      getHeader(result.headers, 'retry-after'),
      nowMs,
      options.rateLimitDefaultDelaySeconds
    );
    return failure(job, result, 'RateLimited', delay, nowMs);
  }

  if (status >= 400 && status <= 499) {
    if (hasHeader(result.headers, JOB_FINISHED_HEADER)) {
      return settled(job, result, 'PermanentClientSuccess', 'completed');
    }
    return failure(job, result, 'TransientFailure', backoffDelaySeconds(job.retryCount), nowMs);
  }

  if (status >= 500 && status <= 599) {
    return settled(job, result, 'PermanentServerFailure', 'server_error');
  }

  return settled(job, result, 'Unclassified', 'other');
}

export const LEASE_EXPIRED_STATUS = 408;
export const LEASE_EXPIRED_MESSAGE = 'Poll job not acknowledged in time';

/**
 * A POLL lease ran out without an ack: a failed attempt that returns the
 * job to `new` for the next pull consumer. 4xx/5xx rules do not apply.
 */
export function classifyLeaseExpiry(job: RetryState, nowMs: number): ClassifierDecision {
  const exhausted = job.retryCount + 1 > job.retryLimit;

  return {
    category: exhausted ? 'RetriesExhausted' : 'LeaseExpired',
    status: exhausted ? 'too_many' : 'new',
    retryCount: job.retryCount + 1,
    runAt: exhausted ? null : nowMs,
    responseStatus: LEASE_EXPIRED_STATUS,
    responseContent: LEASE_EXPIRED_MESSAGE,
    responseHeaders: {},
    logFailure: true,
    spawn: null
  };
}
