// src/jobs/validation.ts
import {
  JOB_TYPES,
  SIGNING_ALGORITHMS,
  SIGNING_ENCODINGS,
  SIGNING_STYLES
} from '../types/job';
import type {
  JobAuth,
  JobDraft,
  JobHeaders,
  JobType,
  SigningAlgorithm,
  SigningConfig,
  SigningEncoding,
  SigningStyle
} from '../types/job';
import { isHeaderMap } from '../utils/headers';
import { JobValidationError } from './errors';
import { DEFAULT_SIGNING_HEADER } from './signer';

/**
 * Job submission as accepted from producers (snake_case, like the API body).
 */
export interface JobSubmission {
  job_type: JobType;
  target: string;
  owner?: string | null;
  payload?: unknown;
  headers?: JobHeaders;
  auth?: JobAuth | { type: 'session' } | null;
  signing?: {
    secret?: string | null;
    vault?: string | null;
    header?: string;
    style?: SigningStyle;
    algorithm?: SigningAlgorithm;
    encoding?: SigningEncoding;
  } | null;
  retry_limit?: number;
  run_at?: string | number | Date | null;
}

export interface SubmissionDefaults {
  retryLimit: number;
  nowMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find((candidate) => candidate === value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === undefined || value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

function validateTarget(jobType: JobType, target: string, issues: string[]): void {
  if (jobType === 'FUNC' || jobType === 'POLL') return;

  let parsed: URL;
  try {
    parsed = new URL(target);
  } catch {
    issues.push(`target is not a valid URL: ${target}`);
    return;
  }

  if (!['http:', 'https:'].includes(parsed.protocol)) {
    issues.push(`target protocol must be http: or https:, got ${parsed.protocol}`);
  }
}

function readAuth(raw: unknown, issues: string[]): JobAuth | null {
  if (raw === undefined || raw === null) return null;
  if (!isRecord(raw)) {
    issues.push('auth must be an object');
    return null;
  }

  if (raw.type === 'jwt') {
    if (typeof raw.token !== 'string' || raw.token === '') {
      issues.push('auth.token is required for jwt auth');
      return null;
    }
    return { type: 'jwt', token: raw.token };
  }

  if (raw.type === 'session') {
    return { type: 'session', token: null };
  }

  issues.push(`auth.type must be "jwt" or "session"`);
  return null;
}

function readSigning(raw: unknown, issues: string[]): SigningConfig {
  const signing: SigningConfig = {
    secret: null,
    vault: null,
    header: DEFAULT_SIGNING_HEADER,
    style: 'PLAIN',
    algorithm: 'sha256',
    encoding: 'hex'
  };

  if (raw === undefined || raw === null) return signing;
  if (!isRecord(raw)) {
    issues.push('signing must be an object');
    return signing;
  }

  const secret = optionalString(raw.secret);
  if (secret === undefined) issues.push('signing.secret must be a string');
  else signing.secret = secret || null;

  const vault = optionalString(raw.vault);
  if (vault === undefined) issues.push('signing.vault must be a string');
  else signing.vault = vault || null;

  if (raw.header !== undefined) {
    if (typeof raw.header !== 'string' || !/^[A-Za-z0-9!#$%&'*+.^_`|~-]+$/.test(raw.header)) {
      issues.push('signing.header must be a valid header name');
    } else {
      signing.header = raw.header;
    }
  }

  if (raw.style !== undefined) {
    const style = pick(SIGNING_STYLES, raw.style);
    if (style) signing.style = style;
    else issues.push(`signing.style must be one of ${SIGNING_STYLES.join(', ')}`);
  }

  if (raw.algorithm !== undefined) {
    const algorithm = pick(SIGNING_ALGORITHMS, raw.algorithm);
    if (algorithm) signing.algorithm = algorithm;
    else issues.push(`signing.algorithm must be one of ${SIGNING_ALGORITHMS.join(', ')}`);
  }

  if (raw.encoding !== undefined) {
    const encoding = pick(SIGNING_ENCODINGS, raw.encoding);
    if (encoding) signing.encoding = encoding;
    else issues.push(`signing.encoding must be one of ${SIGNING_ENCODINGS.join(', ')}`);
  }

  return signing;
}

function readRunAt(raw: unknown, nowMs: number, issues: string[]): number {
  if (raw === undefined || raw === null) return nowMs;

  const value =
    raw instanceof Date ? raw.getTime() :
    typeof raw === 'number' ? raw :
    typeof raw === 'string' ? Date.parse(raw) :
    Number.NaN;

  if (!Number.isFinite(value)) {
    issues.push('run_at must be a valid date');
    return nowMs;
  }
  return value;
}

/**
 * Validates a submission and turns it into a storable draft (unsigned).
 * Throws JobValidationError listing every problem found.
 */
export function normalizeSubmission(raw: unknown, defaults: SubmissionDefaults): JobDraft {
  if (!isRecord(raw)) {
    throw new JobValidationError(['job must be an object']);
  }

  const issues: string[] = [];

  const jobType = pick(JOB_TYPES, raw.job_type);
  if (!jobType) {
    issues.push(`job_type must be one of ${JOB_TYPES.join(', ')}`);
  }

  const target = typeof raw.target === 'string' ? raw.target.trim() : '';
  if (!target) {
    issues.push('target is required');
  } else if (jobType) {
    validateTarget(jobType, target, issues);
  }

  const owner = optionalString(raw.owner);
  if (owner === undefined) {
    issues.push('owner must be a string');
  } else if (jobType === 'POLL' && !owner) {
    issues.push('owner is required for POLL jobs');
  }

  const payload = raw.payload === undefined ? {} : raw.payload;
  if (jobType === 'FUNC' && !isRecord(payload)) {
    issues.push('payload must be an object of named arguments for FUNC jobs');
  }

  let headers: JobHeaders = {};
  if (raw.headers !== undefined && raw.headers !== null) {
    if (isHeaderMap(raw.headers)) headers = raw.headers;
    else issues.push('headers must map header names to string values');
  }

  let retryLimit = defaults.retryLimit;
  if (raw.retry_limit !== undefined && raw.retry_limit !== null) {
    if (typeof raw.retry_limit === 'number' && Number.isInteger(raw.retry_limit) && raw.retry_limit >= 0) {
      retryLimit = raw.retry_limit;
    } else {
      issues.push('retry_limit must be an integer >= 0');
    }
  }

  const auth = readAuth(raw.auth, issues);
  const signing = readSigning(raw.signing, issues);
  const runAt = readRunAt(raw.run_at, defaults.nowMs, issues);

  if (issues.length || !jobType) {
    throw new JobValidationError(issues);
  }

  return {
    owner: owner || null,
    jobType,
    target,
    payloadText: JSON.stringify(payload),
    headers,
    auth,
    signing,
    retryLimit,
    runAt
  };
}
