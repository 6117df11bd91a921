// src/db/rows.ts
import {
  JOB_STATUSES,
  JOB_TYPES,
  SIGNING_ALGORITHMS,
  SIGNING_ENCODINGS,
  SIGNING_STYLES
} from '../types/job';
import type { Job, JobAuth, JobHeaders, JobRow, JobStatus, JobType } from '../types/job';
import { isHeaderMap } from '../utils/headers';

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in store: "${value}"`);
  }
  return match;
}

export function toMillis(value: number | string): number {
  return typeof value === 'number' ? value : Number(value);
}

function toMillisOrNull(value: number | string | null): number | null {
  return value === null ? null : toMillis(value);
}

function parseHeaders(text: string | null): JobHeaders | null {
  if (text === null || text === '') return null;
  const parsed: unknown = JSON.parse(text);
  return isHeaderMap(parsed) ? parsed : {};
}

function asJobType(value: string): JobType {
  return oneOf(JOB_TYPES, value, 'job_type');
}

function asJobStatus(value: string): JobStatus {
  return oneOf(JOB_STATUSES, value, 'status');
}

function toAuth(row: JobRow): JobAuth | null {
  if (row.auth_type === 'jwt' && row.auth_token) {
    return { type: 'jwt', token: row.auth_token };
  }
  if (row.auth_type === 'session') {
    return { type: 'session', token: row.auth_token };
  }
  return null;
}

export function toJob(row: JobRow): Job {
  return {
    id: Number(row.id),
    owner: row.owner,
    jobType: asJobType(row.job_type),
    status: asJobStatus(row.status),
    target: row.target,
    payloadText: row.payload,
    headers: parseHeaders(row.headers) ?? {},
    auth: toAuth(row),
    signing: {
      secret: row.signing_secret,
      vault: row.signing_vault,
      header: row.signing_header,
      style: oneOf(SIGNING_STYLES, row.signing_style, 'signing_style'),
      algorithm: oneOf(SIGNING_ALGORITHMS, row.signing_algorithm, 'signing_algorithm'),
      encoding: oneOf(SIGNING_ENCODINGS, row.signing_encoding, 'signing_encoding')
    },
    retryCount: Number(row.retry_count),
    retryLimit: Number(row.retry_limit),
    runAt: toMillis(row.run_at),
    lastAt: toMillisOrNull(row.last_at),
    responseStatus: row.response_status === null ? null : Number(row.response_status),
    responseContent: row.response_content,
    responseHeaders: parseHeaders(row.response_headers),
    createdAt: toMillis(row.created_at),
    updatedAt: toMillis(row.updated_at)
  };
}
