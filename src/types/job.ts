// src/types/job.ts

export const JOB_TYPES = ['GET', 'POST', 'DELETE', 'FUNC', 'POLL'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = [
  'new',
  'processing',
  'completed',
  'redirected',
  'failed',
  'server_error',
  'too_many',
  'other',
  'polled'
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const SIGNING_ALGORITHMS = ['md5', 'sha1', 'sha224', 'sha256', 'sha384', 'sha512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export const SIGNING_ENCODINGS = ['hex', 'base64'] as const;
export type SigningEncoding = (typeof SIGNING_ENCODINGS)[number];

export const SIGNING_STYLES = ['PLAIN', 'PREFIXED'] as const;
export type SigningStyle = (typeof SIGNING_STYLES)[number];

export type JobHeaders = Record<string, string>;

/**
 * `session` is replaced by the submitting caller's session token when one is
 * supplied; a session marker without a token cannot be dispatched.
 */
export type JobAuth =
  | { type: 'jwt'; token: string }
  | { type: 'session'; token: string | null };

export interface SigningConfig {
  secret: string | null;
  vault: string | null;
  header: string;
  style: SigningStyle;
  algorithm: SigningAlgorithm;
  encoding: SigningEncoding;
}

/**
 * A job as the engine sees it. Times are epoch milliseconds.
 */
export interface Job {
  id: number;
  owner: string | null;
  jobType: JobType;
  status: JobStatus;
  target: string;
  /** Payload text exactly as signed and sent. */
  payloadText: string;
  headers: JobHeaders;
  auth: JobAuth | null;
  signing: SigningConfig;
  retryCount: number;
  retryLimit: number;
  runAt: number;
  lastAt: number | null;
  responseStatus: number | null;
  responseContent: string | null;
  responseHeaders: JobHeaders | null;
  createdAt: number;
  updatedAt: number;
}

/** A validated job ready to be stored. */
export interface JobDraft {
  owner: string | null;
  jobType: JobType;
  target: string;
  payloadText: string;
  headers: JobHeaders;
  auth: JobAuth | null;
  signing: SigningConfig;
  retryLimit: number;
  runAt: number;
}

// Row shape in the `jobs` table
export interface JobRow {
  id: number;
  owner: string | null;
  job_type: string;
  status: string;
  target: string;
  payload: string;
  headers: string;
  auth_type: string | null;
  auth_token: string | null;
  signing_secret: string | null;
  signing_vault: string | null;
  signing_header: string;
  signing_style: string;
  signing_algorithm: string;
  signing_encoding: string;
  retry_count: number;
  retry_limit: number;
  run_at: number | string;
  last_at: number | string | null;
  response_status: number | null;
  response_content: string | null;
  response_headers: string | null;
  created_at: number | string;
  updated_at: number | string;
}

export interface FailureLogEntry {
  id: number;
  jobId: number;
  attemptNumber: number;
  responseStatus: number;
  responseContent: string | null;
  createdAt: number;
}

export interface FailureLogRow {
  id: number;
  job_id: number;
  attempt_number: number;
  response_status: number;
  response_content: string | null;
  created_at: number | string;
}

export interface JobRequestRow {
  request_id: string;
  client_id: string;
  job_id: number;
  created_at: number | string;
}

export interface TriggerAuditRow {
  id: number;
  job_id: number;
  trigger_name: string;
  created_at: number | string;
}

/**
 * What a finished attempt looked like, whatever executed it.
 * `error` is set when no response was obtained at all.
 */
export interface AttemptResult {
  status: number;
  headers: JobHeaders;
  body: string | null;
  error?: string;
}
