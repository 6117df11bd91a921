// src/services/dispatcher.ts
import type { AttemptResult, Job, JobHeaders } from '../types/job';
import { mergeHeaders } from '../utils/headers';
import { errorMessage } from '../utils/logger';
import type { AsyncHttpExecutor, HttpMethod, OutboundRequest } from './httpClient';
import { resolveFunctionName, toFunctionArgs } from './functionRegistry';
import type { FunctionInvoker } from './functionRegistry';

export type DispatchOutcome =
  | { kind: 'settled'; result: AttemptResult }
  | { kind: 'submitted'; requestId: string }
  | { kind: 'leaseExpired' };

export interface DispatcherOptions {
  http: AsyncHttpExecutor;
  functions: FunctionInvoker;
  defaultSchema: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePayload(job: Job): unknown {
  return JSON.parse(job.payloadText);
}

export function authorizationHeader(job: Job): JobHeaders {
  if (!job.auth) return {};

  if (!job.auth.token) {
    throw new Error('Session token was not resolved when the job was created');
  }
  return { Authorization: `Bearer ${job.auth.token}` };
}

/**
 * Builds the outbound request for an HTTP job. GET and DELETE carry the
 * payload's top-level entries as query parameters; POST sends the payload
 * text that was signed.
 */
export function buildRequest(job: Job, method: HttpMethod): OutboundRequest {
  const base: JobHeaders = method === 'POST' ? { 'Content-Type': 'application/json' } : {};
  const headers = mergeHeaders(base, job.headers, authorizationHeader(job));

  if (method === 'POST') {
    return { method, url: job.target, headers, params: {}, body: job.payloadText };
  }

  const payload = parsePayload(job);
  const params: Record<string, string> = {};
  if (isRecord(payload)) {
    for (const [key, value] of Object.entries(payload)) {
      if (value === undefined || value === null) continue;
      params[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
  }

  return { method, url: job.target, headers, params, body: null };
}

export class Dispatcher {
  private http: AsyncHttpExecutor;
  private functions: FunctionInvoker;
  private defaultSchema: string;

  constructor(opts: DispatcherOptions) {
    this.http = opts.http;
    this.functions = opts.functions;
    this.defaultSchema = opts.defaultSchema;
  }

  async dispatch(job: Job): Promise<DispatchOutcome> {
    switch (job.jobType) {
      case 'FUNC':
        return { kind: 'settled', result: await this.invokeFunction(job) };

      case 'GET':
      case 'POST':
      case 'DELETE':
        return { kind: 'submitted', requestId: this.http.submit(buildRequest(job, job.jobType)) };

      case 'POLL':
        // A claimed POLL job is a lease that ran out without an ack
        return { kind: 'leaseExpired' };
    }
  }

  private async invokeFunction(job: Job): Promise<AttemptResult> {
    const { schema, name } = resolveFunctionName(job.target, this.defaultSchema);

    try {
      const payload = parsePayload(job);
      const args = isRecord(payload) ? toFunctionArgs(payload) : {};
      const output = await this.functions.invoke(schema, name, args);

      return { status: 200, headers: {}, body: output };
    } catch (err) {
      return { status: 0, headers: {}, body: null, error: errorMessage(err) };
    }
  }
}
