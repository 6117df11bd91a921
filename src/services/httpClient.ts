// src/services/httpClient.ts
import { randomUUID } from 'crypto';
import axios, { AxiosInstance } from 'axios';
import type { AttemptResult, JobHeaders } from '../types/job';
import { normalizeHeaders } from '../utils/headers';
import { errorMessage, logHttpError } from '../utils/logger';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface OutboundRequest {
  method: HttpMethod;
  url: string;
  headers: JobHeaders;
  params: Record<string, string>;
  body: string | null;
}

export type CollectResult =
  | { state: 'pending' }
  | { state: 'settled'; result: AttemptResult }
  | { state: 'unknown' };

/**
 * Fire-and-collect HTTP: submit() returns a handle at once, collect()
 * reports the outcome once it has arrived. A settled result stays
 * collectable until release().
 */
export interface AsyncHttpExecutor {
  readonly clientId: string;
  submit(request: OutboundRequest): string;
  collect(handle: string): CollectResult;
  release(handle: string): void;
  /** Waits for every request in flight. */
  drain(): Promise<void>;
}

interface InFlight {
  promise: Promise<void>;
  result: AttemptResult | null;
}

export interface AsyncHttpClientOptions {
  timeoutMs?: number;
  client?: AxiosInstance;
}

export class AsyncHttpClient implements AsyncHttpExecutor {
  readonly clientId: string;
  private client: AxiosInstance;
  private requests = new Map<string, InFlight>();
  private seq = 0;

  constructor(opts: AsyncHttpClientOptions = {}) {
    this.clientId = randomUUID();
    this.client =
      opts.client ??
      axios.create({
        timeout: opts.timeoutMs ?? 0
      });
  }

  submit(request: OutboundRequest): string {
    this.seq += 1;
    const handle = `${this.clientId}:${this.seq}`;
    const ctx = `http:${handle}`;

    const entry: InFlight = { promise: Promise.resolve(), result: null };

    entry.promise = this.client
      .request<string>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.params,
        data: request.body ?? undefined,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true
      })
      .then(
        (res) => {
          const data: unknown = res.data;
          entry.result = {
            status: res.status,
            headers: normalizeHeaders({ ...res.headers }),
            body: data === undefined || data === null ? null : typeof data === 'string' ? data : JSON.stringify(data)
          };
        },
        (err: unknown) => {
          logHttpError(ctx, err);
          entry.result = {
            status: 0,
            headers: {},
            body: null,
            error: errorMessage(err)
          };
        }
      );

    this.requests.set(handle, entry);
    return handle;
  }

  collect(handle: string): CollectResult {
    const entry = this.requests.get(handle);
    if (!entry) return { state: 'unknown' };
    if (!entry.result) return { state: 'pending' };
    return { state: 'settled', result: entry.result };
  }

  release(handle: string): void {
    this.requests.delete(handle);
  }

  async drain(): Promise<void> {
    await Promise.all(Array.from(this.requests.values(), (entry) => entry.promise));
  }
}
