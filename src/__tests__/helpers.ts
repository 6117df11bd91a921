// src/__tests__/helpers.ts
import knex, { Knex } from 'knex';
import { knexConfig } from '../db/knexfile';
import { ensureSchema } from '../db/schema';
import { DEFAULT_ENGINE_CONFIG } from '../config/engine';
import type { EngineConfig } from '../config/engine';
import { createEngine } from '../engine';
import type { Engine } from '../engine';
import type { AttemptResult } from '../types/job';
import type { AsyncHttpExecutor, CollectResult, OutboundRequest } from '../services/httpClient';
import { FunctionRegistry } from '../services/functionRegistry';
import { StaticSecretResolver } from '../services/secretResolver';

export const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

export async function createTestDb(): Promise<Knex> {
  const db = knex(knexConfig.test);
  await ensureSchema(db);
  return db;
}

export class FakeClock {
  current: number;

  constructor(start = T0) {
    this.current = start;
  }

  now = (): number => this.current;

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

interface FakeRequest {
  request: OutboundRequest;
  result: AttemptResult | null;
}

/**
 * In-process stand-in for the outbound HTTP client: requests stay pending
 * until the test answers them.
 */
export class FakeHttp implements AsyncHttpExecutor {
  readonly clientId: string;
  private seq = 0;
  private requests = new Map<string, FakeRequest>();
  readonly sent: { handle: string; request: OutboundRequest }[] = [];

  constructor(clientId = 'client-a') {
    this.clientId = clientId;
  }

  submit(request: OutboundRequest): string {
    this.seq += 1;
    const handle = `${this.clientId}:${this.seq}`;
    this.requests.set(handle, { request, result: null });
    this.sent.push({ handle, request });
    return handle;
  }

  respond(handle: string, result: AttemptResult): void {
    const entry = this.requests.get(handle);
    if (!entry) throw new Error(`unknown handle ${handle}`);
    entry.result = result;
  }

  /** Answers every pending request with the same result. */
  respondAll(result: AttemptResult): void {
    for (const entry of this.requests.values()) {
      if (!entry.result) entry.result = result;
    }
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
    return;
  }
}

export interface TestEngine {
  engine: Engine;
  db: Knex;
  clock: FakeClock;
  http: FakeHttp;
  functions: FunctionRegistry;
}

export const TEST_SECRETS = { 'partner-a': 'test-secret' };

export async function createTestEngine(overrides: Partial<EngineConfig> = {}): Promise<TestEngine> {
  const db = await createTestDb();
  const clock = new FakeClock();
  const http = new FakeHttp();
  const functions = new FunctionRegistry();

  const engine = createEngine({
    db,
    config: { ...DEFAULT_ENGINE_CONFIG, rowLocking: false, ...overrides },
    secrets: new StaticSecretResolver(TEST_SECRETS),
    functions,
    http,
    now: clock.now
  });

  return { engine, db, clock, http, functions };
}

export function ok(body: string | null = null, headers: Record<string, string> = {}): AttemptResult {
  return { status: 200, headers, body };
}

export function response(status: number, body: string | null = null, headers: Record<string, string> = {}): AttemptResult {
  return { status, headers, body };
}
