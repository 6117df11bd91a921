// src/engine.ts
import type { Knex } from 'knex';
import type { EngineConfig } from './config/engine';
import { JobsRepository } from './db/repositories/jobsRepository';
import { FailureLogRepository } from './db/repositories/failureLogRepository';
import { RequestsRepository } from './db/repositories/requestsRepository';
import { TriggerAuditRepository } from './db/repositories/triggerAuditRepository';
import { AsyncHttpClient } from './services/httpClient';
import type { AsyncHttpExecutor } from './services/httpClient';
import { Dispatcher } from './services/dispatcher';
import { FunctionRegistry } from './services/functionRegistry';
import type { FunctionInvoker } from './services/functionRegistry';
import { JobsService } from './services/jobsService';
import { OutcomeService } from './services/outcomeService';
import { PollService } from './services/pollService';
import { EnvSecretResolver } from './services/secretResolver';
import type { SecretResolver } from './services/secretResolver';
import { Scheduler } from './workers/scheduler';
import { systemClock } from './utils/dateUtils';
import type { Clock } from './utils/dateUtils';

export interface EngineOptions {
  db: Knex;
  config: EngineConfig;
  secrets?: SecretResolver;
  functions?: FunctionInvoker;
  http?: AsyncHttpExecutor;
  now?: Clock;
}

export interface Engine {
  db: Knex;
  config: EngineConfig;
  jobs: JobsRepository;
  failures: FailureLogRepository;
  requests: RequestsRepository;
  audit: TriggerAuditRepository;
  http: AsyncHttpExecutor;
  jobsService: JobsService;
  outcomes: OutcomeService;
  pollService: PollService;
  scheduler: Scheduler;
}

export function createEngine(opts: EngineOptions): Engine {
  const { db, config } = opts;
  const now = opts.now ?? systemClock;
  const secrets = opts.secrets ?? new EnvSecretResolver();
  const http = opts.http ?? new AsyncHttpClient({ timeoutMs: config.httpTimeoutMs });

  const jobs = new JobsRepository(db, { rowLocking: config.rowLocking });
  const failures = new FailureLogRepository(db);
  const requests = new RequestsRepository(db);
  const audit = new TriggerAuditRepository(db);

  const jobsService = new JobsService({
    jobs,
    failures,
    audit,
    secrets,
    defaultRetryLimit: config.defaultRetryLimit,
    now
  });

  const outcomes = new OutcomeService({ jobs, failures, requests, jobsService, now });

  const pollService = new PollService({
    jobs,
    secrets,
    leaseSeconds: config.pollLeaseSeconds,
    maxClockSkewSeconds: config.pollMaxClockSkewSeconds,
    now
  });

  const dispatcher = new Dispatcher({
    http,
    functions: opts.functions ?? new FunctionRegistry(),
    defaultSchema: config.defaultFunctionSchema
  });

  const scheduler = new Scheduler({ jobs, requests, dispatcher, http, outcomes, config, now });

  return {
    db,
    config,
    jobs,
    failures,
    requests,
    audit,
    http,
    jobsService,
    outcomes,
    pollService,
    scheduler
  };
}
