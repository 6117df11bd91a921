// src/server.ts
import express from 'express';
import type { Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import morgan from 'morgan';

// Internal imports
import type { Engine } from './engine';
import { hasInternalSecret, verifyInternalSecret } from './middleware/internalSecret';
import { AuthenticationError, JobNotFoundError, JobValidationError } from './jobs/errors';
import { JOB_STATUSES, JOB_TYPES } from './types/job';
import type { FailureLogEntry, Job } from './types/job';
import type { JobListFilters } from './db/repositories/jobsRepository';
import { toIso } from './utils/dateUtils';
import { errorMessage, logError } from './utils/logger';

export interface AppOptions {
  /** morgan access log; off in tests. */
  accessLog?: boolean;
}

/**
 * Caller identity set by the trusted proxy in front of the API. Honoured
 * only on requests that also carry the internal secret.
 */
export const CALLER_ID_HEADER = 'x-user-id';

const BEARER = /^Bearer\s+(\S+)$/i;

function bearerToken(req: Request): string | undefined {
  const match = BEARER.exec(req.header('authorization') ?? '');
  return match ? match[1] : undefined;
}

function parsePayload(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function serializeJob(job: Job) {
  return {
    id: job.id,
    owner: job.owner,
    job_type: job.jobType,
    status: job.status,
    target: job.target,
    payload: parsePayload(job.payloadText),
    headers: job.headers,
    auth_type: job.auth?.type ?? null,
    signing: {
      vault: job.signing.vault,
      header: job.signing.header,
      style: job.signing.style,
      algorithm: job.signing.algorithm,
      encoding: job.signing.encoding,
      has_secret: job.signing.secret !== null
    },
    retry_count: job.retryCount,
    retry_limit: job.retryLimit,
    run_at: toIso(job.runAt),
    last_at: toIso(job.lastAt),
    response_status: job.responseStatus,
    response_content: job.responseContent,
    response_headers: job.responseHeaders,
    created_at: toIso(job.createdAt),
    updated_at: toIso(job.updatedAt)
  };
}

function serializeFailure(entry: FailureLogEntry) {
  return {
    id: entry.id,
    job_id: entry.jobId,
    attempt_number: entry.attemptNumber,
    response_status: entry.responseStatus,
    response_content: entry.responseContent,
    created_at: toIso(entry.createdAt)
  };
}

function sendError(res: Response, ctx: string, err: unknown) {
  if (err instanceof JobValidationError) {
    return res.status(400).json({ error: err.message, issues: err.issues });
  }
  if (err instanceof AuthenticationError) {
    return res.status(401).json({ error: err.message });
  }
  if (err instanceof JobNotFoundError) {
    return res.status(404).json({ error: err.message });
  }

  logError(ctx, 'Request failed', { error: errorMessage(err) });
  return res.status(500).json({ error: errorMessage(err) || 'Internal Server Error' });
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function pick<T extends string>(allowed: readonly T[], value: string | undefined, name: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new JobValidationError([`${name} must be one of ${allowed.join(', ')}`]);
  }
  return match;
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id < 1) {
    throw new JobValidationError([`invalid job id "${raw}"`]);
  }
  return id;
}

function parseListFilters(query: Record<string, unknown>): JobListFilters {
  const limit = Number(queryString(query.limit));
  const offset = Number(queryString(query.offset));

  return {
    status: pick(JOB_STATUSES, queryString(query.status), 'status'),
    type: pick(JOB_TYPES, queryString(query.type), 'type'),
    owner: queryString(query.owner),
    limit: Number.isInteger(limit) && limit > 0 ? limit : 50,
    offset: Number.isInteger(offset) && offset > 0 ? offset : 0
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new JobValidationError(['request body must be a JSON object']);
  }
  return body;
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value === '') {
    throw new JobValidationError([`${key} is required`]);
  }
  return value;
}

export function createApp(engine: Engine, opts: AppOptions = {}) {
  const { db, jobsService, pollService, config } = engine;
  const internalOnly = verifyInternalSecret(config.sharedSecret);

  // App Setup
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '5mb' }));
  if (opts.accessLog ?? true) {
    app.use(morgan('dev'));
  }

  // ==========================================================================
  // 1. HEALTH
  // ==========================================================================

  app.get('/health', async (_req, res) => {
    try {
      await db.raw('SELECT 1'); // Check DB connectivity
      res.json({ status: 'ok' });
    } catch (err) {
      logError('api:health', 'Store unreachable', { error: errorMessage(err) });
      res.status(503).json({ status: 'error', db: 'disconnected' });
    }
  });

  // ==========================================================================
  // 2. JOB ENDPOINTS
  // ==========================================================================

  app.post('/jobs', internalOnly, async (req, res) => {
    try {
      // The submitter's own token stands in for a session auth marker
      const sessionToken = bearerToken(req);
      const draft = await jobsService.prepare(req.body, { sessionToken });
      const job = await jobsService.insertDraft(draft);
      res.status(201).json(serializeJob(job));
    } catch (err) {
      sendError(res, 'api:jobs:create', err);
    }
  });

  app.get('/jobs', async (req, res) => {
    try {
      const result = await jobsService.listJobs(parseListFilters(req.query));
      res.json({ data: result.data.map(serializeJob), pagination: result.pagination });
    } catch (err) {
      sendError(res, 'api:jobs:list', err);
    }
  });

  app.get('/jobs/:id', async (req, res) => {
    try {
      const job = await jobsService.getJob(parseId(req.params.id));
      res.json(serializeJob(job));
    } catch (err) {
      sendError(res, 'api:jobs:detail', err);
    }
  });

  app.patch('/jobs/:id/payload', internalOnly, async (req, res) => {
    try {
      const body = requireBody(req.body);
      if (!('payload' in body)) {
        throw new JobValidationError(['payload is required']);
      }
      const job = await jobsService.updateJobPayload(parseId(req.params.id), body.payload);
      res.json(serializeJob(job));
    } catch (err) {
      sendError(res, 'api:jobs:payload', err);
    }
  });

  app.get('/jobs/:id/failures', async (req, res) => {
    try {
      const entries = await jobsService.listFailures(parseId(req.params.id));
      res.json({ data: entries.map(serializeFailure) });
    } catch (err) {
      sendError(res, 'api:jobs:failures', err);
    }
  });

  // ==========================================================================
  // 3. POLL / ACK
  // ==========================================================================

  app.post('/rpc/poll', async (req, res) => {
    try {
      const body = requireBody(req.body);
      const timestamp = body.timestamp;
      if (typeof timestamp !== 'number' && typeof timestamp !== 'string') {
        throw new JobValidationError(['timestamp is required']);
      }

      const job = await pollService.poll({
        owner: requireString(body, 'owner'),
        timestamp,
        hmac: requireString(body, 'hmac'),
        asUser: body.as_user === true,
        autoAck: body.auto_ack === true,
        callerId: hasInternalSecret(req, config.sharedSecret) ? req.header(CALLER_ID_HEADER) ?? null : null
      });
      res.json({ job });
    } catch (err) {
      sendError(res, 'api:rpc:poll', err);
    }
  });

  app.post('/rpc/ack', async (req, res) => {
    try {
      const body = requireBody(req.body);
      const jobId = Number(body.job_id);
      if (!Number.isInteger(jobId) || jobId < 1) {
        throw new JobValidationError(['job_id must be a positive integer']);
      }

      const ok = await pollService.ack(jobId, requireString(body, 'hmac'));
      res.json({ ok });
    } catch (err) {
      sendError(res, 'api:rpc:ack', err);
    }
  });

  return app;
}
