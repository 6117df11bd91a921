// src/workers/scheduler.ts
import type { AttemptResult, Job } from '../types/job';
import type { EngineConfig } from '../config/engine';
import type { JobsRepository } from '../db/repositories/jobsRepository';
import type { PendingRequest, RequestsRepository } from '../db/repositories/requestsRepository';
import type { Dispatcher } from '../services/dispatcher';
import type { AsyncHttpExecutor } from '../services/httpClient';
import type { OutcomeService } from '../services/outcomeService';
import { classifyAttempt, classifyLeaseExpiry } from '../jobs/classifier';
import type { ClassifierDecision } from '../jobs/classifier';
import type { Clock } from '../utils/dateUtils';
import { createChildContextId, createContextId, errorMessage, logError, logInfo, logWarn } from '../utils/logger';

export const REQUEST_LOST_MESSAGE = 'Request lost before its response was collected';
export const CLAIM_ABANDONED_MESSAGE = 'Claim abandoned before its outcome was stored';

export type SchedulerConfig = Pick<
  EngineConfig,
  | 'batchSize'
  | 'concurrency'
  | 'schedulerIntervalMs'
  | 'resolveIntervalMs'
  | 'requestLostAfterMs'
  | 'claimTimeoutMs'
  | 'redirectStatus'
  | 'rateLimitDefaultDelaySeconds'
>;

export interface SchedulerDeps {
  jobs: JobsRepository;
  requests: RequestsRepository;
  dispatcher: Dispatcher;
  http: AsyncHttpExecutor;
  outcomes: OutcomeService;
  config: SchedulerConfig;
  now: Clock;
}

export interface ClaimSweepSummary {
  /** Stale `processing` jobs settled as failed attempts. */
  reclaimed: number;
  claimed: number;
  submitted: number;
  errors: number;
  /** Resulting status -> count, for jobs settled within the sweep. */
  outcomes: Record<string, number>;
}

export interface ResolutionSweepSummary {
  skipped: boolean;
  resolved: number;
  pending: number;
  lost: number;
  errors: number;
}

function sleep(ms: number): { done: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  let release: () => void = () => undefined;

  const done = new Promise<void>((resolve) => {
    release = resolve;
    timer = setTimeout(resolve, ms);
  });

  return {
    done,
    cancel: () => {
      clearTimeout(timer);
      release();
    }
  };
}

export class Scheduler {
  private deps: SchedulerDeps;
  private resolving = false;
  private running = false;
  private loops: Promise<void>[] = [];
  private cancels = new Set<() => void>();

  constructor(deps: SchedulerDeps) {
    this.deps = deps;
  }

  private classify(job: Job, result: AttemptResult): ClassifierDecision {
    const { config } = this.deps;
    return classifyAttempt(job, result, this.deps.now(), {
      redirectStatus: config.redirectStatus,
      rateLimitDefaultDelaySeconds: config.rateLimitDefaultDelaySeconds
    });
  }

  private count(summary: ClaimSweepSummary, status: string): void {
    summary.outcomes[status] = (summary.outcomes[status] ?? 0) + 1;
  }

  /**
   * Dispatches one claimed job. Anything thrown here fails this job only;
   * the rest of the batch carries on.
   */
  private async processClaimed(job: Job, sweepCtx: string, summary: ClaimSweepSummary): Promise<void> {
    const { dispatcher, requests, http, outcomes } = this.deps;
    // job:<id>:<sweep uuid>
    const ctx = createChildContextId(sweepCtx, `job:${job.id}`);

    logInfo(ctx, 'Dispatching job', {
      type: job.jobType,
      target: job.target,
      retryCount: job.retryCount
    });

    try {
      const outcome = await dispatcher.dispatch(job);

      switch (outcome.kind) {
        case 'submitted':
          await requests.record(outcome.requestId, http.clientId, job.id, this.deps.now());
          summary.submitted += 1;
          return;

        case 'settled': {
          const decision = this.classify(job, outcome.result);
          if (await outcomes.apply(job, decision)) this.count(summary, decision.status);
          return;
        }

        case 'leaseExpired': {
          const decision = classifyLeaseExpiry(job, this.deps.now());
          if (await outcomes.apply(job, decision)) this.count(summary, decision.status);
          return;
        }
      }
    } catch (err) {
      const message = errorMessage(err);
      summary.errors += 1;
      logError(ctx, 'Job dispatch failed', { error: message });

      try {
        const decision = this.classify(job, { status: 0, headers: {}, body: null, error: message });
        if (await outcomes.apply(job, decision)) this.count(summary, decision.status);
      } catch (storeErr) {
        logError(ctx, 'Could not record dispatch failure, job left processing', {
          error: errorMessage(storeErr)
        });
      }
    }
  }

  /**
   * Settles jobs left `processing` past the claim timeout with nothing in
   * flight. A POLL job goes back to its queue as an expired lease.
   */
  private async reclaimAbandoned(sweepCtx: string, summary: ClaimSweepSummary): Promise<void> {
    const { jobs, outcomes, config } = this.deps;
    const nowMs = this.deps.now();
    const abandoned = await jobs.findAbandonedClaims(nowMs - config.claimTimeoutMs, config.batchSize);

    for (const job of abandoned) {
      const ctx = createChildContextId(sweepCtx, `job:${job.id}`);
      logWarn(ctx, 'Reclaiming abandoned job', { claimedAt: job.updatedAt });

      try {
        const decision =
          job.jobType === 'POLL'
            ? classifyLeaseExpiry(job, nowMs)
            : this.classify(job, { status: 0, headers: {}, body: null, error: CLAIM_ABANDONED_MESSAGE });

        if (await outcomes.apply(job, decision)) {
          summary.reclaimed += 1;
          this.count(summary, decision.status);
        }
      } catch (err) {
        summary.errors += 1;
        logError(ctx, 'Could not reclaim job', { error: errorMessage(err) });
      }
    }
  }

  /**
   * One claim/dispatch sweep: reclaims abandoned jobs, then dispatches every
   * due job up to the batch size.
   */
  async runClaimSweep(): Promise<ClaimSweepSummary> {
    const { jobs, config } = this.deps;
    const sweepCtx = createContextId('sweep');
    const summary: ClaimSweepSummary = { reclaimed: 0, claimed: 0, submitted: 0, errors: 0, outcomes: {} };

    await this.reclaimAbandoned(sweepCtx, summary);

    const claimed = await jobs.claimDue(this.deps.now(), config.batchSize);
    summary.claimed = claimed.length;

    if (!claimed.length) {
      if (summary.reclaimed || summary.errors) {
        logInfo(sweepCtx, 'Claim sweep finished', { ...summary });
      }
      return summary;
    }

    logInfo(sweepCtx, 'Claimed due jobs', {
      count: claimed.length,
      types: Array.from(new Set(claimed.map((j) => j.jobType)))
    });

    // Simple concurrency pool
    const queue = [...claimed];

    const runNext = async (): Promise<void> => {
      const job = queue.shift();
      if (!job) return;

      await this.processClaimed(job, sweepCtx, summary);
      await runNext();
    };

    const runners: Promise<void>[] = [];
    const poolSize = Math.min(config.concurrency, claimed.length);
    for (let i = 0; i < poolSize; i++) {
      runners.push(runNext());
    }
    await Promise.all(runners);

    logInfo(sweepCtx, 'Claim sweep finished', { ...summary });
    return summary;
  }

  private collect(pending: PendingRequest, nowMs: number): AttemptResult | null {
    const { http, config } = this.deps;
    const lost: AttemptResult = { status: 0, headers: {}, body: null, error: REQUEST_LOST_MESSAGE };

    if (pending.clientId !== http.clientId) {
      // Issued by another process; give it up only once it is stale
      return nowMs - pending.createdAt >= config.requestLostAfterMs ? lost : null;
    }

    const collected = http.collect(pending.requestId);
    if (collected.state === 'pending') return null;
    if (collected.state === 'unknown') return lost;
    return collected.result;
  }

  private async resolveOne(request: PendingRequest, sweepCtx: string, summary: ResolutionSweepSummary): Promise<void> {
    const { jobs, http, outcomes } = this.deps;
    const ctx = `job:${request.jobId}`;

    try {
      const result = this.collect(request, this.deps.now());
      if (!result) {
        summary.pending += 1;
        return;
      }
      if (result.error === REQUEST_LOST_MESSAGE) summary.lost += 1;

      const job = await jobs.findById(request.jobId);
      if (!job || job.status !== 'processing') {
        logWarn(ctx, 'Dropping response for a job that is no longer processing', {
          requestId: request.requestId,
          status: job?.status ?? null
        });
        await this.deps.requests.remove(request.requestId);
      } else {
        await outcomes.apply(job, this.classify(job, result), { requestId: request.requestId });
        summary.resolved += 1;
      }

      // Only once the outcome is stored; a failed write retries with the same response
      http.release(request.requestId);
    } catch (err) {
      summary.errors += 1;
      logError(ctx, 'Could not resolve request', {
        sweep: sweepCtx,
        requestId: request.requestId,
        error: errorMessage(err)
      });
    }
  }

  /**
   * Classifies every HTTP request that has settled since the last run.
   * Overlapping calls in the same process return at once.
   */
  async runResolutionSweep(): Promise<ResolutionSweepSummary> {
    const summary: ResolutionSweepSummary = { skipped: false, resolved: 0, pending: 0, lost: 0, errors: 0 };
    if (this.resolving) {
      return { ...summary, skipped: true };
    }

    const { requests, http, config } = this.deps;
    const sweepCtx = createContextId('resolve');
    this.resolving = true;

    try {
      const staleBefore = this.deps.now() - config.requestLostAfterMs;
      let after: PendingRequest | null = null;

      // Pages past requests still in flight
      for (;;) {
        const page: PendingRequest[] = await requests.listPending({
          clientId: http.clientId,
          staleBefore,
          limit: config.batchSize,
          after
        });

        for (const request of page) {
          await this.resolveOne(request, sweepCtx, summary);
        }

        if (page.length < config.batchSize) break;
        after = page[page.length - 1];
      }
    } finally {
      this.resolving = false;
    }

    if (summary.resolved || summary.errors) {
      logInfo(sweepCtx, 'Resolution sweep finished', { ...summary });
    }
    return summary;
  }

  private async loop(name: string, intervalMs: number, sweep: () => Promise<unknown>): Promise<void> {
    const ctx = createContextId(`scheduler:${name}`);
    logInfo(ctx, 'Starting sweep loop', { intervalMs });

    while (this.running) {
      try {
        await sweep();
      } catch (err) {
        logError(ctx, 'Sweep iteration crashed', { error: errorMessage(err) });
      }

      if (!this.running) break;
      const pause = sleep(intervalMs);
      this.cancels.add(pause.cancel);
      await pause.done;
      this.cancels.delete(pause.cancel);
    }

    logInfo(ctx, 'Sweep loop stopped');
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    const { config } = this.deps;
    this.loops = [
      this.loop('claim', config.schedulerIntervalMs, () => this.runClaimSweep()),
      this.loop('resolve', config.resolveIntervalMs, () => this.runResolutionSweep())
    ];
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const cancel of this.cancels) cancel();
    this.cancels.clear();
    await Promise.all(this.loops);
    this.loops = [];
  }
}
