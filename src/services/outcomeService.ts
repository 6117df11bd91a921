// src/services/outcomeService.ts
import type { Job, JobDraft } from '../types/job';
import type { ClassifierDecision, SpawnRequest } from '../jobs/classifier';
import type { JobsRepository } from '../db/repositories/jobsRepository';
import type { FailureLogRepository } from '../db/repositories/failureLogRepository';
import type { RequestsRepository } from '../db/repositories/requestsRepository';
import type { JobSubmission } from '../jobs/validation';
import type { JobsService, SubmitOptions } from './jobsService';
import type { Clock } from '../utils/dateUtils';
import { errorMessage, logInfo, logWarn } from '../utils/logger';

export interface OutcomeServiceDeps {
  jobs: JobsRepository;
  failures: FailureLogRepository;
  requests: RequestsRepository;
  jobsService: JobsService;
  now: Clock;
}

export interface ApplyOptions {
  /** Join row to remove once the outcome is stored. */
  requestId?: string;
}

export function redirectTriggerName(parentId: number): string {
  return `redirect:${parentId}`;
}

/**
 * The job a redirect response asks for. Owner, auth, signing and retry
 * limit come from the parent; the child is signed afresh.
 */
function spawnSubmission(parent: Job, spawn: SpawnRequest): { submission: JobSubmission; options: SubmitOptions } {
  const submission: JobSubmission = {
    job_type: spawn.jobType ?? parent.jobType,
    target: spawn.target,
    owner: parent.owner,
    payload: spawn.payload,
    headers: spawn.headers,
    auth: parent.auth?.type === 'session' ? { type: 'session' } : parent.auth,
    signing: {
      secret: parent.signing.secret,
      vault: parent.signing.vault,
      header: parent.signing.header,
      style: parent.signing.style,
      algorithm: parent.signing.algorithm,
      encoding: parent.signing.encoding
    },
    retry_limit: parent.retryLimit,
    run_at: spawn.runAt
  };

  const options: SubmitOptions = {};
  if (parent.auth?.type === 'session' && parent.auth.token) {
    options.sessionToken = parent.auth.token;
  }
  return { submission, options };
}

export class OutcomeService {
  private deps: OutcomeServiceDeps;

  constructor(deps: OutcomeServiceDeps) {
    this.deps = deps;
  }

  /**
   * Stores a classified attempt: job status and response, the failure log
   * entry, the spawned job and the join row removal commit together.
   * False when the job had already moved on.
   */
  async apply(job: Job, decision: ClassifierDecision, opts: ApplyOptions = {}): Promise<boolean> {
    const { jobs, failures, requests, jobsService } = this.deps;
    const ctx = `job:${job.id}`;

    let effective = decision;
    let child: { draft: JobDraft; options: SubmitOptions } | null = null;

    if (decision.spawn) {
      const { submission, options } = spawnSubmission(job, decision.spawn);
      try {
        child = { draft: await jobsService.prepare(submission, options), options };
      } catch (err) {
        logWarn(ctx, 'Redirect response does not describe a valid job', { error: errorMessage(err) });
        effective = { ...decision, category: 'Unclassified', status: 'other', spawn: null };
      }
    }

    const nowMs = this.deps.now();

    const result = await jobs.transaction(async (trx) => {
      const applied = await jobs.applyDecision(job, effective, nowMs, trx);

      if (opts.requestId) {
        await requests.remove(opts.requestId, trx);
      }
      if (!applied) return { applied, childId: null };

      if (effective.logFailure) {
        await failures.append(
          {
            jobId: job.id,
            attemptNumber: effective.retryCount,
            responseStatus: effective.responseStatus,
            responseContent: effective.responseContent
          },
          nowMs,
          trx
        );
      }

      let childId: number | null = null;
      if (child) {
        const created = await jobsService.insertDraft(child.draft, {
          ...child.options,
          trigger: redirectTriggerName(job.id),
          conn: trx
        });
        childId = created.id;
      }

      return { applied, childId };
    });

    if (!result.applied) {
      logWarn(ctx, 'Job changed status before its outcome was stored', {
        expected: job.status,
        outcome: effective.status
      });
      return false;
    }

    logInfo(ctx, 'Attempt classified', {
      category: effective.category,
      status: effective.status,
      responseStatus: effective.responseStatus,
      retryCount: effective.retryCount,
      runAt: effective.runAt,
      spawnedJobId: result.childId
    });
    return true;
  }
}
