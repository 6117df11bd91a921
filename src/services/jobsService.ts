// src/services/jobsService.ts
import type { Knex } from 'knex';
import type { FailureLogEntry, Job, JobDraft } from '../types/job';
import type { JobListFilters, JobListResult, JobsRepository } from '../db/repositories/jobsRepository';
import type { FailureLogRepository } from '../db/repositories/failureLogRepository';
import type { TriggerAuditRepository } from '../db/repositories/triggerAuditRepository';
import type { SecretResolver } from './secretResolver';
import { JobNotFoundError, JobValidationError } from '../jobs/errors';
import { isTerminal } from '../jobs/stateMachine';
import { signHeaders } from '../jobs/signer';
import { normalizeSubmission } from '../jobs/validation';
import type { JobSubmission } from '../jobs/validation';
import type { Clock } from '../utils/dateUtils';
import { errorMessage, logInfo } from '../utils/logger';

export interface JobsServiceDeps {
  jobs: JobsRepository;
  failures: FailureLogRepository;
  audit: TriggerAuditRepository;
  secrets: SecretResolver;
  defaultRetryLimit: number;
  now: Clock;
}

export interface SubmitOptions {
  /** Replaces a `session` auth marker. */
  sessionToken?: string;
  /** Records the job as spawned by this trigger. */
  trigger?: string;
  /** Insert inside an existing transaction. */
  conn?: Knex;
}

export class JobsService {
  private deps: JobsServiceDeps;

  constructor(deps: JobsServiceDeps) {
    this.deps = deps;
  }

  /**
   * Validates, resolves the session marker and signs. The signature is
   * computed here once and never again for this job.
   */
  async prepare(submission: unknown, options: SubmitOptions = {}): Promise<JobDraft> {
    const draft = normalizeSubmission(submission, {
      retryLimit: this.deps.defaultRetryLimit,
      nowMs: this.deps.now()
    });

    if (draft.auth?.type === 'session' && options.sessionToken) {
      draft.auth = { type: 'session', token: options.sessionToken };
    }

    try {
      draft.headers = await signHeaders(draft.payloadText, draft.headers, draft.signing, this.deps.secrets);
    } catch (err) {
      throw new JobValidationError([errorMessage(err)]);
    }

    return draft;
  }

  async insertDraft(draft: JobDraft, options: SubmitOptions = {}): Promise<Job> {
    const { jobs, audit } = this.deps;
    const nowMs = this.deps.now();

    const write = async (conn: Knex): Promise<Job> => {
      const job = await jobs.insert(draft, nowMs, conn);
      if (options.trigger) {
        await audit.record(job.id, options.trigger, nowMs, conn);
      }
      return job;
    };

    const job = options.conn
      ? await write(options.conn)
      : await jobs.transaction((trx) => write(trx));

    logInfo('jobs', 'Created job', {
      jobId: job.id,
      type: job.jobType,
      owner: job.owner,
      trigger: options.trigger ?? null
    });
    return job;
  }

  async submitJob(submission: JobSubmission, options: SubmitOptions = {}): Promise<Job> {
    const draft = await this.prepare(submission, options);
    return this.insertDraft(draft, options);
  }

  async getJob(id: number): Promise<Job> {
    const job = await this.deps.jobs.findById(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  listJobs(filters: JobListFilters): Promise<JobListResult> {
    return this.deps.jobs.list(filters);
  }

  async listFailures(id: number): Promise<FailureLogEntry[]> {
    await this.getJob(id);
    return this.deps.failures.listForJob(id);
  }

  /**
   * Replaces the payload of an unfinished job. The stored signature header
   * is left exactly as it was written at creation.
   */
  async updateJobPayload(id: number, payload: unknown): Promise<Job> {
    const job = await this.getJob(id);
    if (isTerminal(job.status)) {
      throw new JobValidationError([`job ${id} is ${job.status} and can no longer change`]);
    }
    if (job.jobType === 'FUNC' && (typeof payload !== 'object' || payload === null || Array.isArray(payload))) {
      throw new JobValidationError(['payload must be an object of named arguments for FUNC jobs']);
    }

    const updated = await this.deps.jobs.updatePayload(id, JSON.stringify(payload ?? {}), this.deps.now());
    if (!updated) {
      throw new JobValidationError([`job ${id} finished while its payload was being replaced`]);
    }
    return this.getJob(id);
  }
}
