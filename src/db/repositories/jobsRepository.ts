// src/db/repositories/jobsRepository.ts
import type { Knex } from 'knex';
import type { Job, JobDraft, JobRow, JobStatus, JobType } from '../../types/job';
import type { ClassifierDecision } from '../../jobs/classifier';
import { assertTransition, TERMINAL_STATUSES } from '../../jobs/stateMachine';
import { JOBS_TABLE, REQUESTS_TABLE } from '../schema';
import { toJob } from '../rows';

export interface JobListFilters {
  status?: JobStatus;
  type?: JobType;
  owner?: string;
  limit?: number;
  offset?: number;
}

export interface JobListResult {
  data: Job[];
  pagination: {
    limit: number;
    offset: number;
    count: number;
  };
}

type JobRowPatch = Partial<Omit<JobRow, 'id' | 'status'>>;

export interface JobsRepositoryOptions {
  /** Use SELECT ... FOR UPDATE SKIP LOCKED on claim reads. */
  rowLocking: boolean;
}

export class JobsRepository {
  private db: Knex;
  private rowLocking: boolean;

  constructor(db: Knex, opts: JobsRepositoryOptions) {
    this.db = db;
    this.rowLocking = opts.rowLocking;
  }

  transaction<T>(work: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return this.db.transaction(work);
  }

  async insert(record: JobDraft, nowMs: number, conn: Knex = this.db): Promise<Job> {
    const [id] = await conn(JOBS_TABLE).insert({
      owner: record.owner,
      job_type: record.jobType,
      status: 'new',
      target: record.target,
      payload: record.payloadText,
      headers: JSON.stringify(record.headers),
      auth_type: record.auth?.type ?? null,
      auth_token: record.auth?.token ?? null,
      signing_secret: record.signing.secret,
      signing_vault: record.signing.vault,
      signing_header: record.signing.header,
      signing_style: record.signing.style,
      signing_algorithm: record.signing.algorithm,
      signing_encoding: record.signing.encoding,
      retry_count: 0,
      retry_limit: record.retryLimit,
      run_at: record.runAt,
      last_at: null,
      created_at: nowMs,
      updated_at: nowMs
    });

    const job = await this.findById(Number(id), conn);
    if (!job) {
      throw new Error(`Inserted job ${id} could not be read back`);
    }
    return job;
  }

  async findById(id: number, conn: Knex = this.db): Promise<Job | null> {
    const row = await conn<JobRow>(JOBS_TABLE).where('id', id).first();
    return row ? toJob(row) : null;
  }

  async list(filters: JobListFilters = {}): Promise<JobListResult> {
    const limit = Math.min(filters.limit ?? 50, 200);
    const offset = filters.offset ?? 0;

    const applyFilters = (qb: Knex.QueryBuilder) => {
      if (filters.status) qb.where('status', filters.status);
      if (filters.type) qb.where('job_type', filters.type);
      if (filters.owner) qb.where('owner', filters.owner);
    };

    const [rows, countRow] = await Promise.all([
      this.db<JobRow>(JOBS_TABLE)
        .select('*')
        .modify(applyFilters)
        .orderBy('id', 'desc')
        .limit(limit)
        .offset(offset),
      this.db(JOBS_TABLE).modify(applyFilters).count({ count: '*' }).first()
    ]);

    return {
      data: rows.map(toJob),
      pagination: { limit, offset, count: Number(countRow?.count ?? 0) }
    };
  }

  /**
   * Claims due jobs for one sweep and marks them `processing`.
   * Rows locked by a concurrent sweep are skipped, never waited on; the
   * status compare-and-swap keeps the claim exclusive where row locks are
   * unavailable.
   */
  async claimDue(nowMs: number, limit: number): Promise<Job[]> {
    return this.db.transaction(async (trx) => {
      const rows = await trx<JobRow>(JOBS_TABLE)
        .select('*')
        .where('run_at', '<=', nowMs)
        .andWhere((eligible) => {
          eligible
            .where((dispatchable) => {
              dispatchable
                .whereNot('job_type', 'POLL')
                .andWhere((status) => {
                  status
                    .where('status', 'new')
                    .orWhere((retry) => {
                      retry.where('status', 'failed').andWhereRaw('retry_count <= retry_limit');
                    });
                });
            })
            .orWhere((leased) => {
              leased.where('job_type', 'POLL').andWhere('status', 'polled');
            });
        })
        .orderBy('run_at', 'asc')
        .orderBy('id', 'asc')
        .limit(limit)
        .modify((qb) => {
          if (this.rowLocking) qb.forUpdate().skipLocked();
        });

      const claimed: Job[] = [];
      for (const row of rows) {
        const job = toJob(row);
        const ok = await this.transition(job.id, job.status, 'processing', nowMs, {}, trx);
        if (ok) {
          claimed.push({ ...job, status: 'processing', updatedAt: nowMs });
        }
      }
      return claimed;
    });
  }

  /**
   * Jobs claimed at or before `claimedBefore` that are still `processing`
   * with no request in flight: the claiming sweep died or could not store
   * an outcome.
   */
  async findAbandonedClaims(claimedBefore: number, limit: number): Promise<Job[]> {
    const rows = await this.db<JobRow>(JOBS_TABLE)
      .select('*')
      .where('status', 'processing')
      .andWhere('updated_at', '<=', claimedBefore)
      .whereNotExists(
        this.db(REQUESTS_TABLE).select('request_id').whereRaw('??.?? = ??.??', [REQUESTS_TABLE, 'job_id', JOBS_TABLE, 'id'])
      )
      .orderBy('updated_at', 'asc')
      .orderBy('id', 'asc')
      .limit(limit);

    return rows.map(toJob);
  }

  /**
   * POLL jobs waiting for `owner`, oldest run_at first. Not locked: the
   * caller claims one with lockForClaim.
   */
  async findPollCandidates(owner: string, nowMs: number, conn: Knex = this.db): Promise<Job[]> {
    const rows = await conn<JobRow>(JOBS_TABLE)
      .select('*')
      .where('job_type', 'POLL')
      .andWhere('owner', owner)
      .andWhere('status', 'new')
      .andWhere('run_at', '<=', nowMs)
      .orderBy('run_at', 'asc')
      .orderBy('id', 'asc');

    return rows.map(toJob);
  }

  /**
   * Re-reads one job under a non-blocking row lock, only if it still has
   * `status`. Null when it changed or another transaction holds it.
   */
  async lockForClaim(id: number, status: JobStatus, conn: Knex.Transaction): Promise<Job | null> {
    const row = await conn<JobRow>(JOBS_TABLE)
      .select('*')
      .where('id', id)
      .andWhere('status', status)
      .modify((qb) => {
        if (this.rowLocking) qb.forUpdate().skipLocked();
      })
      .first();

    return row ? toJob(row) : null;
  }

  /**
   * Compare-and-swap status change. False when the job is no longer in
   * `from`.
   */
  async transition(
    id: number,
    from: JobStatus,
    to: JobStatus,
    nowMs: number,
    patch: JobRowPatch = {},
    conn: Knex = this.db
  ): Promise<boolean> {
    assertTransition(from, to);

    const count = await conn(JOBS_TABLE)
      .where({ id, status: from })
      .update({ ...patch, status: to, updated_at: nowMs });

    return count === 1;
  }

  async applyDecision(
    job: Job,
    decision: ClassifierDecision,
    nowMs: number,
    conn: Knex = this.db
  ): Promise<boolean> {
    const patch: JobRowPatch = {
      retry_count: decision.retryCount,
      last_at: nowMs,
      response_status: decision.responseStatus,
      response_content: decision.responseContent,
      response_headers: JSON.stringify(decision.responseHeaders)
    };
    if (decision.runAt !== null) {
      patch.run_at = decision.runAt;
    }

    return this.transition(job.id, job.status, decision.status, nowMs, patch, conn);
  }

  /**
   * Replaces the payload of a job that has not finished. Headers, including
   * any signature, stay as they were written at creation.
   */
  async updatePayload(id: number, payloadText: string, nowMs: number): Promise<boolean> {
    const count = await this.db(JOBS_TABLE)
      .where('id', id)
      .whereNotIn('status', [...TERMINAL_STATUSES])
      .update({ payload: payloadText, updated_at: nowMs });

    return count === 1;
  }
}
