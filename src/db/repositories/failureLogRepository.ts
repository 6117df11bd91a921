// src/db/repositories/failureLogRepository.ts
import type { Knex } from 'knex';
import type { FailureLogEntry, FailureLogRow } from '../../types/job';
import { FAILURES_TABLE } from '../schema';
import { toMillis } from '../rows';

export interface NewFailure {
  jobId: number;
  attemptNumber: number;
  responseStatus: number;
  responseContent: string | null;
}

function toEntry(row: FailureLogRow): FailureLogEntry {
  return {
    id: Number(row.id),
    jobId: Number(row.job_id),
    attemptNumber: Number(row.attempt_number),
    responseStatus: Number(row.response_status),
    responseContent: row.response_content,
    createdAt: toMillis(row.created_at)
  };
}

// Append-only: rows are never updated or deleted.
export class FailureLogRepository {
  private db: Knex;

  constructor(db: Knex) {
    this.db = db;
  }

  async append(failure: NewFailure, nowMs: number, conn: Knex = this.db): Promise<void> {
    await conn(FAILURES_TABLE).insert({
      job_id: failure.jobId,
      attempt_number: failure.attemptNumber,
      response_status: failure.responseStatus,
      response_content: failure.responseContent,
      created_at: nowMs
    });
  }

  async listForJob(jobId: number): Promise<FailureLogEntry[]> {
    const rows = await this.db<FailureLogRow>(FAILURES_TABLE)
      .select('*')
      .where('job_id', jobId)
      .orderBy('id', 'asc');

    return rows.map(toEntry);
  }
}
