// src/db/repositories/requestsRepository.ts
import type { Knex } from 'knex';
import type { JobRequestRow } from '../../types/job';
import { REQUESTS_TABLE } from '../schema';
import { toMillis } from '../rows';

export interface PendingRequest {
  requestId: string;
  clientId: string;
  jobId: number;
  createdAt: number;
}

export interface PendingQuery {
  clientId: string;
  staleBefore: number;
  limit: number;
  /** Last row of the previous page. */
  after?: Pick<PendingRequest, 'createdAt' | 'requestId'> | null;
}

/**
 * Links an in-flight HTTP request handle to the job that issued it until
 * the resolution sweep classifies the result.
 */
export class RequestsRepository {
  private db: Knex;

  constructor(db: Knex) {
    this.db = db;
  }

  async record(
    requestId: string,
    clientId: string,
    jobId: number,
    nowMs: number,
    conn: Knex = this.db
  ): Promise<void> {
    await conn(REQUESTS_TABLE).insert({
      request_id: requestId,
      client_id: clientId,
      job_id: jobId,
      created_at: nowMs
    });
  }

  /**
   * Join rows the resolution sweep may settle: this client's own requests
   * and other clients' requests created at or before `staleBefore`.
   * Keyset-paged on (created_at, request_id).
   */
  async listPending(query: PendingQuery): Promise<PendingRequest[]> {
    const { after } = query;

    const rows = await this.db<JobRequestRow>(REQUESTS_TABLE)
      .select('*')
      .where((visible) => {
        visible.where('client_id', query.clientId).orWhere('created_at', '<=', query.staleBefore);
      })
      .modify((qb) => {
        if (!after) return;
        qb.andWhere((page) => {
          page.where('created_at', '>', after.createdAt).orWhere((same) => {
            same.where('created_at', after.createdAt).andWhere('request_id', '>', after.requestId);
          });
        });
      })
      .orderBy('created_at', 'asc')
      .orderBy('request_id', 'asc')
      .limit(query.limit);

    return rows.map((row: JobRequestRow) => ({
      requestId: row.request_id,
      clientId: row.client_id,
      jobId: Number(row.job_id),
      createdAt: toMillis(row.created_at)
    }));
  }

  async remove(requestId: string, conn: Knex = this.db): Promise<boolean> {
    const count = await conn(REQUESTS_TABLE).where('request_id', requestId).del();
    return count === 1;
  }
}
