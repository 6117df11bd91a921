// src/db/repositories/triggerAuditRepository.ts
import type { Knex } from 'knex';
import type { TriggerAuditRow } from '../../types/job';
import { TRIGGER_AUDIT_TABLE } from '../schema';
import { toMillis } from '../rows';

export interface TriggerAuditEntry {
  id: number;
  jobId: number;
  triggerName: string;
  createdAt: number;
}

export class TriggerAuditRepository {
  private db: Knex;

  constructor(db: Knex) {
    this.db = db;
  }

  async record(jobId: number, triggerName: string, nowMs: number, conn: Knex = this.db): Promise<void> {
    await conn(TRIGGER_AUDIT_TABLE).insert({
      job_id: jobId,
      trigger_name: triggerName,
      created_at: nowMs
    });
  }

  async listForJob(jobId: number): Promise<TriggerAuditEntry[]> {
    const rows = await this.db<TriggerAuditRow>(TRIGGER_AUDIT_TABLE)
      .select('*')
      .where('job_id', jobId)
      .orderBy('id', 'asc');

    return rows.map((row) => ({
      id: Number(row.id),
      jobId: Number(row.job_id),
      triggerName: row.trigger_name,
      createdAt: toMillis(row.created_at)
    }));
  }
}
