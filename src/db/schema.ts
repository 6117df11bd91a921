// src/db/schema.ts
import type { Knex } from 'knex';

export const JOBS_TABLE = 'jobs';
export const FAILURES_TABLE = 'job_failures';
export const REQUESTS_TABLE = 'job_requests';
export const TRIGGER_AUDIT_TABLE = 'job_trigger_audit';

/**
 * Creates the engine's tables when they are missing.
 * Times are epoch milliseconds in bigInteger columns.
 */
export async function ensureSchema(db: Knex): Promise<string[]> {
  const created: string[] = [];

  if (!(await db.schema.hasTable(JOBS_TABLE))) {
    await db.schema.createTable(JOBS_TABLE, (t) => {
      t.increments('id').primary();
      t.string('owner', 255).nullable();
      t.string('job_type', 16).notNullable();
      t.string('status', 16).notNullable().defaultTo('new');
      t.text('target').notNullable();
      t.text('payload', 'longtext').notNullable();
      t.text('headers').notNullable();
      t.string('auth_type', 16).nullable();
      t.text('auth_token').nullable();
      t.text('signing_secret').nullable();
      t.string('signing_vault', 255).nullable();
      t.string('signing_header', 255).notNullable();
      t.string('signing_style', 16).notNullable();
      t.string('signing_algorithm', 16).notNullable();
      t.string('signing_encoding', 16).notNullable();
      t.integer('retry_count').notNullable().defaultTo(0);
      t.integer('retry_limit').notNullable().defaultTo(10);
      t.bigInteger('run_at').notNullable();
      t.bigInteger('last_at').nullable();
      t.integer('response_status').nullable();
      t.text('response_content', 'longtext').nullable();
      t.text('response_headers').nullable();
      t.bigInteger('created_at').notNullable();
      t.bigInteger('updated_at').notNullable();

      t.index(['status', 'run_at'], 'jobs_status_run_at_idx');
      t.index(['owner', 'job_type', 'status'], 'jobs_owner_type_status_idx');
    });
    created.push(JOBS_TABLE);
  }

  if (!(await db.schema.hasTable(FAILURES_TABLE))) {
    await db.schema.createTable(FAILURES_TABLE, (t) => {
      t.increments('id').primary();
      t.integer('job_id').unsigned().notNullable().references('id').inTable(JOBS_TABLE);
      t.integer('attempt_number').notNullable();
      t.integer('response_status').notNullable();
      t.text('response_content', 'longtext').nullable();
      t.bigInteger('created_at').notNullable();

      t.index(['job_id'], 'job_failures_job_id_idx');
    });
    created.push(FAILURES_TABLE);
  }

  if (!(await db.schema.hasTable(REQUESTS_TABLE))) {
    await db.schema.createTable(REQUESTS_TABLE, (t) => {
      t.string('request_id', 80).primary();
      t.string('client_id', 64).notNullable();
      t.integer('job_id').unsigned().notNullable().references('id').inTable(JOBS_TABLE);
      t.bigInteger('created_at').notNullable();

      t.index(['client_id'], 'job_requests_client_id_idx');
    });
    created.push(REQUESTS_TABLE);
  }

  if (!(await db.schema.hasTable(TRIGGER_AUDIT_TABLE))) {
    await db.schema.createTable(TRIGGER_AUDIT_TABLE, (t) => {
      t.increments('id').primary();
      t.integer('job_id').unsigned().notNullable().references('id').inTable(JOBS_TABLE);
      t.string('trigger_name', 255).notNullable();
      t.bigInteger('created_at').notNullable();

      t.index(['job_id'], 'job_trigger_audit_job_id_idx');
    });
    created.push(TRIGGER_AUDIT_TABLE);
  }

  return created;
}
