import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Knex } from 'knex';
import { JobsRepository } from '../db/repositories/jobsRepository';
import { JOBS_TABLE, REQUESTS_TABLE } from '../db/schema';
import { normalizeSubmission } from '../jobs/validation';
import type { JobSubmission } from '../jobs/validation';
import { InvalidTransitionError } from '../jobs/errors';
import { createTestDb, T0 } from './helpers';

function draft(submission: JobSubmission) {
  return normalizeSubmission(submission, { retryLimit: 3, nowMs: T0 });
}

describe('JobsRepository', () => {
  let db: Knex;
  let jobs: JobsRepository;

  beforeEach(async () => {
    db = await createTestDb();
    jobs = new JobsRepository(db, { rowLocking: false });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('stores and reads back a job', async () => {
    const created = await jobs.insert(
      draft({
        job_type: 'POST',
        target: 'https://hooks.test/a',
        owner: 'acct-1',
        payload: { n: 1 },
        headers: { 'X-Trace': 't1' },
        auth: { type: 'jwt', token: 'test-token' }
      }),
      T0
    );

    const found = await jobs.findById(created.id);
    expect(found).toEqual({
      id: created.id,
      owner: 'acct-1',
      jobType: 'POST',
      status: 'new',
      target: 'https://hooks.test/a',
      payloadText: '{"n":1}',
      headers: { 'X-Trace': 't1' },
      auth: { type: 'jwt', token: 'test-token' },
      signing: {
        secret: null,
        vault: null,
        header: 'X-HMAC-Signature',
        style: 'PLAIN',
        algorithm: 'sha256',
        encoding: 'hex'
      },
      retryCount: 0,
      retryLimit: 3,
      runAt: T0,
      lastAt: null,
      responseStatus: null,
      responseContent: null,
      responseHeaders: null,
      createdAt: T0,
      updatedAt: T0
    });
  });

  it('claims due jobs oldest first and marks them processing', async () => {
    const late = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/late', run_at: T0 - 1_000 }), T0);
    const early = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/early', run_at: T0 - 5_000 }), T0);
    await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/future', run_at: T0 + 60_000 }), T0);

    const claimed = await jobs.claimDue(T0, 10);
    expect(claimed.map((j) => j.id)).toEqual([early.id, late.id]);
    expect(claimed.every((j) => j.status === 'processing')).toBe(true);

    const stored = await db(JOBS_TABLE).select('id', 'status').orderBy('id');
    expect(stored.map((r) => r.status)).toEqual(['processing', 'processing', 'new']);
  });

  it('respects the batch size', async () => {
    for (let i = 0; i < 5; i++) {
      await jobs.insert(draft({ job_type: 'GET', target: `https://hooks.test/${i}` }), T0);
    }
    expect(await jobs.claimDue(T0, 2)).toHaveLength(2);
    expect(await jobs.claimDue(T0, 10)).toHaveLength(3);
    expect(await jobs.claimDue(T0, 10)).toHaveLength(0);
  });

  it('never hands the same job to two sweeps', async () => {
    for (let i = 0; i < 6; i++) {
      await jobs.insert(draft({ job_type: 'POST', target: `https://hooks.test/${i}` }), T0);
    }

    const [a, b] = await Promise.all([jobs.claimDue(T0, 10), jobs.claimDue(T0, 10)]);
    const ids = [...a, ...b].map((j) => j.id);
    expect(ids).toHaveLength(6);
    expect(new Set(ids).size).toBe(6);
  });

  it('drops a job whose status changed between the read and the swap', async () => {
    const job = await jobs.insert(draft({ job_type: 'POST', target: 'https://hooks.test/race' }), T0);
    const swap = jobs.transition.bind(jobs);

    vi.spyOn(jobs, 'transition').mockImplementationOnce(async (id, from, to, nowMs, patch, conn) => {
      await (conn ?? db)(JOBS_TABLE).where('id', id).update({ status: 'processing', updated_at: nowMs });
      return swap(id, from, to, nowMs, patch, conn);
    });

    expect(await jobs.claimDue(T0, 10)).toEqual([]);
    expect((await jobs.findById(job.id))?.status).toBe('processing');
  });

  it('finds claims left processing with nothing in flight', async () => {
    const stuck = await jobs.insert(draft({ job_type: 'FUNC', target: 'ops.run', payload: {} }), T0);
    const inFlight = await jobs.insert(draft({ job_type: 'POST', target: 'https://hooks.test/in' }), T0);
    const fresh = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/g' }), T0);
    await db(JOBS_TABLE).whereIn('id', [stuck.id, inFlight.id]).update({ status: 'processing', updated_at: T0 });
    await db(JOBS_TABLE).where('id', fresh.id).update({ status: 'processing', updated_at: T0 + 1 });
    await db(REQUESTS_TABLE).insert({ request_id: 'client-a:1', client_id: 'client-a', job_id: inFlight.id, created_at: T0 });

    const abandoned = await jobs.findAbandonedClaims(T0, 10);
    expect(abandoned.map((j) => j.id)).toEqual([stuck.id]);
  });

  it('only reclaims failed jobs within their retry limit', async () => {
    const retrying = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/r' }), T0);
    const spent = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/s' }), T0);
    await db(JOBS_TABLE).where('id', retrying.id).update({ status: 'failed', retry_count: 3 });
    await db(JOBS_TABLE).where('id', spent.id).update({ status: 'failed', retry_count: 4 });

    const claimed = await jobs.claimDue(T0, 10);
    expect(claimed.map((j) => j.id)).toEqual([retrying.id]);
  });

  it('leaves new POLL jobs to pull consumers but reclaims expired leases', async () => {
    const waiting = await jobs.insert(draft({ job_type: 'POLL', target: 'queue', owner: 'acct-1' }), T0);
    const leased = await jobs.insert(draft({ job_type: 'POLL', target: 'queue', owner: 'acct-1' }), T0);
    await db(JOBS_TABLE).where('id', leased.id).update({ status: 'polled', run_at: T0 - 1 });

    const claimed = await jobs.claimDue(T0, 10);
    expect(claimed.map((j) => j.id)).toEqual([leased.id]);
    expect((await jobs.findById(waiting.id))?.status).toBe('new');
  });

  it('ignores terminal jobs whatever their run_at', async () => {
    const done = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/d' }), T0);
    await db(JOBS_TABLE).where('id', done.id).update({ status: 'server_error' });
    expect(await jobs.claimDue(T0 + 86_400_000, 10)).toEqual([]);
  });

  it('changes status only from the expected one', async () => {
    const job = await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/x' }), T0);

    expect(await jobs.transition(job.id, 'new', 'processing', T0 + 1)).toBe(true);
    expect(await jobs.transition(job.id, 'new', 'processing', T0 + 2)).toBe(false);
    await expect(jobs.transition(job.id, 'completed', 'processing', T0 + 3)).rejects.toThrow(InvalidTransitionError);

    const stored = await jobs.findById(job.id);
    expect(stored?.status).toBe('processing');
    expect(stored?.updatedAt).toBe(T0 + 1);
  });

  it('filters and paginates the job list', async () => {
    await jobs.insert(draft({ job_type: 'GET', target: 'https://hooks.test/1', owner: 'a' }), T0);
    await jobs.insert(draft({ job_type: 'POST', target: 'https://hooks.test/2', owner: 'a' }), T0);
    await jobs.insert(draft({ job_type: 'POST', target: 'https://hooks.test/3', owner: 'b' }), T0);

    const byOwner = await jobs.list({ owner: 'a' });
    expect(byOwner.data.map((j) => j.target)).toEqual(['https://hooks.test/2', 'https://hooks.test/1']);
    expect(byOwner.pagination).toEqual({ limit: 50, offset: 0, count: 2 });

    const page = await jobs.list({ type: 'POST', limit: 1, offset: 1 });
    expect(page.data.map((j) => j.target)).toEqual(['https://hooks.test/2']);
    expect(page.pagination.count).toBe(2);

    expect((await jobs.list({ limit: 5000 })).pagination.limit).toBe(200);
  });

  it('refuses to replace the payload of a finished job', async () => {
    const job = await jobs.insert(draft({ job_type: 'POST', target: 'https://hooks.test/p' }), T0);
    expect(await jobs.updatePayload(job.id, '{"v":2}', T0 + 1)).toBe(true);

    await db(JOBS_TABLE).where('id', job.id).update({ status: 'completed' });
    expect(await jobs.updatePayload(job.id, '{"v":3}', T0 + 2)).toBe(false);
    expect((await jobs.findById(job.id))?.payloadText).toBe('{"v":2}');
  });
});
