import { describe, it, expect } from 'vitest';
import { normalizeSubmission } from '../jobs/validation';
import { JobValidationError } from '../jobs/errors';
import { T0 } from './helpers';

const defaults = { retryLimit: 10, nowMs: T0 };

function issuesOf(raw: unknown): string[] {
  try {
    normalizeSubmission(raw, defaults);
  } catch (err) {
    if (err instanceof JobValidationError) return err.issues;
    throw err;
  }
  return [];
}

describe('normalizeSubmission', () => {
  it('fills in defaults', () => {
    const draft = normalizeSubmission({ job_type: 'POST', target: 'https://hooks.test/in' }, defaults);
    expect(draft).toEqual({
      owner: null,
      jobType: 'POST',
      target: 'https://hooks.test/in',
      payloadText: '{}',
      headers: {},
      auth: null,
      signing: {
        secret: null,
        vault: null,
        header: 'X-HMAC-Signature',
        style: 'PLAIN',
        algorithm: 'sha256',
        encoding: 'hex'
      },
      retryLimit: 10,
      runAt: T0
    });
  });

  it('keeps the payload text exactly as it will be sent', () => {
    const draft = normalizeSubmission(
      { job_type: 'POST', target: 'https://hooks.test/in', payload: { b: 1, a: [true, null] } },
      defaults
    );
    expect(draft.payloadText).toBe('{"b":1,"a":[true,null]}');
  });

  it('reads run_at from ISO text or epoch ms', () => {
    const iso = normalizeSubmission(
      { job_type: 'GET', target: 'https://hooks.test/in', run_at: '2024-01-15T12:30:00Z' },
      defaults
    );
    expect(iso.runAt).toBe(T0 + 30 * 60_000);

    const ms = normalizeSubmission({ job_type: 'GET', target: 'https://hooks.test/in', run_at: T0 + 5 }, defaults);
    expect(ms.runAt).toBe(T0 + 5);
  });

  it('marks session auth for the caller token', () => {
    const draft = normalizeSubmission(
      { job_type: 'GET', target: 'https://hooks.test/in', auth: { type: 'session' } },
      defaults
    );
    expect(draft.auth).toEqual({ type: 'session', token: null });
  });

  it('requires an owner for POLL jobs', () => {
    expect(issuesOf({ job_type: 'POLL', target: 'queue' })).toEqual(['owner is required for POLL jobs']);
  });

  it('requires named arguments for FUNC jobs', () => {
    expect(issuesOf({ job_type: 'FUNC', target: 'billing.charge', payload: [1, 2] })).toEqual([
      'payload must be an object of named arguments for FUNC jobs'
    ]);
  });

  it('rejects non-http targets for HTTP jobs', () => {
    expect(issuesOf({ job_type: 'GET', target: 'ftp://files.test/x' })).toEqual([
      'target protocol must be http: or https:, got ftp:'
    ]);
    expect(issuesOf({ job_type: 'DELETE', target: 'not a url' })).toEqual(['target is not a valid URL: not a url']);
  });

  it('collects every problem at once', () => {
    const issues = issuesOf({
      job_type: 'PUT',
      target: '',
      retry_limit: -1,
      headers: { 'X-Count': 3 },
      auth: { type: 'jwt' },
      signing: { algorithm: 'crc32', header: 'bad header' }
    });
    expect(issues).toEqual([
      'job_type must be one of GET, POST, DELETE, FUNC, POLL',
      'target is required',
      'headers must map header names to string values',
      'retry_limit must be an integer >= 0',
      'auth.token is required for jwt auth',
      'signing.header must be a valid header name',
      'signing.algorithm must be one of md5, sha1, sha224, sha256, sha384, sha512'
    ]);
  });

  it('rejects a non-object submission', () => {
    expect(issuesOf('GET https://hooks.test')).toEqual(['job must be an object']);
  });
});
