// src/services/pollService.ts
import type { Job, JobHeaders } from '../types/job';
import type { JobsRepository } from '../db/repositories/jobsRepository';
import type { SecretResolver } from './secretResolver';
import { AuthenticationError } from '../jobs/errors';
import { hmacSha256Hex, resolveSigningSecret, safeEqual } from '../jobs/signer';
import { addSeconds, Clock, toEpochSeconds } from '../utils/dateUtils';
import { errorMessage, logInfo, logWarn } from '../utils/logger';

export interface PollRequest {
  owner: string;
  /** Epoch seconds as the caller signed it. */
  timestamp: number | string;
  hmac: string;
  asUser?: boolean;
  /** Identity of the authenticated caller; required when asUser is set. */
  callerId?: string | null;
  autoAck?: boolean;
}

export interface PolledJob {
  id: number;
  payload: unknown;
  headers: JobHeaders;
}

export interface PollServiceDeps {
  jobs: JobsRepository;
  secrets: SecretResolver;
  leaseSeconds: number;
  maxClockSkewSeconds: number;
  now: Clock;
}

export function pollStringToSign(owner: string, timestamp: number | string, callerId?: string | null): string {
  return `${owner}${String(timestamp)}${callerId ?? ''}POLL`;
}

export function ackStringToSign(jobId: number): string {
  return `${jobId}ACK`;
}

/**
 * Lease protocol for pull consumers of POLL jobs. Leases that run out are
 * not watched here: the claim sweep finds them still `polled` past run_at.
 */
export class PollService {
  private deps: PollServiceDeps;

  constructor(deps: PollServiceDeps) {
    this.deps = deps;
  }

  private async matches(job: Job, message: string, hmac: string): Promise<boolean> {
    try {
      const secret = await resolveSigningSecret(job.signing, this.deps.secrets);
      return secret !== null && safeEqual(hmacSha256Hex(message, secret), hmac);
    } catch (err) {
      logWarn(`job:${job.id}`, 'Signing secret unavailable for poll authentication', {
        error: errorMessage(err)
      });
      return false;
    }
  }

  /**
   * Leases the oldest waiting POLL job for `owner` whose secret
   * authenticates the request. Null when nothing is waiting.
   */
  async poll(req: PollRequest): Promise<PolledJob | null> {
    const { jobs, leaseSeconds, maxClockSkewSeconds } = this.deps;
    const nowMs = this.deps.now();
    const ctx = `poll:${req.owner}`;

    const ts = Number(req.timestamp);
    if (!Number.isFinite(ts)) {
      throw new AuthenticationError('Invalid timestamp');
    }
    if (ts < toEpochSeconds(nowMs) - maxClockSkewSeconds) {
      throw new AuthenticationError('Timestamp too old');
    }
    if (req.asUser && !req.callerId) {
      throw new AuthenticationError('Caller identity required');
    }

    const message = pollStringToSign(req.owner, req.timestamp, req.asUser ? req.callerId : null);

    return jobs.transaction(async (trx) => {
      const candidates = await jobs.findPollCandidates(req.owner, nowMs, trx);
      if (!candidates.length) return null;

      let authenticated = false;

      for (const candidate of candidates) {
        if (!(await this.matches(candidate, message, req.hmac))) continue;
        authenticated = true;

        const job = await jobs.lockForClaim(candidate.id, 'new', trx);
        if (!job) continue;

        const claimed = req.autoAck
          ? await jobs.transition(job.id, 'new', 'completed', nowMs, { last_at: nowMs }, trx)
          : await jobs.transition(
              job.id,
              'new',
              'polled',
              nowMs,
              { last_at: nowMs, run_at: addSeconds(nowMs, leaseSeconds) },
              trx
            );
        if (!claimed) continue;

        logInfo(ctx, req.autoAck ? 'Job polled and acknowledged' : 'Job leased', {
          jobId: job.id,
          leaseSeconds: req.autoAck ? null : leaseSeconds
        });

        return { id: job.id, payload: JSON.parse(job.payloadText), headers: job.headers };
      }

      if (!authenticated) {
        throw new AuthenticationError('Invalid signature');
      }
      return null;
    });
  }

  /**
   * Completes a leased job. False, with nothing changed, unless the job is
   * `polled` and the signature matches.
   */
  async ack(jobId: number, hmac: string): Promise<boolean> {
    const { jobs } = this.deps;
    const nowMs = this.deps.now();
    const ctx = `job:${jobId}`;

    return jobs.transaction(async (trx) => {
      const job = await jobs.lockForClaim(jobId, 'polled', trx);
      if (!job) {
        logWarn(ctx, 'Ack rejected: job is not leased');
        return false;
      }

      if (!(await this.matches(job, ackStringToSign(jobId), hmac))) {
        logWarn(ctx, 'Ack rejected: signature mismatch');
        return false;
      }

      const done = await jobs.transition(jobId, 'polled', 'completed', nowMs, { last_at: nowMs }, trx);
      if (done) logInfo(ctx, 'Job acknowledged');
      return done;
    });
  }
}
