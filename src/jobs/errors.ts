// src/jobs/errors.ts
import type { JobStatus } from '../types/job';

/**
 * How an attempt ended. Carried by every classifier decision and logged;
 * never thrown.
 */
export type OutcomeCategory =
  | 'Success'
  | 'Redirected'
  | 'TransientFailure'
  | 'RateLimited'
  | 'PermanentServerFailure'
  | 'PermanentClientSuccess'
  | 'RetriesExhausted'
  | 'Unclassified'
  | 'InternalExecutionError'
  | 'LeaseExpired';

export class JobValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid job: ${issues.join('; ')}`);
    this.name = 'JobValidationError';
    this.issues = issues;
  }
}

export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class InvalidTransitionError extends Error {
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(from: JobStatus, to: JobStatus) {
    super(`Transition ${from} -> ${to} is not allowed`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class JobNotFoundError extends Error {
  readonly jobId: number;

  constructor(jobId: number) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
    this.jobId = jobId;
  }
}

export class FunctionNotFoundError extends Error {
  constructor(qualifiedName: string) {
    super(`Function ${qualifiedName} is not registered`);
    this.name = 'FunctionNotFoundError';
  }
}
