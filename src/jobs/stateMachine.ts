// src/jobs/stateMachine.ts
import type { JobStatus } from '../types/job';
import { InvalidTransitionError } from './errors';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  new: ['processing', 'polled', 'completed'],
  failed: ['processing'],
  polled: ['processing', 'completed'],
  processing: [
    'completed',
    'redirected',
    'failed',
    'server_error',
    'too_many',
    'other',
    // lease expiry of a POLL job
    'new'
  ],
  completed: [],
  redirected: [],
  server_error: [],
  too_many: [],
  other: []
};

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  'completed',
  'redirected',
  'server_error',
  'too_many',
  'other'
];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
