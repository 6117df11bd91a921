// src/utils/dateUtils.ts

/** Current time in epoch milliseconds. Injected wherever time matters. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function addSeconds(epochMs: number, seconds: number): number {
  return epochMs + seconds * 1000;
}

export function toEpochSeconds(epochMs: number): number {
  return epochMs / 1000;
}

export function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}
