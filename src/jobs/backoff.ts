// src/jobs/backoff.ts

/**
 * Delay before the next attempt after an ordinary failure.
 * `retryCount` is the count before this attempt is added.
 *
 *   round((2^n * (10 - n / 1.5)) / 2), half away from zero, floored at 0
 */
export function backoffDelaySeconds(retryCount: number): number {
  const raw = (Math.pow(2, retryCount) * (10 - retryCount / 1.5)) / 2;
  const rounded = Math.sign(raw) * Math.round(Math.abs(raw));
  return Math.max(0, rounded);
}

/**
 * Parses a Retry-After value (delta-seconds or HTTP date) into seconds
 * from `nowMs`. Returns null when the value is absent or unusable.
 */
export function parseRetryAfter(value: string | undefined, nowMs: number): number | null {
  if (value === undefined) return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;

  return Math.max(0, Math.ceil((date - nowMs) / 1000));
}

export function rateLimitDelaySeconds(
  retryAfter: string | undefined,
  nowMs: number,
  defaultSeconds: number
): number {
  return parseRetryAfter(retryAfter, nowMs) ?? defaultSeconds;
}
