// src/utils/headers.ts
import type { JobHeaders } from '../types/job';

export function getHeader(headers: JobHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function hasHeader(headers: JobHeaders, name: string): boolean {
  return getHeader(headers, name) !== undefined;
}

/**
 * Merges header maps left to right; a later key replaces an earlier one
 * regardless of case.
 */
export function mergeHeaders(...maps: JobHeaders[]): JobHeaders {
  const out: JobHeaders = {};
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      for (const existing of Object.keys(out)) {
        if (existing.toLowerCase() === key.toLowerCase()) delete out[existing];
      }
      out[key] = value;
    }
  }
  return out;
}

/**
 * Flattens header values of any shape (arrays, numbers, nulls) into strings.
 */
export function normalizeHeaders(raw: Record<string, unknown>): JobHeaders {
  const out: JobHeaders = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
  }
  return out;
}

export function isHeaderMap(value: unknown): value is JobHeaders {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'string');
}
