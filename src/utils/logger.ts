// src/utils/logger.ts
import { randomUUID } from 'crypto';
import axios from 'axios';

type LogLevel = 'info' | 'warn' | 'error';

export function createContextId(scope: string): string {
  return `${scope}:${randomUUID()}`;
}

export function createChildContextId(parentCtx: string, scope: string): string {
  return `${scope}:${parentCtx.split(':')[1] ?? randomUUID()}`;
}

function write(
  level: LogLevel,
  ctx: string,
  msg: string,
  meta: Record<string, unknown>
): void {
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    ctx,
    msg,
    meta
  });

  if (level === 'info') {
    console.log(line);
  } else {
    console.error(line);
  }
}

export function logInfo(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('info', ctx, msg, meta);
}

export function logWarn(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('warn', ctx, msg, meta);
}

export function logError(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('error', ctx, msg, meta);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Outbound HTTP error logger.
 * Extracts URL, method, status and response body when axios produced them.
 */
export function logHttpError(ctx: string, err: unknown): void {
  if (!axios.isAxiosError(err)) {
    logError(ctx, 'HTTP request error', { message: errorMessage(err) });
    return;
  }

  logError(ctx, 'HTTP request error', {
    url: err.config?.url,
    method: err.config?.method,
    code: err.code,
    status: err.response?.status,
    data: err.response?.data,
    message: err.message
  });
}
