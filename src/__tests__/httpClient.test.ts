import axios from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect } from 'vitest';
import { AsyncHttpClient } from '../services/httpClient';

function clientWith(adapter: (config: InternalAxiosRequestConfig) => Promise<{ status: number; data: string; headers: Record<string, string> }>) {
  const seen: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async (config) => {
      seen.push(config);
      const res = await adapter(config);
      return { ...res, statusText: '', config };
    }
  });
  return { http: new AsyncHttpClient({ client: instance }), seen };
}

describe('AsyncHttpClient', () => {
  it('hands out handles scoped to the client', () => {
    const { http } = clientWith(async () => ({ status: 200, data: '', headers: {} }));
    const first = http.submit({ method: 'GET', url: 'https://hooks.test/a', headers: {}, params: {}, body: null });
    const second = http.submit({ method: 'GET', url: 'https://hooks.test/b', headers: {}, params: {}, body: null });

    expect(first).toBe(`${http.clientId}:1`);
    expect(second).toBe(`${http.clientId}:2`);
  });

  it('reports pending, then the settled response until released', async () => {
    const { http, seen } = clientWith(async () => ({
      status: 503,
      data: 'down for maintenance',
      headers: { 'Retry-After': '30' }
    }));

    const handle = http.submit({
      method: 'POST',
      url: 'https://hooks.test/in',
      headers: { 'Content-Type': 'application/json', 'X-Sig': 'abc' },
      params: {},
      body: '{"a":1}'
    });
    expect(http.collect(handle)).toEqual({ state: 'pending' });

    await http.drain();

    const settled = {
      state: 'settled',
      result: { status: 503, headers: { 'retry-after': '30' }, body: 'down for maintenance' }
    };
    expect(http.collect(handle)).toEqual(settled);
    expect(http.collect(handle)).toEqual(settled);

    http.release(handle);
    expect(http.collect(handle)).toEqual({ state: 'unknown' });

    expect(seen[0].method).toBe('post');
    expect(seen[0].url).toBe('https://hooks.test/in');
    expect(seen[0].data).toBe('{"a":1}');
    expect(seen[0].headers.get('X-Sig')).toBe('abc');
  });

  it('passes query parameters through', async () => {
    const { http, seen } = clientWith(async () => ({ status: 200, data: 'ok', headers: {} }));
    http.submit({ method: 'GET', url: 'https://hooks.test/q', headers: {}, params: { id: '7' }, body: null });
    await http.drain();
    expect(seen[0].params).toEqual({ id: '7' });
  });

  it('turns transport errors into error results', async () => {
    const { http } = clientWith(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:9');
    });

    const handle = http.submit({ method: 'DELETE', url: 'https://hooks.test/x', headers: {}, params: {}, body: null });
    await http.drain();

    expect(http.collect(handle)).toEqual({
      state: 'settled',
      result: { status: 0, headers: {}, body: null, error: 'connect ECONNREFUSED 127.0.0.1:9' }
    });
  });

  it('does not know handles it never issued', () => {
    const { http } = clientWith(async () => ({ status: 200, data: '', headers: {} }));
    expect(http.collect('someone-else:1')).toEqual({ state: 'unknown' });
  });
});
