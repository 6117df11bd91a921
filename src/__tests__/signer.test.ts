import { createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import { computeSignature, resolveSigningSecret, safeEqual, signHeaders } from '../jobs/signer';
import { EnvSecretResolver, StaticSecretResolver } from '../services/secretResolver';
import type { SigningConfig } from '../types/job';

const base: SigningConfig = {
  secret: 'test-secret',
  vault: null,
  header: 'X-HMAC-Signature',
  style: 'PLAIN',
  algorithm: 'sha256',
  encoding: 'hex'
};

const body = '{"order":42}';

describe('computeSignature', () => {
  it('signs the payload text with the configured algorithm and encoding', () => {
    const expected = createHmac('sha256', 'test-secret').update(body).digest('hex');
    expect(computeSignature(body, Buffer.from('test-secret'), base)).toBe(expected);
  });

  it('prefixes the algorithm name in PREFIXED style', () => {
    const expected = createHmac('sha1', 'test-secret').update(body).digest('base64');
    const signature = computeSignature(body, Buffer.from('test-secret'), {
      style: 'PREFIXED',
      algorithm: 'sha1',
      encoding: 'base64'
    });
    expect(signature).toBe(`sha1=${expected}`);
  });
});

describe('signHeaders', () => {
  it('adds the signature under the configured header, replacing any case variant', async () => {
    const headers = await signHeaders(
      body,
      { 'x-hmac-signature': 'stale', Accept: 'application/json' },
      base,
      new StaticSecretResolver()
    );
    expect(headers).toEqual({
      Accept: 'application/json',
      'X-HMAC-Signature': createHmac('sha256', 'test-secret').update(body).digest('hex')
    });
  });

  it('leaves headers alone without a secret', async () => {
    const headers = await signHeaders(body, { Accept: '*/*' }, { ...base, secret: null }, new StaticSecretResolver());
    expect(headers).toEqual({ Accept: '*/*' });
  });

  it('resolves the secret from the vault', async () => {
    const headers = await signHeaders(
      body,
      {},
      { ...base, secret: null, vault: 'partner-a', header: 'X-Sig' },
      new EnvSecretResolver({ VAULT_SECRET_PARTNER_A: 'test-vault-secret' })
    );
    expect(headers['X-Sig']).toBe(createHmac('sha256', 'test-vault-secret').update(body).digest('hex'));
  });
});

describe('resolveSigningSecret', () => {
  it('prefers the direct secret over the vault', async () => {
    const secret = await resolveSigningSecret(
      { secret: 'direct', vault: 'partner-a' },
      new StaticSecretResolver({ 'partner-a': 'from-vault' })
    );
    expect(secret?.toString('utf8')).toBe('direct');
  });

  it('fails on an unknown vault entry', async () => {
    await expect(resolveSigningSecret({ secret: null, vault: 'missing' }, new StaticSecretResolver())).rejects.toThrow(
      'Signing vault entry "missing" could not be resolved'
    );
  });
});

describe('EnvSecretResolver.variableName', () => {
  it('maps vault names onto environment variables', () => {
    expect(EnvSecretResolver.variableName('partner-a')).toBe('VAULT_SECRET_PARTNER_A');
    expect(EnvSecretResolver.variableName('billing.v2 key')).toBe('VAULT_SECRET_BILLING_V2_KEY');
  });
});

describe('safeEqual', () => {
  it('compares strings of any length', () => {
    expect(safeEqual('abc', 'abc')).toBe(true);
    expect(safeEqual('abc', 'abd')).toBe(false);
    expect(safeEqual('abc', 'abcd')).toBe(false);
  });
});
