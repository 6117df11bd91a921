// src/jobs/signer.ts
import { createHmac, timingSafeEqual } from 'crypto';
import type { JobHeaders, SigningConfig } from '../types/job';
import type { SecretResolver } from '../services/secretResolver';
import { mergeHeaders } from '../utils/headers';

export const DEFAULT_SIGNING_HEADER = 'X-HMAC-Signature';

/**
 * Direct secret first, then the vault entry. Null means "do not sign".
 */
export async function resolveSigningSecret(
  signing: Pick<SigningConfig, 'secret' | 'vault'>,
  secrets: SecretResolver
): Promise<Buffer | null> {
  if (signing.secret) {
    return Buffer.from(signing.secret, 'utf8');
  }

  if (signing.vault) {
    const resolved = await secrets.resolve(signing.vault);
    if (!resolved) {
      throw new Error(`Signing vault entry "${signing.vault}" could not be resolved`);
    }
    return resolved;
  }

  return null;
}

export function computeSignature(
  payloadText: string,
  secret: Buffer,
  signing: Pick<SigningConfig, 'algorithm' | 'encoding' | 'style'>
): string {
  const digest = createHmac(signing.algorithm, secret)
    .update(payloadText, 'utf8')
    .digest(signing.encoding);

  return signing.style === 'PREFIXED' ? `${signing.algorithm}=${digest}` : digest;
}

/**
 * Returns `headers` with the signature added under the configured header
 * name, or unchanged when the job carries no secret.
 */
export async function signHeaders(
  payloadText: string,
  headers: JobHeaders,
  signing: SigningConfig,
  secrets: SecretResolver
): Promise<JobHeaders> {
  const secret = await resolveSigningSecret(signing, secrets);
  if (!secret) return headers;

  return mergeHeaders(headers, {
    [signing.header]: computeSignature(payloadText, secret, signing)
  });
}

// Poll/ack request authentication: sha256, hex.
export function hmacSha256Hex(message: string, secret: Buffer): string {
  return createHmac('sha256', secret).update(message, 'utf8').digest('hex');
}

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}
