// src/middleware/internalSecret.ts
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { safeEqual } from '../jobs/signer';

export const INTERNAL_SECRET_HEADER = 'x-internal-secret';

/**
 * True when the request comes from a holder of the shared secret, or when
 * no secret is configured.
 */
export function hasInternalSecret(req: Request, configuredSecret: string | null): boolean {
  if (!configuredSecret) return true;

  const headerSecret = req.header(INTERNAL_SECRET_HEADER);
  return !!headerSecret && safeEqual(headerSecret, configuredSecret);
}

/**
 * Guards write routes with the shared secret. With no secret configured
 * nothing is blocked.
 */
export function verifyInternalSecret(configuredSecret: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!hasInternalSecret(req, configuredSecret)) {
      return res.status(401).json({ error: 'Unauthorized' });
    }

    return next();
  };
}
