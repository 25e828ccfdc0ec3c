import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

/** Constant-time string comparison using SHA-256 hashes to prevent length leaking */
export function safeEqual(a: string, b: string): boolean {
  const ha = createHash('sha256').update(a).digest();
  const hb = createHash('sha256').update(b).digest();
  return timingSafeEqual(ha, hb);
}

/**
 * Bearer auth against the master key. An empty master key locks the API
 * rather than opening it.
 */
export function createAuthMiddleware(masterKey: () => string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing or invalid Authorization header' });
      return;
    }

    const token = authHeader.slice(7);
    const key = masterKey();
    if (!token || !key || !safeEqual(token, key)) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }
    next();
  };
}
