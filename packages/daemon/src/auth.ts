import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Compares the provided token against the expected one. With no expected
 * token configured, validation always passes.
 */
export function validateToken(expectedToken: string | undefined, token?: string): boolean {
  if (!expectedToken) {
    return true; // Auth disabled if no token configured
  }
  if (token === undefined) return false;
  const a = Buffer.from(token);
  const b = Buffer.from(expectedToken);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Extracts token from Authorization header (Bearer) or query parameter 'token'.
 */
export function extractToken(req: Pick<Request, 'headers' | 'query'>): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }

  // Scrapers that cannot set headers pass ?token=
  const queryToken = req.query?.token;
  return typeof queryToken === 'string' ? queryToken : undefined;
}

/**
 * Express middleware enforcing the token when one is configured.
 */
export function requireToken(expectedToken: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedToken) {
      return next();
    }

    if (!validateToken(expectedToken, extractToken(req))) {
      console.warn(`[auth] Unauthorized access attempt from ${req.ip}`);
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    next();
  };
}
