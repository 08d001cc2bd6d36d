import type { Request, Response, NextFunction } from 'express';
import { createHash, timingSafeEqual } from 'node:crypto';

// Augment Express Request to include the authenticated caller
declare global {
  namespace Express {
    interface Request {
      caller?: string | null;
    }
  }
}

export interface CallerCredential {
  identity: string;
  token: string;
}

export interface AuthMiddleware {
  authenticate: (req: Request, res: Response, next: NextFunction) => void;
  protect: (req: Request, res: Response, next: NextFunction) => void;
  /** Identity holding the token, or null. */
  resolveToken: (token: string) => string | null;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1] : null;
}

export function createAuth(callers: CallerCredential[]): AuthMiddleware {
  const known = callers.map((c) => ({ identity: c.identity, digest: digest(c.token) }));

  function resolveToken(token: string): string | null {
    const presented = digest(token);
    let identity: string | null = null;
    // Compare against every entry so timing does not reveal the match position
    for (const entry of known) {
      if (timingSafeEqual(presented, entry.digest) && identity === null) {
        identity = entry.identity;
      }
    }
    return identity;
  }

  // ── Middleware: resolve caller from bearer token (non-blocking) ──
  function authenticate(req: Request, _res: Response, next: NextFunction) {
    const token = bearerToken(req.headers.authorization);
    req.caller = token ? resolveToken(token) : null;
    next();
  }

  // ── Middleware: reject unauthenticated requests ──
  function protect(req: Request, res: Response, next: NextFunction) {
    if (!req.caller) {
      res.status(401).json({ error: 'Authentication required', code: 'unauthenticated' });
      return;
    }
    next();
  }

  return { authenticate, protect, resolveToken };
}
