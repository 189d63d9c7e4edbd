import type { Request, Response, NextFunction } from 'express';
import type { Authenticator } from '../auth/authenticate.js';
import { readSessionCookie, setSessionCookie } from '../auth/cookie.js';
import { isAuthError } from '../utils/errors.js';

export function logRejectedAuthentication(req: Request, error: unknown) {
  if (isAuthError(error)) {
    console.warn('Authentication rejected', {
      code: error.code,
      details: error.details,
      method: req.method,
      path: req.originalUrl,
      ip: req.ip,
    });
  }
}

/**
 * Resolves the caller's identity from the Authorization header or the session
 * cookie. A session-based login re-sets the cookie so the client-side expiry
 * slides together with the server-side one.
 */
export function authenticate(authenticator: Authenticator, sessionLifetimeSeconds: number) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await authenticator.authenticate({
        header: req.headers.authorization,
        cookie: readSessionCookie(req),
      });

      if (result.method === 'session') {
        setSessionCookie(res, result.token, sessionLifetimeSeconds);
        req.auth = { identity: result.identity, method: 'session', sessionId: result.session.id };
      } else {
        req.auth = { identity: result.identity, method: 'basic' };
      }
      return next();
    } catch (error) {
      logRejectedAuthentication(req, error);
      return next(error);
    }
  };
}
