import { Router, type Response } from 'express';
import { z } from 'zod';
import { assertAsciiHeader } from '../auth/authenticate.js';
import { clearSessionCookie, readSessionCookie, setSessionCookie } from '../auth/cookie.js';
import type { Identity } from '../auth/identity.js';
import { authenticate, logRejectedAuthentication } from '../middleware/authenticate.js';
import { AuthError, HttpError } from '../utils/errors.js';
import type { AppServices } from '../app.js';

const loginSchema = z.object({
  login: z.string().min(1),
  password: z.string(),
});

const loginTokenSchema = z.string().min(1).max(512);

function bearerTokenForLogout(header: string | undefined) {
  if (header === undefined) {
    return undefined;
  }
  assertAsciiHeader(header);

  const space = header.indexOf(' ');
  if (space === -1) {
    throw new AuthError('BadHeaderAuthSchemeData');
  }
  if (header.slice(0, space) !== 'Bearer') {
    throw new AuthError('ClearSessionBearerOnly');
  }
  return header.slice(space + 1);
}

export function createAuthRouter(services: AppServices) {
  const { authenticator, loginLinks, sessions } = services;
  const router = Router();

  async function startSession(res: Response, identity: Identity) {
    const { session, token } = await sessions.create(identity.id);
    setSessionCookie(res, token, sessions.lifetimeSeconds);
    res.json({ token, expiry: session.expiry.toISOString() });
  }

  router.post('/login', async (req, res, next) => {
    try {
      const { login, password } = loginSchema.parse(req.body ?? {});

      let identity: Identity;
      try {
        identity = await authenticator.verifyCredentials(login, password);
      } catch (error) {
        logRejectedAuthentication(req, error);
        throw error;
      }

      await startSession(res, identity);
    } catch (error) {
      next(error);
    }
  });

  router.get('/login/:token', async (req, res, next) => {
    try {
      const token = loginTokenSchema.parse(req.params.token);

      let identity: Identity;
      try {
        identity = await loginLinks.redeem(token);
      } catch (error) {
        logRejectedAuthentication(req, error);
        throw error;
      }

      await startSession(res, identity);
    } catch (error) {
      next(error);
    }
  });

  router.post('/logout', async (req, res, next) => {
    try {
      const headerToken = bearerTokenForLogout(req.headers.authorization);
      const cookieToken = readSessionCookie(req);

      if (headerToken !== undefined && cookieToken !== undefined && headerToken !== cookieToken) {
        throw new HttpError(400, 'Please provide one session token to destroy at a time');
      }

      const token = headerToken ?? cookieToken;
      if (!token) {
        throw new HttpError(400, 'Please provide a session token to destroy');
      }

      const session = await sessions.findByToken(token);
      if (!session) {
        const error = new AuthError('InvalidCredentials', { reason: 'unknown session token' });
        logRejectedAuthentication(req, error);
        throw error;
      }

      await sessions.destroy(session);
      clearSessionCookie(res);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  router.get('/me', authenticate(authenticator, sessions.lifetimeSeconds), (req, res, next) => {
    if (!req.auth) {
      return next(new HttpError(401, 'Unauthorized'));
    }
    return res.json(req.auth.identity);
  });

  return router;
}
