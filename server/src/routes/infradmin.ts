import { Router } from 'express';
import { toIdentity } from '../auth/identity.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireInfrastructureAdmin } from '../middleware/requirePermission.js';
import type { AppServices } from '../app.js';

export function createInfradminRouter(services: AppServices) {
  const { authenticator, sessions, users } = services;
  const router = Router();

  router.use(authenticate(authenticator, sessions.lifetimeSeconds));
  router.use(requireInfrastructureAdmin());

  router.get('/users', async (_req, res, next) => {
    try {
      const rows = await users.listAll();
      res.json(rows.map(toIdentity));
    } catch (error) {
      next(error);
    }
  });

  router.get('/sessions', async (_req, res, next) => {
    try {
      const all = await sessions.listAll();
      res.json(
        all.map((session) => ({
          id: session.id,
          userId: session.userId,
          issued: session.issued.toISOString(),
          expiry: session.expiry.toISOString(),
          lastAccess: session.lastAccess?.toISOString() ?? null,
        })),
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}
