import { Router } from 'express';
import { z } from 'zod';
import {
  effectivePermissions,
  loadTournamentUser,
  roleSchema,
} from '../auth/permissions.js';
import { authenticate } from '../middleware/authenticate.js';
import { gatedTournamentUser, requirePermission } from '../middleware/requirePermission.js';
import { HttpError } from '../utils/errors.js';
import type { AppServices } from '../app.js';

const uuidSchema = z.string().uuid();

const setRolesSchema = z.object({
  roles: z.array(roleSchema).max(3),
});

export function createTournamentsRouter(services: AppServices) {
  const { authenticator, sessions, users } = services;
  const router = Router();

  router.use(authenticate(authenticator, sessions.lifetimeSeconds));

  router.get('/:tournamentId/permissions', async (req, res, next) => {
    try {
      if (!req.auth) {
        throw new HttpError(401, 'Unauthorized');
      }

      const tournamentId = uuidSchema.parse(req.params.tournamentId);
      const tournamentUser = await loadTournamentUser(users, req.auth.identity, tournamentId);

      res.json({
        roles: tournamentUser.roles,
        permissions: effectivePermissions(tournamentUser.identity, tournamentUser.roles),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get(
    '/:tournamentId/users/:userId/roles',
    requirePermission(users, 'ReadTournament'),
    async (req, res, next) => {
      try {
        const { tournamentId } = gatedTournamentUser(req);
        const userId = uuidSchema.parse(req.params.userId);
        res.json({ roles: await users.getRoles(userId, tournamentId) });
      } catch (error) {
        next(error);
      }
    },
  );

  router.put(
    '/:tournamentId/users/:userId/roles',
    requirePermission(users, 'WriteRoles'),
    async (req, res, next) => {
      try {
        const { tournamentId } = gatedTournamentUser(req);
        const userId = uuidSchema.parse(req.params.userId);
        const { roles } = setRolesSchema.parse(req.body ?? {});

        const user = await users.findById(userId);
        if (!user) {
          throw new HttpError(404, 'User not found');
        }

        const saved = await users.setRoles(userId, tournamentId, Array.from(new Set(roles)));
        res.json({ roles: saved });
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
