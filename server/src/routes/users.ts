import { Router } from 'express';
import { z } from 'zod';
import { pictureUrlSchema, toIdentity } from '../auth/identity.js';
import { loginLinkPath } from '../auth/loginLinks.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireInfrastructureAdmin } from '../middleware/requirePermission.js';
import { HttpError } from '../utils/errors.js';
import { hashPassword } from '../utils/passwords.js';
import type { UserUpdate } from '../types.js';
import type { AppServices } from '../app.js';

const userIdSchema = z.string().uuid();

const userPatchSchema = z.object({
  handle: z.string().trim().min(1).optional(),
  profilePicture: pictureUrlSchema.nullable().optional(),
  password: z.string().min(1).optional(),
});

export function createUsersRouter(services: AppServices) {
  const { authenticator, loginLinks, sessions, users } = services;
  const router = Router();

  router.use(authenticate(authenticator, sessions.lifetimeSeconds));

  router.get('/:userId', async (req, res, next) => {
    try {
      const userId = userIdSchema.parse(req.params.userId);
      const user = await users.findById(userId);
      if (!user) {
        throw new HttpError(404, 'User not found');
      }
      res.json(toIdentity(user));
    } catch (error) {
      next(error);
    }
  });

  // Users may edit their own account; the infrastructure admin may edit any.
  router.patch('/:userId', async (req, res, next) => {
    try {
      if (!req.auth) {
        throw new HttpError(401, 'Unauthorized');
      }

      const userId = userIdSchema.parse(req.params.userId);
      const { identity } = req.auth;
      if (!identity.isInfrastructureAdmin && identity.id.toLowerCase() !== userId.toLowerCase()) {
        throw new HttpError(403, 'Forbidden');
      }

      const { handle, profilePicture, password } = userPatchSchema.parse(req.body ?? {});
      const changes: UserUpdate = {};
      if (handle !== undefined) {
        changes.handle = handle;
      }
      if (profilePicture !== undefined) {
        changes.picture_link = profilePicture;
      }
      if (password !== undefined) {
        changes.password_hash = await hashPassword(password);
      }

      const updated = await users.update(userId, changes);
      if (!updated) {
        throw new HttpError(404, 'User not found');
      }

      res.json(toIdentity(updated));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:userId/login-link', requireInfrastructureAdmin(), async (req, res, next) => {
    try {
      const userId = userIdSchema.parse(req.params.userId);
      const user = await users.findById(userId);
      if (!user) {
        throw new HttpError(404, 'User not found');
      }

      const { token, expiry } = await loginLinks.issue(user.id);
      res.json({ link: loginLinkPath(token), expiry: expiry.toISOString() });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:userId', requireInfrastructureAdmin(), async (req, res, next) => {
    try {
      const userId = userIdSchema.parse(req.params.userId);
      const user = await users.findById(userId);
      if (!user) {
        throw new HttpError(404, 'User not found');
      }
      if (toIdentity(user).isInfrastructureAdmin) {
        throw new HttpError(403, 'The infrastructure admin cannot be deleted');
      }

      // Log the user out everywhere before the row goes away.
      await sessions.destroyAllForUser(user.id);

      const deleted = await users.delete(user.id);
      if (!deleted) {
        throw new HttpError(409, 'Other resources reference this user. They must be deleted first');
      }

      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
