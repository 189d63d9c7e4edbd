import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { HttpError } from '../utils/errors.js';
import {
  loadTournamentUser,
  tournamentUserCan,
  type Permission,
  type TournamentUser,
} from '../auth/permissions.js';
import type { UserStore } from '../stores/types.js';

const tournamentIdSchema = z.string().uuid();

/**
 * Gates a `/:tournamentId/...` route on a permission derived from the caller's
 * roles in that tournament. Must run after `authenticate`.
 */
export function requirePermission(users: UserStore, permission: Permission) {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (!req.auth) {
        throw new HttpError(401, 'Unauthorized');
      }

      const tournamentId = tournamentIdSchema.parse(req.params.tournamentId);
      const tournamentUser = await loadTournamentUser(users, req.auth.identity, tournamentId);
      if (!tournamentUserCan(tournamentUser, permission)) {
        throw new HttpError(403, 'Forbidden');
      }

      req.tournamentUser = tournamentUser;
      return next();
    } catch (error) {
      return next(error);
    }
  };
}

/** The caller as resolved by `requirePermission` for the current request. */
export function gatedTournamentUser(req: Request): TournamentUser {
  if (!req.tournamentUser) {
    throw new HttpError(500, 'Route is missing its permission gate');
  }
  return req.tournamentUser;
}

export function requireInfrastructureAdmin() {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.auth) {
      return next(new HttpError(401, 'Unauthorized'));
    }
    if (!req.auth.identity.isInfrastructureAdmin) {
      return next(new HttpError(403, 'Forbidden'));
    }
    return next();
  };
}
