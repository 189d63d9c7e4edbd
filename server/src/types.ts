import type { Identity } from './auth/identity.js';
import type { TournamentUser } from './auth/permissions.js';

export interface UserRow {
  id: string;
  handle: string;
  picture_link: string | null;
}

/** Columns a user update may touch; absent keys are left as stored. */
export interface UserUpdate {
  handle?: string;
  picture_link?: string | null;
  password_hash?: string;
}

export interface UserCredentialsRow {
  id: string;
  password_hash: string;
}

export interface SessionRow {
  id: string;
  user_id: string;
  issued: string;
  expiry: string;
  last_access: string | null;
}

export interface NewSessionRow extends SessionRow {
  token: string;
}

export interface LoginTokenRow {
  id: string;
  user_id: string;
  token_hash: string;
  expiry: string;
  used: boolean;
}

export interface RoleRow {
  id: string;
  user_id: string;
  tournament_id: string;
  roles: string[] | null;
}

export interface Session {
  id: string;
  userId: string;
  issued: Date;
  expiry: Date;
  lastAccess: Date | null;
}

export type AuthMethod = 'basic' | 'session';

export interface AuthContext {
  identity: Identity;
  method: AuthMethod;
  sessionId?: string;
}

declare module 'express-serve-static-core' {
  interface Request {
    auth?: AuthContext;
    tournamentUser?: TournamentUser;
  }
}
