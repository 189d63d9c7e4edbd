import type { Role } from '../auth/permissions.js';
import type {
  LoginTokenRow,
  NewSessionRow,
  SessionRow,
  UserCredentialsRow,
  UserRow,
  UserUpdate,
} from '../types.js';

export const HANDLE_TAKEN_MESSAGE = 'This handle is already taken';

/** Read side of the user table plus the few writes the auth core owns. */
export interface UserStore {
  findById(id: string): Promise<UserRow | null>;
  findCredentialsByHandle(handle: string): Promise<UserCredentialsRow | null>;
  listAll(): Promise<UserRow[]>;
  getRoles(userId: string, tournamentId: string): Promise<Role[]>;
  setRoles(userId: string, tournamentId: string, roles: Role[]): Promise<Role[]>;
  create(user: UserRow, passwordHash: string): Promise<UserRow>;
  /** Resolves to null for an unknown id; a taken handle is an `HttpError(409)`. */
  update(id: string, changes: UserUpdate): Promise<UserRow | null>;
  /** Resolves to false when other rows still reference the user. */
  delete(id: string): Promise<boolean>;
}

export interface SessionStore {
  insert(row: NewSessionRow): Promise<void>;
  findById(id: string): Promise<SessionRow | null>;
  findByTokenHash(tokenHash: string): Promise<SessionRow | null>;
  listAll(): Promise<SessionRow[]>;
  updateExpiry(id: string, expiry: string, lastAccess: string): Promise<void>;
  delete(id: string): Promise<void>;
  deleteForUser(userId: string): Promise<number>;
}

export interface LoginTokenStore {
  insert(row: LoginTokenRow): Promise<void>;
  findByTokenHash(tokenHash: string): Promise<LoginTokenRow | null>;
  /** Flips `used` only while it is still false; resolves to whether this call flipped it. */
  markUsed(id: string): Promise<boolean>;
}

export interface Stores {
  users: UserStore;
  sessions: SessionStore;
  loginTokens: LoginTokenStore;
}
