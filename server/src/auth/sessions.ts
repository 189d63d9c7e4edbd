/**
 * Database-backed sessions with sliding expiration.
 *
 * Only the SHA-256 of a session token is stored; the raw token exists outside the
 * client exactly once, in the result of `create`.
 */

import { randomUUID } from 'node:crypto';
import { generateToken, hashToken } from '../tokens.js';
import { AuthError } from '../utils/errors.js';
import type { SessionStore } from '../stores/types.js';
import type { Session, SessionRow } from '../types.js';

export const DEFAULT_SESSION_LIFETIME_SECONDS = 7 * 24 * 60 * 60;

export interface SessionServiceOptions {
  store: SessionStore;
  lifetimeSeconds?: number;
  secret?: string;
  clock?: () => Date;
}

export interface CreateSessionResult {
  session: Session;
  token: string;
}

export function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    userId: row.user_id,
    issued: new Date(row.issued),
    expiry: new Date(row.expiry),
    lastAccess: row.last_access ? new Date(row.last_access) : null,
  };
}

export class SessionService {
  private readonly store: SessionStore;
  private readonly secret?: string;
  private readonly clock: () => Date;
  readonly lifetimeSeconds: number;

  constructor(options: SessionServiceOptions) {
    this.store = options.store;
    this.secret = options.secret;
    this.clock = options.clock ?? (() => new Date());
    this.lifetimeSeconds = options.lifetimeSeconds ?? DEFAULT_SESSION_LIFETIME_SECONDS;
  }

  private expiryFrom(now: Date) {
    return new Date(now.getTime() + this.lifetimeSeconds * 1000);
  }

  async create(userId: string): Promise<CreateSessionResult> {
    const now = this.clock();
    const token = generateToken({ secret: this.secret, now });
    const session: Session = {
      id: randomUUID(),
      userId,
      issued: now,
      expiry: this.expiryFrom(now),
      lastAccess: null,
    };

    await this.store.insert({
      id: session.id,
      user_id: userId,
      token: hashToken(token),
      issued: session.issued.toISOString(),
      expiry: session.expiry.toISOString(),
      last_access: null,
    });

    return { session, token };
  }

  async getById(id: string): Promise<Session | null> {
    const row = await this.store.findById(id);
    return row ? rowToSession(row) : null;
  }

  /** Looks a session up by raw token without checking expiry. */
  async findByToken(token: string): Promise<Session | null> {
    const row = await this.store.findByTokenHash(hashToken(token));
    return row ? rowToSession(row) : null;
  }

  /**
   * Resolves a raw token to a session that is still valid.
   * Expired rows are left in place; cleaning them up is not this call's job.
   */
  async fetchByToken(token: string): Promise<Session> {
    const session = await this.findByToken(token);
    if (!session) {
      throw new AuthError('SessionNotFound');
    }
    if (session.expiry.getTime() < this.clock().getTime()) {
      throw new AuthError('SessionExpired', { sessionId: session.id });
    }
    return session;
  }

  async prolongAndTouch(session: Session): Promise<Session> {
    const now = this.clock();
    const expiry = this.expiryFrom(now);
    await this.store.updateExpiry(session.id, expiry.toISOString(), now.toISOString());
    return { ...session, expiry, lastAccess: now };
  }

  async destroy(session: Session) {
    await this.store.delete(session.id);
  }

  async destroyAllForUser(userId: string) {
    return this.store.deleteForUser(userId);
  }

  async listAll(): Promise<Session[]> {
    const rows = await this.store.listAll();
    return rows.map(rowToSession);
  }
}
