/**
 * Single-use login links.
 *
 * Flow:
 * 1. An administrator issues a link for a user -> issue()
 * 2. The token hash is stored; the raw token only appears in the returned link
 * 3. The user opens /auth/login/<token> -> redeem()
 * 4. The token is flipped to used before the identity is handed back
 */

import { randomUUID } from 'node:crypto';
import { generateToken, hashToken } from '../tokens.js';
import { AuthError } from '../utils/errors.js';
import { toIdentity, type Identity } from './identity.js';
import type { LoginTokenStore, UserStore } from '../stores/types.js';

export const DEFAULT_LOGIN_LINK_LIFETIME_SECONDS = 24 * 60 * 60;

export interface LoginLinkServiceOptions {
  tokens: LoginTokenStore;
  users: UserStore;
  lifetimeSeconds?: number;
  secret?: string;
  clock?: () => Date;
}

export interface IssuedLoginLink {
  token: string;
  expiry: Date;
}

export function loginLinkPath(token: string) {
  return `/auth/login/${token}`;
}

export class LoginLinkService {
  private readonly tokens: LoginTokenStore;
  private readonly users: UserStore;
  private readonly lifetimeSeconds: number;
  private readonly secret?: string;
  private readonly clock: () => Date;

  constructor(options: LoginLinkServiceOptions) {
    this.tokens = options.tokens;
    this.users = options.users;
    this.lifetimeSeconds = options.lifetimeSeconds ?? DEFAULT_LOGIN_LINK_LIFETIME_SECONDS;
    this.secret = options.secret;
    this.clock = options.clock ?? (() => new Date());
  }

  async issue(userId: string): Promise<IssuedLoginLink> {
    const now = this.clock();
    const token = generateToken({ secret: this.secret, now });
    const expiry = new Date(now.getTime() + this.lifetimeSeconds * 1000);

    await this.tokens.insert({
      id: randomUUID(),
      user_id: userId,
      token_hash: hashToken(token),
      expiry: expiry.toISOString(),
      used: false,
    });

    return { token, expiry };
  }

  /**
   * Exchanges a raw login token for the identity it was issued to.
   *
   * At most one concurrent redemption of the same token succeeds; the others
   * observe TokenAlreadyUsed.
   */
  async redeem(token: string): Promise<Identity> {
    const record = await this.tokens.findByTokenHash(hashToken(token));
    if (!record) {
      throw new AuthError('InvalidToken');
    }
    if (new Date(record.expiry).getTime() < this.clock().getTime()) {
      throw new AuthError('TokenExpired');
    }
    if (record.used) {
      throw new AuthError('TokenAlreadyUsed');
    }

    const claimed = await this.tokens.markUsed(record.id);
    if (!claimed) {
      throw new AuthError('TokenAlreadyUsed');
    }

    const user = await this.users.findById(record.user_id);
    if (!user) {
      throw new AuthError('InvalidToken');
    }
    return toIdentity(user);
  }
}
