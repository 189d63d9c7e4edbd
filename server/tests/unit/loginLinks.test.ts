import { describe, it, expect, beforeEach } from 'vitest';
import { LoginLinkService, loginLinkPath } from '../../src/auth/loginLinks.js';
import { hashToken } from '../../src/tokens.js';
import { createMemoryStores, createTestClock } from '../helpers/memoryStores.js';

const USER_ID = '5b2a3c4d-6e7f-4a8b-9c0d-1e2f3a4b5c6d';

describe('LoginLinkService', () => {
  let stores: ReturnType<typeof createMemoryStores>;
  let clock: ReturnType<typeof createTestClock>;
  let links: LoginLinkService;

  beforeEach(async () => {
    stores = createMemoryStores();
    clock = createTestClock('2025-03-01T12:00:00.000Z');
    links = new LoginLinkService({ tokens: stores.loginTokens, users: stores.users, clock: clock.now });
    await stores.users.create({ id: USER_ID, handle: 'jmanczak', picture_link: null }, 'unused');
  });

  it('should store an unused hashed token that expires after one day', async () => {
    const { token, expiry } = await links.issue(USER_ID);

    expect(expiry.toISOString()).toBe('2025-03-02T12:00:00.000Z');
    const rows = [...stores.loginTokens.rows.values()];
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      user_id: USER_ID,
      token_hash: hashToken(token),
      expiry: '2025-03-02T12:00:00.000Z',
      used: false,
    });
  });

  it('should build the redemption path from the raw token', () => {
    expect(loginLinkPath('abc')).toBe('/auth/login/abc');
  });

  it('should redeem a token exactly once', async () => {
    const { token } = await links.issue(USER_ID);

    const identity = await links.redeem(token);

    expect(identity).toEqual({
      id: USER_ID,
      handle: 'jmanczak',
      profilePicture: null,
      isInfrastructureAdmin: false,
    });
    await expect(links.redeem(token)).rejects.toMatchObject({ code: 'TokenAlreadyUsed', status: 401 });
  });

  it('should let only one of two concurrent redemptions succeed', async () => {
    const { token } = await links.issue(USER_ID);

    const results = await Promise.allSettled([links.redeem(token), links.redeem(token)]);

    const fulfilled = results.filter((result) => result.status === 'fulfilled');
    const rejected = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toMatchObject({ code: 'TokenAlreadyUsed' });
  });

  it('should fail with InvalidToken for an unknown token', async () => {
    await expect(links.redeem('never-issued')).rejects.toMatchObject({ code: 'InvalidToken' });
  });

  it('should fail with TokenExpired after expiry, even if unused', async () => {
    const { token } = await links.issue(USER_ID);
    clock.set('2025-03-02T12:00:00.001Z');

    await expect(links.redeem(token)).rejects.toMatchObject({ code: 'TokenExpired' });
    expect([...stores.loginTokens.rows.values()][0].used).toBe(false);
  });

  it('should report expiry before prior use', async () => {
    const { token } = await links.issue(USER_ID);
    await links.redeem(token);
    clock.set('2025-03-03T00:00:00.000Z');

    await expect(links.redeem(token)).rejects.toMatchObject({ code: 'TokenExpired' });
  });

  it('should not hand out an identity for a deleted user', async () => {
    const { token } = await links.issue(USER_ID);
    await stores.users.delete(USER_ID);

    await expect(links.redeem(token)).rejects.toMatchObject({ code: 'InvalidToken' });
  });
});
