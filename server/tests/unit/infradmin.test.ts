import { describe, it, expect, vi, afterEach } from 'vitest';
import { ensureInfrastructureAdmin } from '../../src/auth/infradmin.js';
import { INFRASTRUCTURE_ADMIN_ID } from '../../src/auth/identity.js';
import { verifyPassword } from '../../src/utils/passwords.js';
import { MemoryUserStore } from '../helpers/memoryStores.js';

describe('ensureInfrastructureAdmin()', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create the admin with the configured password when missing', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const users = new MemoryUserStore();

    const admin = await ensureInfrastructureAdmin(users, 'test-admin-password');

    expect(admin).toEqual({
      id: INFRASTRUCTURE_ADMIN_ID,
      handle: 'admin',
      profilePicture: null,
      isInfrastructureAdmin: true,
    });
    const credentials = await users.findCredentialsByHandle('admin');
    expect(credentials?.id).toBe(INFRASTRUCTURE_ADMIN_ID);
    await expect(verifyPassword(credentials?.password_hash ?? '', 'test-admin-password')).resolves.toBe(true);
  });

  it('should leave an existing admin untouched', async () => {
    const users = new MemoryUserStore();
    await users.create({ id: INFRASTRUCTURE_ADMIN_ID, handle: 'root', picture_link: null }, 'existing-hash');

    const admin = await ensureInfrastructureAdmin(users);

    expect(admin.handle).toBe('root');
    expect(users.users.get(INFRASTRUCTURE_ADMIN_ID)?.password_hash).toBe('existing-hash');
  });

  it('should refuse to start without a password when the admin is missing', async () => {
    await expect(ensureInfrastructureAdmin(new MemoryUserStore())).rejects.toThrow(
      'Infrastructure admin does not exist and INFRASTRUCTURE_ADMIN_PASSWORD is not set',
    );
  });
});
