import { hashPassword } from '../utils/passwords.js';
import { INFRASTRUCTURE_ADMIN_HANDLE, INFRASTRUCTURE_ADMIN_ID, toIdentity, type Identity } from './identity.js';
import type { UserStore } from '../stores/types.js';

/**
 * Makes sure the infrastructure admin row exists, creating it with the given
 * password when it does not. Without a password a missing admin is fatal.
 */
export async function ensureInfrastructureAdmin(users: UserStore, password?: string): Promise<Identity> {
  const existing = await users.findById(INFRASTRUCTURE_ADMIN_ID);
  if (existing) {
    return toIdentity(existing);
  }

  if (!password) {
    throw new Error(
      'Infrastructure admin does not exist and INFRASTRUCTURE_ADMIN_PASSWORD is not set',
    );
  }

  const created = await users.create(
    { id: INFRASTRUCTURE_ADMIN_ID, handle: INFRASTRUCTURE_ADMIN_HANDLE, picture_link: null },
    await hashPassword(password),
  );
  console.log('Infrastructure admin created');
  return toIdentity(created);
}
