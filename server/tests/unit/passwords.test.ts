import { describe, it, expect } from 'vitest';
import { hashPassword, PasswordHashError, verifyPassword } from '../../src/utils/passwords.js';

describe('passwords', () => {
  it('should produce argon2id PHC strings', async () => {
    const hash = await hashPassword('correct horse');

    expect(hash.startsWith('$argon2id$')).toBe(true);
  });

  it('should salt every hash yet verify all of them', async () => {
    const first = await hashPassword('admin');
    const second = await hashPassword('admin');

    expect(first).not.toBe(second);
    await expect(verifyPassword(first, 'admin')).resolves.toBe(true);
    await expect(verifyPassword(second, 'admin')).resolves.toBe(true);
  });

  it('should reject a wrong password', async () => {
    const hash = await hashPassword('admin');

    await expect(verifyPassword(hash, 'Admin')).resolves.toBe(false);
  });

  it('should report a stored value that is not a PHC string as a format error', async () => {
    const error = await verifyPassword('plaintext-password', 'plaintext-password').catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(PasswordHashError);
    expect(error).toMatchObject({ kind: 'format' });
  });

  it('should report a truncated PHC string as a format error', async () => {
    const error = await verifyPassword('$argon2id$v=19$broken', 'admin').catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(PasswordHashError);
    expect(error).toMatchObject({ kind: 'format' });
  });
});
