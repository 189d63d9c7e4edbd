import argon2 from 'argon2';

export type PasswordHashErrorKind = 'hashing' | 'format';

export class PasswordHashError extends Error {
  constructor(
    public readonly kind: PasswordHashErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PasswordHashError';
  }
}

// argon2 only accepts PHC strings ($argon2id$v=19$m=...,t=...,p=...$salt$hash).
function isPhcHash(hash: string) {
  return /^\$argon2(id|i|d)\$/.test(hash);
}

export async function hashPassword(password: string) {
  try {
    return await argon2.hash(password, { type: argon2.argon2id });
  } catch (error) {
    throw new PasswordHashError('hashing', 'Failed to hash password', { cause: error });
  }
}

export async function verifyPassword(hash: string, password: string) {
  if (!isPhcHash(hash)) {
    throw new PasswordHashError('format', 'Stored password hash is not an argon2 PHC string');
  }

  try {
    return await argon2.verify(hash, password);
  } catch (error) {
    throw new PasswordHashError('format', 'Stored password hash could not be parsed', {
      cause: error,
    });
  }
}
