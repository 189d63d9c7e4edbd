import crypto from 'node:crypto';

const TOKEN_BYTES = 32;

export interface GenerateTokenOptions {
  /** Deployment-wide secret folded into the seed. Never the only entropy source. */
  secret?: string;
  now?: Date;
}

export function encodeToken(bytes: Uint8Array) {
  return Buffer.from(bytes).toString('base64url');
}

export function hashToken(token: string) {
  return crypto.createHash('sha256').update(token).digest('hex');
}

function xorInto(seed: Buffer, bytes: Uint8Array) {
  for (let i = 0; i < bytes.length; i += 1) {
    seed[i % seed.length] ^= bytes[i];
  }
}

function timestampBytes(now: Date) {
  const bytes = Buffer.alloc(8);
  bytes.writeBigInt64BE(BigInt(now.getTime()));
  return bytes;
}

export function generateToken(options: GenerateTokenOptions = {}) {
  const seed = Buffer.alloc(TOKEN_BYTES);

  if (options.secret) {
    xorInto(seed, Buffer.from(options.secret, 'utf8'));
  }
  xorInto(seed, crypto.randomBytes(TOKEN_BYTES));

  // Spread the timestamp over every 8-byte lane of the seed.
  const timestamp = timestampBytes(options.now ?? new Date());
  for (let offset = 0; offset < seed.length; offset += timestamp.length) {
    for (let i = 0; i < timestamp.length; i += 1) {
      seed[offset + i] ^= timestamp[i];
    }
  }

  const bytes = crypto.createHash('sha256').update(seed).digest();
  return encodeToken(bytes);
}
