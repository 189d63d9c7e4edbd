import { describe, it, expect } from 'vitest';
import { encodeToken, generateToken, hashToken } from '../../src/tokens.js';

describe('tokens', () => {
  describe('encodeToken()', () => {
    it('should use the URL-safe alphabet without padding', () => {
      expect(encodeToken(Uint8Array.from([0xfb, 0xff]))).toBe('-_8');
    });
  });

  describe('hashToken()', () => {
    it('should produce the SHA-256 hex digest', () => {
      expect(hashToken('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      );
    });

    it('should be deterministic', () => {
      const token = generateToken();
      expect(hashToken(token)).toBe(hashToken(token));
    });
  });

  describe('generateToken()', () => {
    it('should encode 256 bits as 43 URL-safe characters', () => {
      expect(generateToken()).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it('should never repeat, even with a fixed secret and clock', () => {
      const now = new Date('2025-03-01T12:00:00.000Z');
      const tokens = Array.from({ length: 200 }, () => generateToken({ secret: 'test-secret', now }));

      expect(new Set(tokens).size).toBe(200);
      expect(new Set(tokens.map(hashToken)).size).toBe(200);
    });

    it('should work without a deployment secret', () => {
      const first = generateToken({ now: new Date(0) });
      const second = generateToken({ now: new Date(0) });

      expect(first).not.toBe(second);
    });
  });
});
