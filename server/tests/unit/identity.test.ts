import { describe, it, expect, vi, afterEach } from 'vitest';
import { INFRASTRUCTURE_ADMIN_ID, isValidPictureUrl, toIdentity } from '../../src/auth/identity.js';

describe('identity', () => {
  describe('toIdentity()', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should flag the maximum UUID as the infrastructure admin', () => {
      const identity = toIdentity({ id: INFRASTRUCTURE_ADMIN_ID, handle: 'admin', picture_link: null });

      expect(identity).toEqual({
        id: INFRASTRUCTURE_ADMIN_ID,
        handle: 'admin',
        profilePicture: null,
        isInfrastructureAdmin: true,
      });
    });

    it('should accept the maximum UUID in upper case', () => {
      const identity = toIdentity({
        id: INFRASTRUCTURE_ADMIN_ID.toUpperCase(),
        handle: 'admin',
        picture_link: null,
      });

      expect(identity.isInfrastructureAdmin).toBe(true);
    });

    it('should not flag ordinary users', () => {
      const identity = toIdentity({
        id: '5b2a3c4d-6e7f-4a8b-9c0d-1e2f3a4b5c6d',
        handle: 'jmanczak',
        picture_link: 'https://placehold.co/128x128.png',
      });

      expect(identity.isInfrastructureAdmin).toBe(false);
      expect(identity.profilePicture).toBe('https://placehold.co/128x128.png');
    });

    it('should drop and report a stored picture link that is not an image URL', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      const identity = toIdentity({
        id: '5b2a3c4d-6e7f-4a8b-9c0d-1e2f3a4b5c6d',
        handle: 'jmanczak',
        picture_link: 'https://example.com',
      });

      expect(identity.profilePicture).toBeNull();
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('Dropping invalid stored picture link', {
        userId: '5b2a3c4d-6e7f-4a8b-9c0d-1e2f3a4b5c6d',
        pictureLink: 'https://example.com',
      });
    });

    it('should not report a missing picture', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      toIdentity({ id: INFRASTRUCTURE_ADMIN_ID, handle: 'admin', picture_link: null });

      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('isValidPictureUrl()', () => {
    it.each([
      'https://example.com/avatar.png',
      'https://example.com/avatar.jpg',
      'https://example.com/avatar.jpeg',
      'https://example.com/images/avatar.webp',
      'unix://hello.net/a.png',
    ])('should accept %s', (url) => {
      expect(isValidPictureUrl(url)).toBe(true);
    });

    it.each([
      'https://example.com',
      'not a url',
      'unix://hello.net/apng',
      'unix://hello.net/a.jpegg',
      'unix://hello.net/a.jpeg.jpe',
      'unix://hello.net/a/.jpg',
      'unix://hello.net/a./jpg',
    ])('should reject %s', (url) => {
      expect(isValidPictureUrl(url)).toBe(false);
    });
  });
});
