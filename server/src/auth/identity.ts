import { z } from 'zod';
import type { UserRow } from '../types.js';

/** The maximum UUID is reserved for the built-in infrastructure administrator. */
export const INFRASTRUCTURE_ADMIN_ID = 'ffffffff-ffff-ffff-ffff-ffffffffffff';
export const INFRASTRUCTURE_ADMIN_HANDLE = 'admin';

export interface Identity {
  id: string;
  handle: string;
  profilePicture: string | null;
  /** Resolved once from the id; permission checks read this flag only. */
  isInfrastructureAdmin: boolean;
}

const PICTURE_EXTENSIONS = new Set(['png', 'jpg', 'jpeg', 'webp']);

function hasPictureExtension(value: string) {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  const filename = url.pathname.split('/').pop() ?? '';
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) {
    return false;
  }
  return PICTURE_EXTENSIONS.has(filename.slice(dot + 1));
}

export const pictureUrlSchema = z.string().refine(hasPictureExtension, {
  message: 'URL must point to a png, jpg, jpeg or webp image',
});

export function isValidPictureUrl(value: string) {
  return pictureUrlSchema.safeParse(value).success;
}

function storedPicture(row: UserRow) {
  if (row.picture_link === null) {
    return null;
  }
  if (!isValidPictureUrl(row.picture_link)) {
    // Stale links are dropped rather than failing authentication.
    console.warn('Dropping invalid stored picture link', { userId: row.id, pictureLink: row.picture_link });
    return null;
  }
  return row.picture_link;
}

export function toIdentity(row: UserRow): Identity {
  return {
    id: row.id,
    handle: row.handle,
    profilePicture: storedPicture(row),
    isInfrastructureAdmin: row.id.toLowerCase() === INFRASTRUCTURE_ADMIN_ID,
  };
}
