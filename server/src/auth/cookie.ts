import type { Request, Response } from 'express';

export const SESSION_COOKIE_NAME = 'tausession';

const SESSION_COOKIE_PATTERN = new RegExp(`(?:^|;\\s*)${SESSION_COOKIE_NAME}=([^;]*)`);

/** Returns the raw session cookie value, or undefined when it is missing or empty. */
export function readSessionCookie(req: Request): string | undefined {
  const header = req.headers.cookie;
  if (!header) {
    return undefined;
  }
  const match = header.match(SESSION_COOKIE_PATTERN);
  return match?.[1] ? match[1] : undefined;
}

export function setSessionCookie(res: Response, token: string, lifetimeSeconds: number) {
  res.cookie(SESSION_COOKIE_NAME, token, {
    maxAge: lifetimeSeconds * 1000,
    httpOnly: true,
    path: '/',
    sameSite: 'strict',
    secure: true,
  });
}

export function clearSessionCookie(res: Response) {
  res.clearCookie(SESSION_COOKIE_NAME, {
    httpOnly: true,
    path: '/',
    sameSite: 'strict',
    secure: true,
  });
}
