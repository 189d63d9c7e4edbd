import { AuthError, isAuthError } from '../utils/errors.js';
import { PasswordHashError, verifyPassword } from '../utils/passwords.js';
import { toIdentity, type Identity } from './identity.js';
import type { SessionService } from './sessions.js';
import type { UserStore } from '../stores/types.js';
import type { Session } from '../types.js';

export type ParsedAuthorization =
  | { scheme: 'basic'; login: string; password: string }
  | { scheme: 'bearer'; token: string };

export interface PresentedCredentials {
  /** Raw Authorization header value. */
  header?: string;
  /** Raw session cookie value; an empty value counts as absent. */
  cookie?: string;
}

export type AuthResult =
  | { method: 'basic'; identity: Identity }
  | { method: 'session'; identity: Identity; session: Session; token: string };

const PRINTABLE_ASCII = /^[\t\x20-\x7e]*$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Credentials are compared byte for byte, so a leading BOM is kept.
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function assertAsciiHeader(header: string) {
  if (!PRINTABLE_ASCII.test(header)) {
    throw new AuthError('NonAsciiHeaderCharacters');
  }
}

function splitOnce(value: string, separator: string): [string, string] | null {
  const index = value.indexOf(separator);
  if (index === -1) {
    return null;
  }
  return [value.slice(0, index), value.slice(index + separator.length)];
}

function decodeBasicCredentials(data: string): ParsedAuthorization {
  if (!BASE64.test(data)) {
    throw new AuthError('InvalidBase64');
  }

  let decoded: string;
  try {
    decoded = utf8.decode(Buffer.from(data, 'base64'));
  } catch (error) {
    throw new AuthError('InvalidUtf8', error instanceof Error ? error.message : undefined);
  }

  const parts = splitOnce(decoded, ':');
  if (!parts) {
    throw new AuthError('NoBasicAuthColonSplit');
  }
  return { scheme: 'basic', login: parts[0], password: parts[1] };
}

export function parseAuthorization(header: string): ParsedAuthorization {
  assertAsciiHeader(header);

  const parts = splitOnce(header, ' ');
  if (!parts) {
    throw new AuthError('BadHeaderAuthSchemeData');
  }

  const [scheme, data] = parts;
  switch (scheme) {
    case 'Basic':
      return decodeBasicCredentials(data);
    case 'Bearer':
      return { scheme: 'bearer', token: data };
    default:
      throw new AuthError('UnsupportedHeaderAuthScheme', { scheme });
  }
}

export interface AuthenticatorOptions {
  users: UserStore;
  sessions: SessionService;
}

export function createAuthenticator({ users, sessions }: AuthenticatorOptions) {
  async function verifyCredentials(login: string, password: string): Promise<Identity> {
    const credentials = await users.findCredentialsByHandle(login);
    if (!credentials) {
      throw new AuthError('InvalidCredentials', { reason: 'unknown handle', login });
    }

    let passwordOk: boolean;
    try {
      passwordOk = await verifyPassword(credentials.password_hash, password);
    } catch (error) {
      if (error instanceof PasswordHashError && error.kind === 'format') {
        console.error(`Stored password hash for user ${credentials.id} is malformed`, error);
        throw new AuthError('InvalidCredentials', { reason: 'malformed stored hash', login });
      }
      throw error;
    }

    if (!passwordOk) {
      throw new AuthError('InvalidCredentials', { reason: 'password mismatch', login });
    }

    const user = await users.findById(credentials.id);
    if (!user) {
      throw new AuthError('InvalidCredentials', { reason: 'user vanished', login });
    }
    return toIdentity(user);
  }

  async function authenticateSession(token: string): Promise<AuthResult> {
    let session: Session;
    try {
      session = await sessions.fetchByToken(token);
    } catch (error) {
      if (isAuthError(error, 'SessionNotFound')) {
        throw new AuthError('InvalidCredentials', { reason: 'unknown session token' });
      }
      throw error;
    }

    const user = await users.findById(session.userId);
    if (!user) {
      throw new AuthError('InvalidCredentials', { reason: 'session owner vanished' });
    }

    const prolonged = await sessions.prolongAndTouch(session);
    return { method: 'session', identity: toIdentity(user), session: prolonged, token };
  }

  async function authenticate({ header, cookie }: PresentedCredentials): Promise<AuthResult> {
    if (header !== undefined) {
      assertAsciiHeader(header);
    }
    const sessionCookie = cookie ? cookie : undefined;

    if (header === undefined) {
      if (sessionCookie === undefined) {
        throw new AuthError('NoCredentials');
      }
      return authenticateSession(sessionCookie);
    }

    const parsed = parseAuthorization(header);
    switch (parsed.scheme) {
      case 'basic':
        return { method: 'basic', identity: await verifyCredentials(parsed.login, parsed.password) };
      case 'bearer':
        return authenticateSession(parsed.token);
    }
  }

  return { authenticate, authenticateSession, verifyCredentials };
}

export type Authenticator = ReturnType<typeof createAuthenticator>;
