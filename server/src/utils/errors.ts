export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export type AuthErrorCode =
  | 'NoCredentials'
  | 'InvalidCredentials'
  | 'SessionExpired'
  | 'SessionNotFound'
  | 'InvalidToken'
  | 'TokenExpired'
  | 'TokenAlreadyUsed'
  | 'NonAsciiHeaderCharacters'
  | 'BadHeaderAuthSchemeData'
  | 'UnsupportedHeaderAuthScheme'
  | 'NoBasicAuthColonSplit'
  | 'InvalidBase64'
  | 'InvalidUtf8'
  | 'ClearSessionBearerOnly';

const AUTH_ERRORS: Record<AuthErrorCode, { status: number; message: string }> = {
  NoCredentials: { status: 401, message: 'No authentication credentials provided' },
  InvalidCredentials: { status: 401, message: 'Invalid credentials' },
  SessionExpired: { status: 401, message: 'Session expired' },
  // Never shown as such; the dispatcher reports it as InvalidCredentials.
  SessionNotFound: { status: 401, message: 'Invalid credentials' },
  InvalidToken: { status: 401, message: 'Invalid token' },
  TokenExpired: { status: 401, message: 'Login token has expired' },
  TokenAlreadyUsed: { status: 401, message: 'Login token has already been used' },
  NonAsciiHeaderCharacters: {
    status: 400,
    message: 'Non-ASCII characters found in Authorization header',
  },
  BadHeaderAuthSchemeData: { status: 400, message: 'Could not parse header auth scheme/data' },
  UnsupportedHeaderAuthScheme: {
    status: 400,
    message: 'Unsupported header auth scheme, use Basic or Bearer',
  },
  NoBasicAuthColonSplit: {
    status: 400,
    message: 'Basic credentials are missing a colon between login and password',
  },
  InvalidBase64: { status: 400, message: 'Basic credentials are not valid base64' },
  InvalidUtf8: { status: 400, message: 'Basic credentials are not valid UTF-8' },
  ClearSessionBearerOnly: { status: 400, message: 'Only a Bearer session token can be cleared' },
};

export class AuthError extends HttpError {
  constructor(
    public readonly code: AuthErrorCode,
    details?: unknown,
  ) {
    super(AUTH_ERRORS[code].status, AUTH_ERRORS[code].message, details);
    this.name = 'AuthError';
  }
}

export function isAuthError(error: unknown, code?: AuthErrorCode): error is AuthError {
  return error instanceof AuthError && (code === undefined || error.code === code);
}
