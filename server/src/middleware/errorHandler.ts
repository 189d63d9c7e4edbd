import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { isAuthError, isHttpError } from '../utils/errors.js';

// Body parsing failures from express.json() carry their own 4xx status.
function isRequestFormatError(error: unknown): error is { status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isAuthError(error)) {
    // The precise reason stays server-side.
    res.status(error.status).json({ error: error.message, code: error.code });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', details: error.issues });
    return;
  }

  if (isHttpError(error) && error.status < 500) {
    res.status(error.status).json({
      error: error.message,
      details: error.details ?? undefined,
    });
    return;
  }

  if (isRequestFormatError(error)) {
    res.status(error.status).json({ error: 'Invalid request' });
    return;
  }

  console.error('Unhandled error', error);
  res.status(500).json({ error: 'Internal server error' });
}
