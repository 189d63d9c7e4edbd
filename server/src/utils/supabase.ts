import type { PostgrestError, PostgrestSingleResponse } from '@supabase/supabase-js';
import { HttpError } from './errors.js';

const FOREIGN_KEY_VIOLATION = '23503';
const UNIQUE_VIOLATION = '23505';

export function handleSupabaseError<T>(response: { data: T | null; error: PostgrestError | null }, message: string): T {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
  if (!response.data) {
    throw new HttpError(500, message);
  }
  return response.data;
}

export function handleSupabaseMaybe<T>(
  response: PostgrestSingleResponse<T | null>,
  message: string,
): T | null {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
  return response.data;
}

export function ensureRows<T>(response: { data: T[] | null; error: PostgrestError | null }, message: string): T[] {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
  return response.data ?? [];
}

export function ensureOk(response: { error: PostgrestError | null }, message: string) {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
}

export function isForeignKeyViolation(error: PostgrestError | null) {
  return error?.code === FOREIGN_KEY_VIOLATION;
}

export function isUniqueViolation(error: PostgrestError | null) {
  return error?.code === UNIQUE_VIOLATION;
}
