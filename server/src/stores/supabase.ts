import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { roleSchema, type Role } from '../auth/permissions.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  handleSupabaseError,
  handleSupabaseMaybe,
  isForeignKeyViolation,
  isUniqueViolation,
} from '../utils/supabase.js';
import type {
  LoginTokenRow,
  NewSessionRow,
  RoleRow,
  SessionRow,
  UserCredentialsRow,
  UserRow,
} from '../types.js';
import { HANDLE_TAKEN_MESSAGE } from './types.js';
import type { LoginTokenStore, SessionStore, Stores, UserStore } from './types.js';

const USER_COLUMNS = 'id, handle, picture_link';
const SESSION_COLUMNS = 'id, user_id, issued, expiry, last_access';
const LOGIN_TOKEN_COLUMNS = 'id, user_id, token_hash, expiry, used';

const rolesColumnSchema = z.array(roleSchema).nullable();

function parseRoles(raw: RoleRow['roles']): Role[] {
  const parsed = rolesColumnSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(500, 'Stored roles are invalid', parsed.error.issues);
  }
  return parsed.data ?? [];
}

export function createSupabaseUserStore(supabase: SupabaseClient): UserStore {
  return {
    async findById(id) {
      return handleSupabaseMaybe<UserRow>(
        await supabase.from('users').select(USER_COLUMNS).eq('id', id).maybeSingle(),
        'Failed to load user',
      );
    },

    async findCredentialsByHandle(handle) {
      return handleSupabaseMaybe<UserCredentialsRow>(
        await supabase.from('users').select('id, password_hash').eq('handle', handle).maybeSingle(),
        'Failed to load user credentials',
      );
    },

    async listAll() {
      return ensureRows<UserRow>(
        await supabase.from('users').select(USER_COLUMNS).order('handle', { ascending: true }),
        'Failed to list users',
      );
    },

    async getRoles(userId, tournamentId) {
      const row = handleSupabaseMaybe<Pick<RoleRow, 'roles'>>(
        await supabase
          .from('roles')
          .select('roles')
          .eq('user_id', userId)
          .eq('tournament_id', tournamentId)
          .maybeSingle(),
        'Failed to load roles',
      );
      return row ? parseRoles(row.roles) : [];
    },

    async setRoles(userId, tournamentId, roles) {
      const row = handleSupabaseError<Pick<RoleRow, 'roles'>>(
        await supabase
          .from('roles')
          .upsert(
            { user_id: userId, tournament_id: tournamentId, roles },
            { onConflict: 'user_id,tournament_id' },
          )
          .select('roles')
          .single(),
        'Failed to save roles',
      );
      return parseRoles(row.roles);
    },

    async create(user, passwordHash) {
      return handleSupabaseError<UserRow>(
        await supabase
          .from('users')
          .insert({ ...user, password_hash: passwordHash })
          .select(USER_COLUMNS)
          .single(),
        'Failed to create user',
      );
    },

    async update(id, changes) {
      const result = await supabase
        .from('users')
        .update(changes)
        .eq('id', id)
        .select(USER_COLUMNS)
        .maybeSingle();
      if (isUniqueViolation(result.error)) {
        throw new HttpError(409, HANDLE_TAKEN_MESSAGE);
      }
      return handleSupabaseMaybe<UserRow>(result, 'Failed to update user');
    },

    async delete(id) {
      const result = await supabase.from('users').delete().eq('id', id);
      if (isForeignKeyViolation(result.error)) {
        return false;
      }
      ensureOk(result, 'Failed to delete user');
      return true;
    },
  };
}

export function createSupabaseSessionStore(supabase: SupabaseClient): SessionStore {
  return {
    async insert(row) {
      ensureOk(await supabase.from('sessions').insert(row), 'Failed to create session');
    },

    async findById(id) {
      return handleSupabaseMaybe<SessionRow>(
        await supabase.from('sessions').select(SESSION_COLUMNS).eq('id', id).maybeSingle(),
        'Failed to load session',
      );
    },

    async findByTokenHash(tokenHash) {
      return handleSupabaseMaybe<SessionRow>(
        await supabase.from('sessions').select(SESSION_COLUMNS).eq('token', tokenHash).maybeSingle(),
        'Failed to load session',
      );
    },

    async listAll() {
      return ensureRows<SessionRow>(
        await supabase.from('sessions').select(SESSION_COLUMNS).order('issued', { ascending: true }),
        'Failed to list sessions',
      );
    },

    async updateExpiry(id, expiry, lastAccess) {
      ensureOk(
        await supabase.from('sessions').update({ expiry, last_access: lastAccess }).eq('id', id),
        'Failed to prolong session',
      );
    },

    async delete(id) {
      ensureOk(await supabase.from('sessions').delete().eq('id', id), 'Failed to destroy session');
    },

    async deleteForUser(userId) {
      const result = await supabase
        .from('sessions')
        .delete({ count: 'exact' })
        .eq('user_id', userId);
      ensureOk(result, 'Failed to invalidate sessions');
      return result.count ?? 0;
    },
  };
}

export function createSupabaseLoginTokenStore(supabase: SupabaseClient): LoginTokenStore {
  return {
    async insert(row) {
      ensureOk(await supabase.from('login_tokens').insert(row), 'Failed to create login token');
    },

    async findByTokenHash(tokenHash) {
      return handleSupabaseMaybe<LoginTokenRow>(
        await supabase
          .from('login_tokens')
          .select(LOGIN_TOKEN_COLUMNS)
          .eq('token_hash', tokenHash)
          .maybeSingle(),
        'Failed to load login token',
      );
    },

    async markUsed(id) {
      // The row-level update is the only arbitration between concurrent redeemers.
      const updated = ensureRows<Pick<LoginTokenRow, 'id'>>(
        await supabase
          .from('login_tokens')
          .update({ used: true })
          .eq('id', id)
          .eq('used', false)
          .select('id'),
        'Failed to mark login token as used',
      );
      return updated.length > 0;
    },
  };
}

export function createSupabaseStores(supabase: SupabaseClient): Stores {
  return {
    users: createSupabaseUserStore(supabase),
    sessions: createSupabaseSessionStore(supabase),
    loginTokens: createSupabaseLoginTokenStore(supabase),
  };
}
