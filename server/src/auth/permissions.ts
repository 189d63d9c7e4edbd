import { z } from 'zod';
import type { Identity } from './identity.js';
import type { UserStore } from '../stores/types.js';

export const ROLES = ['Organizer', 'Judge', 'Marshall'] as const;

export const roleSchema = z.enum(ROLES);

/**
 * Within a tournament a user holds zero or more roles; permissions are only ever
 * derived from them.
 */
export type Role = z.infer<typeof roleSchema>;

export const PERMISSIONS = [
  'CreateUsersManually',
  'CreateUsersWithLink',
  'DeleteUsers',
  'ModifyUserRoles',
  'WriteRoles',
  'ReadTournament',
  'WriteTournament',
  'ReadAttendees',
  'WriteAttendees',
  'ReadTeams',
  'WriteTeams',
  'ReadDebates',
  'WriteDebates',
  'ReadAffiliations',
  'WriteAffiliations',
  'ReadLocations',
  'WriteLocations',
  'ReadRooms',
  'ModifyAllRoomDetails',
  'ReadPhases',
  'WritePhases',
  'ReadRounds',
  'WriteRounds',
  'SubmitOwnVerdictVote',
  'SubmitVerdict',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

const ALL_PERMISSIONS: ReadonlySet<Permission> = new Set(PERMISSIONS);

// Judges submit verdicts for debates they were assigned to.
const JUDGE_PERMISSIONS: ReadonlySet<Permission> = new Set<Permission>([
  'ReadAttendees',
  'ReadDebates',
  'ReadTeams',
  'ReadTournament',
  'SubmitOwnVerdictVote',
]);

// Marshalls conduct debates and may submit verdicts on the judges' behalf.
const MARSHALL_PERMISSIONS: ReadonlySet<Permission> = new Set<Permission>([
  'ReadAttendees',
  'ReadDebates',
  'ReadTeams',
  'ReadTournament',
  'SubmitVerdict',
]);

export function rolePermissions(role: Role): ReadonlySet<Permission> {
  switch (role) {
    case 'Organizer':
      return ALL_PERMISSIONS;
    case 'Judge':
      return JUDGE_PERMISSIONS;
    case 'Marshall':
      return MARSHALL_PERMISSIONS;
    default: {
      const unreachable: never = role;
      throw new Error(`Unknown role: ${String(unreachable)}`);
    }
  }
}

export function hasPermission(identity: Identity, roles: readonly Role[], permission: Permission) {
  if (identity.isInfrastructureAdmin) {
    return true;
  }
  return roles.some((role) => rolePermissions(role).has(permission));
}

export function effectivePermissions(identity: Identity, roles: readonly Role[]): Permission[] {
  return PERMISSIONS.filter((permission) => hasPermission(identity, roles, permission));
}

export interface TournamentUser {
  identity: Identity;
  tournamentId: string;
  roles: Role[];
}

export async function loadTournamentUser(
  users: UserStore,
  identity: Identity,
  tournamentId: string,
): Promise<TournamentUser> {
  if (identity.isInfrastructureAdmin) {
    return { identity, tournamentId, roles: [] };
  }
  const roles = await users.getRoles(identity.id, tournamentId);
  return { identity, tournamentId, roles };
}

export function tournamentUserCan(user: TournamentUser, permission: Permission) {
  return hasPermission(user.identity, user.roles, permission);
}
