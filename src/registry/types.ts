/**
 * Domain model: servers, their rosters and member presence
 */

export const PRESENCES = ['online', 'idle', 'dnd', 'offline'] as const;
export type Presence = typeof PRESENCES[number];

export const ROLE_COLOR_RE = /^#[0-9a-fA-F]{6}$/;
export const DEFAULT_ROLE_COLOR = '#ffffff';

export interface Server {
  id: string;
  name: string;
  requiresAuth: boolean;
  isDefault: boolean;
}

export interface Member {
  id: string;
  username: string;
  presence: Presence;
  roleColor: string;
}

export type ServerMap = Record<string, Server>;
export type MemberMap = Record<string, Member>;

export function isPresence(value: unknown): value is Presence {
  return PRESENCES.some((p) => p === value);
}

export function isRoleColor(value: unknown): value is string {
  return typeof value === 'string' && ROLE_COLOR_RE.test(value);
}
