/**
 * Entity registry — in-memory servers, rosters and member presence
 *
 * Sole mutator of member state. Every mutation is a synchronous method body,
 * so on the event loop it runs to completion before any other handler sees the
 * roster. Each server owns its own record; nothing here is global.
 */

import { RelayError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import {
  DEFAULT_ROLE_COLOR,
  isRoleColor,
  type Member,
  type MemberMap,
  type Presence,
  type Server,
  type ServerMap,
} from './types.js';

const log = createLogger('registry');

interface ServerRecord {
  server: Server;
  members: Map<string, Member>;
}

export interface PresenceUpdate {
  username?: string;
  roleColor?: string;
  /** Evict the member from the roster */
  removed?: boolean;
}

export type PresenceOutcome =
  | { status: 'not_found' }
  | { status: 'added' | 'updated' | 'removed'; member: Member };

export interface ServerSeed extends Server {
  members: Member[];
}

export class EntityRegistry {
  private servers = new Map<string, ServerRecord>();

  constructor(seed: ServerSeed[] = []) {
    for (const { members, ...server } of seed) {
      this.addServer(server, members);
    }
  }

  addServer(server: Server, members: Member[] = []): void {
    if (this.servers.has(server.id)) {
      throw new RelayError('DUPLICATE_SERVER', `Server already registered: ${server.id}`);
    }
    if (server.isDefault) {
      const current = this.defaultServerId();
      if (current) {
        throw new RelayError('DUPLICATE_DEFAULT', `Server ${server.id} cannot be default, ${current} already is`);
      }
    }

    const roster = new Map<string, Member>();
    for (const m of members) {
      roster.set(m.id, { ...m, roleColor: isRoleColor(m.roleColor) ? m.roleColor : DEFAULT_ROLE_COLOR });
    }
    this.servers.set(server.id, { server: { ...server }, members: roster });
    log.debug(`server added: ${server.id} (${server.name}, ${roster.size} members)`);
  }

  hasServer(serverId: string): boolean {
    return this.servers.has(serverId);
  }

  getServer(serverId: string): Server | undefined {
    const record = this.servers.get(serverId);
    return record ? { ...record.server } : undefined;
  }

  serverIds(): string[] {
    return Array.from(this.servers.keys());
  }

  defaultServerId(): string | undefined {
    for (const { server } of this.servers.values()) {
      if (server.isDefault) return server.id;
    }
    return undefined;
  }

  listServers(filterId?: string): ServerMap {
    const out: ServerMap = {};
    for (const { server } of this.servers.values()) {
      if (filterId !== undefined && server.id !== filterId) continue;
      out[server.id] = { ...server };
    }
    return out;
  }

  listMembers(serverId: string): MemberMap {
    const out: MemberMap = {};
    const record = this.servers.get(serverId);
    if (!record) return out;
    for (const member of record.members.values()) {
      out[member.id] = { ...member };
    }
    return out;
  }

  getMember(serverId: string, memberId: string): Member | undefined {
    const member = this.servers.get(serverId)?.members.get(memberId);
    return member ? { ...member } : undefined;
  }

  hasMember(serverId: string, memberId: string): boolean {
    return this.servers.get(serverId)?.members.has(memberId) ?? false;
  }

  /**
   * Move a member to a new presence. Going offline always evicts.
   * Unknown servers (and removals of unknown members) report `not_found`.
   */
  applyPresence(
    serverId: string,
    memberId: string,
    presence: Presence,
    update: PresenceUpdate = {},
  ): PresenceOutcome {
    const record = this.servers.get(serverId);
    if (!record) return { status: 'not_found' };

    const existing = record.members.get(memberId);
    const color = isRoleColor(update.roleColor) ? update.roleColor : undefined;

    if (update.removed || presence === 'offline') {
      if (!existing) return { status: 'not_found' };
      record.members.delete(memberId);
      return { status: 'removed', member: { ...existing, presence: 'offline' } };
    }

    if (!existing) {
      const member: Member = {
        id: memberId,
        username: update.username || memberId,
        presence,
        roleColor: color ?? DEFAULT_ROLE_COLOR,
      };
      record.members.set(memberId, member);
      return { status: 'added', member: { ...member } };
    }

    existing.presence = presence;
    if (update.username) existing.username = update.username;
    if (color) existing.roleColor = color;
    return { status: 'updated', member: { ...existing } };
  }

  setRequiresAuth(serverId: string, requiresAuth: boolean): boolean {
    const record = this.servers.get(serverId);
    if (!record) return false;
    record.server.requiresAuth = requiresAuth;
    return true;
  }
}
