/**
 * Relay wire protocol
 * One JSON object per WebSocket text frame, always with a string `type`.
 */

import { z } from 'zod';
import { ProtocolError } from '../lib/errors.js';
import type { Member, MemberMap, Presence, Server } from '../registry/types.js';

// ============================================================================
// Inbound (client → relay)
// ============================================================================

// Ids are opaque; an empty or unknown id is answered, not rejected
export const GetUserDataSchema = z.object({
  type: z.literal('get_user_data'),
  serverId: z.string(),
});

export const AuthenticateSchema = z.object({
  type: z.literal('authenticate'),
  serverId: z.string(),
  // Shape checked by the dispatcher; a bad token is an auth failure, not a protocol error
  token: z.unknown(),
  user: z.unknown().optional(),
});

export const ConnectSchema = z.object({
  type: z.literal('connect'),
  serverId: z.string().optional(),
  // Frontend clients send { data: { server } }
  data: z.object({ server: z.string() }).optional(),
});

export const InboundSchema = z.discriminatedUnion('type', [
  GetUserDataSchema,
  AuthenticateSchema,
  ConnectSchema,
]);

export type InboundMessage =
  | z.infer<typeof GetUserDataSchema>
  | z.infer<typeof AuthenticateSchema>
  | { type: 'connect'; serverId: string };
export type InboundType = InboundMessage['type'];

export const UserInfoSchema = z.object({
  id: z.string().min(1),
  username: z.string().optional(),
});

export type UserInfo = z.infer<typeof UserInfoSchema>;

const INBOUND_TYPES = new Set<string>(['get_user_data', 'authenticate', 'connect']);

export function parseInbound(data: string): InboundMessage {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err) {
    throw new ProtocolError('Invalid JSON', { cause: err });
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new ProtocolError('Message is not a JSON object');
  }
  const type = 'type' in json ? json.type : undefined;
  if (typeof type !== 'string') {
    throw new ProtocolError('Missing message type');
  }
  if (!INBOUND_TYPES.has(type)) {
    throw new ProtocolError(`Unknown message type: ${type}`);
  }

  const result = InboundSchema.safeParse(json);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join('.') || '(root)').join(', ');
    throw new ProtocolError(`Invalid ${type} message: ${fields}`, { cause: result.error });
  }

  const msg = result.data;
  if (msg.type === 'connect') {
    const serverId = msg.serverId ?? msg.data?.server;
    if (serverId === undefined) throw new ProtocolError('Invalid connect message: serverId');
    return { type: 'connect', serverId };
  }
  return msg;
}

// ============================================================================
// Outbound (relay → client)
// ============================================================================

export interface WireServer {
  id: string;
  name: string;
  passworded: boolean;
  default: boolean;
  clientId?: string;
}

export interface WireMember {
  uid: string;
  username: string;
  status: Presence;
  roleColor: string;
}

export interface PresenceData {
  uid: string;
  status: Presence;
  delete: boolean;
  username?: string;
  roleColor?: string;
}

export type OutboundMessage =
  | { type: 'connect_ack'; servers: Record<string, WireServer> }
  | { type: 'user_data'; serverId: string; users: Record<string, WireMember> }
  | { type: 'auth_result'; serverId: string; ok: boolean }
  | { type: 'server_join'; server: WireServer; users: Record<string, WireMember> }
  | { type: 'presence'; server: string; data: PresenceData }
  | { type: 'message'; server: string; data: { uid: string; message: string; channel: string } }
  | { type: 'client_id'; server: string; data: { clientId: string } }
  | { type: 'server_update'; server: string; data: { passworded: boolean } }
  | { type: 'error'; message: string };

export function serializeMessage(message: OutboundMessage): string {
  return JSON.stringify(message);
}

export function toWireServer(server: Server, clientId?: string): WireServer {
  const wire: WireServer = {
    id: server.id,
    name: server.name,
    passworded: server.requiresAuth,
    default: server.isDefault,
  };
  if (clientId) wire.clientId = clientId;
  return wire;
}

export function toWireMember(member: Member): WireMember {
  return {
    uid: member.id,
    username: member.username,
    status: member.presence,
    roleColor: member.roleColor,
  };
}

export function toWireMembers(members: MemberMap): Record<string, WireMember> {
  const out: Record<string, WireMember> = {};
  for (const [id, member] of Object.entries(members)) {
    out[id] = toWireMember(member);
  }
  return out;
}

// ============================================================================
// Events
// ============================================================================

export interface ServerListing extends Server {
  clientId?: string;
}

export interface PresenceEvent {
  kind: 'presence_changed';
  server: string;
  member: string;
  presence: Presence;
  removed: boolean;
  username?: string;
  roleColor?: string;
}

export type HubEvent =
  | PresenceEvent
  | { kind: 'message_posted'; server: string; member: string; channel: string; text: string }
  | { kind: 'client_id_updated'; server: string; clientId: string }
  | { kind: 'server_updated'; server: string; requiresAuth: boolean }
  | { kind: 'connect_ack'; servers: Record<string, ServerListing> };

export type HubEventKind = HubEvent['kind'];

/**
 * Build a presence event. Offline and removal always travel together so
 * clients can evict the member.
 */
export function presenceChanged(
  server: string,
  member: string,
  presence: Presence,
  opts: { removed?: boolean; username?: string; roleColor?: string } = {},
): PresenceEvent {
  const removed = opts.removed === true || presence === 'offline';
  const event: PresenceEvent = {
    kind: 'presence_changed',
    server,
    member,
    presence: removed ? 'offline' : presence,
    removed,
  };
  if (opts.username !== undefined) event.username = opts.username;
  if (opts.roleColor !== undefined) event.roleColor = opts.roleColor;
  return event;
}

export function encodeEvent(event: HubEvent): OutboundMessage {
  switch (event.kind) {
    case 'presence_changed': {
      const data: PresenceData = { uid: event.member, status: event.presence, delete: event.removed };
      if (event.username !== undefined) data.username = event.username;
      if (event.roleColor !== undefined) data.roleColor = event.roleColor;
      return { type: 'presence', server: event.server, data };
    }
    case 'message_posted':
      return {
        type: 'message',
        server: event.server,
        data: { uid: event.member, message: event.text, channel: event.channel },
      };
    case 'client_id_updated':
      return { type: 'client_id', server: event.server, data: { clientId: event.clientId } };
    case 'server_updated':
      return { type: 'server_update', server: event.server, data: { passworded: event.requiresAuth } };
    case 'connect_ack': {
      const servers: Record<string, WireServer> = {};
      for (const [id, listing] of Object.entries(event.servers)) {
        servers[id] = toWireServer(listing, listing.clientId);
      }
      return { type: 'connect_ack', servers };
    }
  }
}
