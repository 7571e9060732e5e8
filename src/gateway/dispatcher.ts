/**
 * Protocol dispatcher — routes parsed client requests to the active callbacks
 * and replies to the requesting session only.
 *
 * Work for one session runs strictly in arrival order: the greeting first,
 * then each frame once the previous one has been answered.
 */

import type { CallbackRegistry } from '../callbacks/registry.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import {
  encodeEvent,
  parseInbound,
  serializeMessage,
  toWireMembers,
  toWireServer,
  UserInfoSchema,
  type InboundMessage,
  type OutboundMessage,
  type ServerListing,
  type UserInfo,
} from '../protocol/index.js';
import type { MemberMap, Server } from '../registry/types.js';
import type { ConnectionSet, Session } from './sessions.js';

const log = createLogger('dispatch');

type Request<T extends InboundMessage['type']> = Extract<InboundMessage, { type: T }>;

export interface DispatcherConfig {
  callbacks: CallbackRegistry;
  connections: ConnectionSet;
}

export class ProtocolDispatcher {
  private callbacks: CallbackRegistry;
  private connections: ConnectionSet;
  private tails = new WeakMap<Session, Promise<void>>();

  constructor(config: DispatcherConfig) {
    this.callbacks = config.callbacks;
    this.connections = config.connections;
  }

  /** Greet a new session with the server listing */
  onConnect(session: Session): Promise<void> {
    return this.enqueue(session, 'greeting', () => this.greet(session));
  }

  /** Queue one text frame behind the session's earlier work. Malformed frames are logged and dropped. */
  handle(session: Session, data: string): Promise<void> {
    return this.enqueue(session, 'frame', () => this.process(session, data));
  }

  ignoreBinary(session: Session): void {
    log.debug(`session ${session.id}: binary frame ignored`);
  }

  private enqueue(session: Session, label: string, task: () => Promise<void>): Promise<void> {
    const previous = this.tails.get(session) ?? Promise.resolve();
    const next = previous.then(task).catch((err) => {
      log.error(`${label} for session ${session.id} failed: ${errorMessage(err)}`);
    });
    this.tails.set(session, next);
    return next;
  }

  private async greet(session: Session): Promise<void> {
    let servers: Record<string, ServerListing>;
    try {
      servers = await this.serverListing();
    } catch (err) {
      log.error(`server_data failed: ${errorMessage(err)}`);
      await this.reply(session, { type: 'error', message: 'Failed to load servers' });
      return;
    }
    await this.reply(session, encodeEvent({ kind: 'connect_ack', servers }));
  }

  private async process(session: Session, data: string): Promise<void> {
    let message: InboundMessage;
    try {
      message = parseInbound(data);
    } catch (err) {
      log.warn(`session ${session.id}: dropped frame: ${errorMessage(err)}`);
      return;
    }

    log.debug(`session ${session.id} → ${message.type} ${message.serverId}`);

    try {
      switch (message.type) {
        case 'get_user_data':
          await this.handleGetUserData(session, message);
          break;
        case 'authenticate':
          await this.handleAuthenticate(session, message);
          break;
        case 'connect':
          await this.handleConnect(session, message);
          break;
      }
    } catch (err) {
      log.error(`${message.type} failed for session ${session.id}: ${errorMessage(err)}`);
      await this.reply(session, { type: 'error', message: `Failed to handle ${message.type}` });
    }
  }

  private async handleGetUserData(session: Session, msg: Request<'get_user_data'>): Promise<void> {
    const server = await this.findServer(msg.serverId);
    let users: MemberMap = {};
    if (server && this.canRead(session, server)) {
      users = await this.callbacks.resolve('user_data')(server.id);
    }
    await this.reply(session, { type: 'user_data', serverId: msg.serverId, users: toWireMembers(users) });
  }

  private async handleAuthenticate(session: Session, msg: Request<'authenticate'>): Promise<void> {
    const ok = await this.authenticate(session, msg);
    if (ok) session.authorize(msg.serverId);
    log.info(`session ${session.id} auth ${ok ? 'granted' : 'denied'} for ${msg.serverId}`);
    await this.reply(session, { type: 'auth_result', serverId: msg.serverId, ok });
  }

  private async authenticate(session: Session, msg: Request<'authenticate'>): Promise<boolean> {
    const server = await this.findServer(msg.serverId);
    if (!server) return false;
    if (!server.requiresAuth) return true;
    if (typeof msg.token !== 'string' || msg.token.length === 0) return false;

    let user: UserInfo | null = null;
    if (msg.user !== undefined && msg.user !== null) {
      const parsed = UserInfoSchema.safeParse(msg.user);
      if (!parsed.success) return false;
      user = parsed.data;
    }

    try {
      return (await this.callbacks.resolve('validate_user')(msg.token, user, server.id)) === true;
    } catch (err) {
      log.error(`validate_user failed for session ${session.id}: ${errorMessage(err)}`);
      return false;
    }
  }

  private async handleConnect(session: Session, msg: Request<'connect'>): Promise<void> {
    const server = await this.findServer(msg.serverId);
    if (!server) {
      await this.reply(session, { type: 'error', message: `Unknown server: ${msg.serverId}` });
      return;
    }
    if (!this.canRead(session, server)) {
      await this.reply(session, { type: 'error', message: `Authentication required for server: ${server.id}` });
      return;
    }

    const [users, clientId] = await Promise.all([
      this.callbacks.resolve('user_data')(server.id),
      this.callbacks.resolve('client_id')(server.id),
    ]);
    await this.reply(session, {
      type: 'server_join',
      server: toWireServer(server, clientId),
      users: toWireMembers(users),
    });
  }

  private canRead(session: Session, server: Server): boolean {
    return !server.requiresAuth || session.isAuthorized(server.id);
  }

  private async findServer(serverId: string): Promise<Server | undefined> {
    const servers = await this.callbacks.resolve('server_data')(serverId);
    return Object.prototype.hasOwnProperty.call(servers, serverId) ? servers[serverId] : undefined;
  }

  private async serverListing(): Promise<Record<string, ServerListing>> {
    const servers = await this.callbacks.resolve('server_data')();
    const clientIdOf = this.callbacks.resolve('client_id');
    const entries = await Promise.all(
      Object.entries(servers).map(async ([id, server]): Promise<[string, ServerListing]> => {
        const clientId = await clientIdOf(id);
        const listing: ServerListing = { ...server };
        if (clientId) listing.clientId = clientId;
        return [id, listing];
      }),
    );
    return Object.fromEntries(entries);
  }

  /** Send to one session; a failed write evicts it */
  private async reply(session: Session, message: OutboundMessage): Promise<boolean> {
    try {
      await session.send(serializeMessage(message));
      return true;
    } catch (err) {
      log.debug(`reply ${message.type} to session ${session.id} failed: ${errorMessage(err)}`);
      if (this.connections.remove(session)) session.terminate();
      return false;
    }
  }
}
