/**
 * Relay server — composition root
 *
 * One node:http listener carries both the WebSocket endpoint and the small
 * HTTP surface. Owns the registry, callbacks, connections and simulation;
 * exposes broadcast helpers for external producers.
 */

import http from 'node:http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { CallbackRegistry, defaultHandlers } from '../callbacks/registry.js';
import { resolveConfig, type RelayConfig, type RelayConfigInput } from '../config/config.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { presenceChanged, type HubEvent } from '../protocol/index.js';
import { EntityRegistry } from '../registry/entities.js';
import { loadMockServers } from '../registry/mock-data.js';
import type { Presence } from '../registry/types.js';
import type { ChatScript } from '../simulation/chat.js';
import type { EventClock } from '../simulation/clock.js';
import { SimulationEngine } from '../simulation/engine.js';
import { VERSION } from '../version.js';
import { BroadcastRouter, type BroadcastResult } from './broadcast.js';
import { ProtocolDispatcher } from './dispatcher.js';
import { createHttpHandler } from './http.js';
import { ConnectionSet, Session } from './sessions.js';

const log = createLogger('relay');

/** How long stop() waits for clients to finish the close handshake */
const SHUTDOWN_GRACE_MS = 2_000;

export interface RelayServerOptions extends RelayConfigInput {
  /** Seeded registry; the bundled mock servers when omitted */
  registry?: EntityRegistry;
  clock?: EventClock;
  chat?: ChatScript;
  /** Environment consulted for RELAY_* settings */
  env?: NodeJS.ProcessEnv;
}

export interface PresenceOptions {
  username?: string;
  roleColor?: string;
  delete?: boolean;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class RelayServer {
  readonly config: RelayConfig;
  readonly registry: EntityRegistry;
  readonly callbacks: CallbackRegistry;
  readonly connections = new ConnectionSet();
  readonly simulation: SimulationEngine;

  private router: BroadcastRouter;
  private dispatcher: ProtocolDispatcher;
  private clientIds = new Map<string, string>();
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;

  constructor(options: RelayServerOptions = {}) {
    const { registry, clock, chat, env, ...overrides } = options;
    this.config = resolveConfig(overrides, env);
    this.registry = registry ?? new EntityRegistry(loadMockServers());
    this.callbacks = new CallbackRegistry(defaultHandlers(this.registry, this.clientIds, this.config.clientId));
    this.router = new BroadcastRouter(this.connections);
    this.dispatcher = new ProtocolDispatcher({ callbacks: this.callbacks, connections: this.connections });

    const { presence, chat: chatBounds, departChance, rejoinChance } = this.config.simulation;
    this.simulation = new SimulationEngine({
      registry: this.registry,
      publish: (event) => this.router.sendToAll(event),
      clock,
      chat,
      options: { presence, chat: chatBounds, departChance, rejoinChance },
    });
  }

  get isRunning(): boolean {
    return this.httpServer !== null;
  }

  /** Bound port; the configured one until start() resolves */
  get port(): number {
    const addr = this.httpServer?.address();
    return addr && typeof addr === 'object' ? addr.port : this.config.port;
  }

  get address(): string {
    return `ws://${this.config.host}:${this.port}`;
  }

  get clientCount(): number {
    return this.connections.size;
  }

  async start(): Promise<void> {
    if (this.httpServer) return;

    const httpServer = http.createServer(createHttpHandler({
      callbacks: this.callbacks,
      version: VERSION,
      staticDir: this.config.staticDir,
      status: () => ({ clients: this.clientCount, servers: this.registry.serverIds().length }),
    }));
    const wss = new WebSocketServer({ server: httpServer });
    wss.on('connection', (ws) => this.onConnection(ws));
    wss.on('error', (err) => log.error(`websocket server: ${errorMessage(err)}`));

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.off('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;
    log.info(`listening on ${this.address}`);

    if (this.config.simulation.enabled) this.simulation.start();
  }

  /**
   * Two-phase shutdown: stop producers first, then close every session and
   * the listener. Clients that ignore the close frame are terminated after a grace period.
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer;
    const wss = this.wss;
    if (!httpServer || !wss) return;
    this.httpServer = null;
    this.wss = null;

    await this.simulation.stop();

    this.connections.closeAll(1001, 'Server shutting down');
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        for (const ws of wss.clients) ws.terminate();
      }, SHUTDOWN_GRACE_MS);
      wss.close(() => {
        httpServer.close(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    });
    log.info('stopped');
  }

  /** Start, then block until SIGINT or SIGTERM and shut down cleanly */
  async runForever(): Promise<void> {
    await this.start();
    await new Promise<void>((resolve) => {
      const onSignal = (signal: NodeJS.Signals) => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        log.info(`received ${signal}, shutting down`);
        resolve();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    });
    await this.stop();
  }

  // ── Broadcast helpers ─────────────────────────────────────────────────────

  async broadcastMessage(server: string, uid: string, message: string, channel: string): Promise<boolean> {
    if (!this.registry.hasMember(server, uid)) {
      log.debug(`message dropped: unknown member ${uid} on ${server}`);
      return false;
    }
    await this.emit({ kind: 'message_posted', server, member: uid, channel, text: message });
    return true;
  }

  async broadcastPresence(server: string, uid: string, status: Presence, opts: PresenceOptions = {}): Promise<boolean> {
    const outcome = this.registry.applyPresence(server, uid, status, {
      username: opts.username,
      roleColor: opts.roleColor,
      removed: opts.delete,
    });
    if (outcome.status === 'not_found') {
      log.debug(`presence dropped: unknown ${this.registry.hasServer(server) ? 'member' : 'server'} ${uid} on ${server}`);
      return false;
    }

    const event = outcome.status === 'removed'
      ? presenceChanged(server, uid, 'offline', { removed: true })
      : presenceChanged(server, uid, outcome.member.presence, {
        username: outcome.member.username,
        roleColor: outcome.member.roleColor,
      });
    await this.emit(event);
    return true;
  }

  async broadcastClientIdUpdate(server: string, clientId: string): Promise<boolean> {
    if (!this.registry.hasServer(server)) return false;
    this.clientIds.set(server, clientId);
    await this.emit({ kind: 'client_id_updated', server, clientId });
    return true;
  }

  async updateServerAuth(server: string, requiresAuth: boolean): Promise<boolean> {
    if (!this.registry.setRequiresAuth(server, requiresAuth)) return false;
    await this.emit({ kind: 'server_updated', server, requiresAuth });
    return true;
  }

  private emit(event: HubEvent): Promise<BroadcastResult> {
    return this.router.sendToAll(event);
  }

  // ── Connections ───────────────────────────────────────────────────────────

  private onConnection(ws: WebSocket): void {
    const session = new Session(ws);
    this.connections.add(session);
    log.debug(`session ${session.id} connected (${this.connections.size} open)`);

    // The dispatcher queues the greeting and every frame per session, in order
    this.dispatcher.onConnect(session).catch((err) => {
      log.error(`greeting session ${session.id}: ${errorMessage(err)}`);
    });

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        this.dispatcher.ignoreBinary(session);
        return;
      }
      this.dispatcher
        .handle(session, rawToString(data))
        .catch((err) => log.error(`session ${session.id}: ${errorMessage(err)}`));
    });

    ws.on('close', () => this.drop(session));
    ws.on('error', (err) => {
      log.debug(`session ${session.id} error: ${errorMessage(err)}`);
      this.drop(session);
    });
  }

  private drop(session: Session): void {
    if (this.connections.remove(session)) {
      log.debug(`session ${session.id} closed (${this.connections.size} open)`);
    }
  }
}
