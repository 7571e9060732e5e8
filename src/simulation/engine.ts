/**
 * Simulation engine — synthetic presence and chat activity
 *
 * One supervised task per server, each running a presence loop and a chat
 * loop. Tasks only share state through the entity registry. Every loop sleeps
 * on an abortable timer, so stop() returns as soon as the loops notice.
 */

import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { presenceChanged, type HubEvent, type PresenceEvent } from '../protocol/index.js';
import type { EntityRegistry } from '../registry/entities.js';
import type { Member, Presence } from '../registry/types.js';
import { EventClock, type IntervalBounds } from './clock.js';
import { loadChatScript, type ChatScript } from './chat.js';

const log = createLogger('simulation');

const ACTIVE_PRESENCES: readonly Presence[] = ['online', 'idle', 'dnd'];

export interface SimulationOptions {
  presence: IntervalBounds;
  chat: IntervalBounds;
  /** Probability a presence tick takes a member offline */
  departChance: number;
  /** Probability a presence tick brings a departed member back */
  rejoinChance: number;
}

export const DEFAULT_SIMULATION: SimulationOptions = {
  presence: { minMs: 3_000, maxMs: 15_000 },
  chat: { minMs: 8_000, maxMs: 30_000 },
  departChance: 0.1,
  rejoinChance: 0.3,
};

export type PublishFn = (event: HubEvent) => Promise<unknown> | void;

export interface SimulationEngineConfig {
  registry: EntityRegistry;
  publish: PublishFn;
  clock?: EventClock;
  chat?: ChatScript;
  options?: Partial<SimulationOptions>;
}

/**
 * Activity generator for a single server. Owns the pool of members it took
 * offline so it can bring them back later.
 */
export class ServerSimulation {
  private departed = new Map<string, Member>();

  constructor(
    readonly serverId: string,
    private registry: EntityRegistry,
    private clock: EventClock,
    private chat: ChatScript,
    private options: SimulationOptions,
  ) {}

  get departedCount(): number {
    return this.departed.size;
  }

  tickPresence(): PresenceEvent | undefined {
    if (this.departed.size > 0 && this.clock.chance(this.options.rejoinChance)) {
      const returning = this.clock.pick(Array.from(this.departed.values()));
      if (returning) return this.rejoin(returning);
    }

    const members = Object.values(this.registry.listMembers(this.serverId));
    const member = this.clock.pick(members);
    if (!member) return undefined;

    // Never empty the roster completely; chat needs someone to speak
    if (members.length > 1 && this.clock.chance(this.options.departChance)) {
      const outcome = this.registry.applyPresence(this.serverId, member.id, 'offline', { removed: true });
      if (outcome.status !== 'removed') return undefined;
      this.departed.set(member.id, member);
      return presenceChanged(this.serverId, member.id, 'offline', { removed: true });
    }

    const next = this.clock.pick(ACTIVE_PRESENCES.filter((p) => p !== member.presence));
    if (!next) return undefined;
    const outcome = this.registry.applyPresence(this.serverId, member.id, next);
    if (outcome.status === 'not_found') return undefined;
    return presenceChanged(this.serverId, member.id, next, {
      username: outcome.member.username,
      roleColor: outcome.member.roleColor,
    });
  }

  tickChat(): HubEvent | undefined {
    const speakers = Object.values(this.registry.listMembers(this.serverId))
      .filter((m) => m.presence !== 'offline');
    const member = this.clock.pick(speakers);
    const text = this.clock.pick(this.chat.lines);
    const channel = this.clock.pick(this.chat.channels);
    if (!member || !text || !channel) return undefined;

    return { kind: 'message_posted', server: this.serverId, member: member.id, channel, text };
  }

  private rejoin(member: Member): PresenceEvent | undefined {
    this.departed.delete(member.id);
    const outcome = this.registry.applyPresence(this.serverId, member.id, 'online', {
      username: member.username,
      roleColor: member.roleColor,
    });
    if (outcome.status === 'not_found') return undefined;
    return presenceChanged(this.serverId, member.id, 'online', {
      username: outcome.member.username,
      roleColor: outcome.member.roleColor,
    });
  }
}

interface ServerTask {
  simulation: ServerSimulation;
  controller: AbortController;
  done: Promise<void>;
  /** Unhook the task from the shared shutdown signal */
  detach: () => void;
}

export class SimulationEngine {
  private tasks = new Map<string, ServerTask>();
  private shutdown = new AbortController();
  private registry: EntityRegistry;
  private publish: PublishFn;
  private clock: EventClock;
  private chat: ChatScript;
  private options: SimulationOptions;

  constructor(config: SimulationEngineConfig) {
    this.registry = config.registry;
    this.publish = config.publish;
    this.clock = config.clock ?? new EventClock();
    this.chat = config.chat ?? loadChatScript();
    this.options = { ...DEFAULT_SIMULATION, ...config.options };
  }

  /** Shared shutdown signal every task listens on */
  get signal(): AbortSignal {
    return this.shutdown.signal;
  }

  get activeServers(): string[] {
    return Array.from(this.tasks.keys());
  }

  /** Start a task for every given server (all known servers by default) */
  start(serverIds: string[] = this.registry.serverIds()): void {
    if (this.shutdown.signal.aborted) this.shutdown = new AbortController();
    for (const id of serverIds) this.addServer(id);
    log.info(`simulating ${this.tasks.size} server(s)`);
  }

  addServer(serverId: string): boolean {
    if (this.tasks.has(serverId) || !this.registry.hasServer(serverId)) return false;
    if (this.shutdown.signal.aborted) return false;

    const controller = new AbortController();
    const shutdown = this.shutdown.signal;
    const onShutdown = () => controller.abort();
    shutdown.addEventListener('abort', onShutdown, { once: true });

    const simulation = new ServerSimulation(serverId, this.registry, this.clock, this.chat, this.options);
    const done = Promise.all([
      this.loop(serverId, 'presence', this.options.presence, () => simulation.tickPresence(), controller.signal),
      this.loop(serverId, 'chat', this.options.chat, () => simulation.tickChat(), controller.signal),
    ]).then(() => {
      log.debug(`task stopped: ${serverId}`);
    });

    this.tasks.set(serverId, {
      simulation,
      controller,
      done,
      detach: () => shutdown.removeEventListener('abort', onShutdown),
    });
    log.debug(`task started: ${serverId}`);
    return true;
  }

  async removeServer(serverId: string): Promise<void> {
    const task = this.tasks.get(serverId);
    if (!task) return;
    this.tasks.delete(serverId);
    task.detach();
    task.controller.abort();
    await task.done;
  }

  /** Raise the shared shutdown signal and wait for every loop to return */
  async stop(): Promise<void> {
    this.shutdown.abort();
    const pending = Array.from(this.tasks.values()).map((t) => t.done);
    this.tasks.clear();
    await Promise.all(pending);
  }

  private async loop(
    serverId: string,
    kind: 'presence' | 'chat',
    bounds: IntervalBounds,
    tick: () => HubEvent | undefined,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      const slept = await this.clock.sleep(this.clock.nextDelay(bounds), signal);
      if (!slept) return;

      try {
        const event = tick();
        if (!event) {
          log.debug(`${kind} tick skipped: ${serverId}`);
          continue;
        }
        await this.publish(event);
      } catch (err) {
        log.debug(`${kind} tick failed on ${serverId}: ${errorMessage(err)}`);
      }
    }
  }
}
