/**
 * Callback registry — pluggable data providers and validators
 *
 * One handler slot per kind. Registering replaces the previous handler; an
 * empty slot resolves to the built-in default, so resolve() always returns
 * something callable.
 */

import { createLogger } from '../lib/logger.js';
import type { UserInfo } from '../protocol/index.js';
import type { EntityRegistry } from '../registry/entities.js';
import type { MemberMap, ServerMap } from '../registry/types.js';

const log = createLogger('callbacks');

type MaybePromise<T> = T | Promise<T>;

export interface StaticResponse {
  contentType: string;
  content: string | Buffer;
  status?: number;
}

export type ServerDataHandler = (filterId?: string) => MaybePromise<ServerMap>;
export type UserDataHandler = (serverId: string) => MaybePromise<MemberMap>;
export type StaticRequestHandler = (path: string, staticDir?: string) => MaybePromise<StaticResponse | undefined>;
export type ValidateUserHandler = (token: string, userInfo: UserInfo | null, serverId: string) => MaybePromise<boolean>;
export type ClientIdHandler = (serverId: string) => MaybePromise<string | undefined>;

export interface CallbackHandlers {
  server_data: ServerDataHandler;
  user_data: UserDataHandler;
  static_request: StaticRequestHandler;
  validate_user: ValidateUserHandler;
  client_id: ClientIdHandler;
}

export type CallbackKind = keyof CallbackHandlers;

export const CALLBACK_KINDS: readonly CallbackKind[] = [
  'server_data',
  'user_data',
  'static_request',
  'validate_user',
  'client_id',
];

/**
 * Built-in handlers: registry queries for data, deny for auth, nothing for
 * static files, and per-server client ids falling back to `fallbackClientId`.
 */
export function defaultHandlers(
  registry: EntityRegistry,
  clientIds: ReadonlyMap<string, string> = new Map(),
  fallbackClientId?: string,
): CallbackHandlers {
  return {
    server_data: (filterId) => registry.listServers(filterId),
    user_data: (serverId) => registry.listMembers(serverId),
    static_request: () => undefined,
    validate_user: () => false,
    client_id: (serverId) => clientIds.get(serverId) ?? fallbackClientId,
  };
}

export class CallbackRegistry {
  private active: CallbackHandlers;

  constructor(private defaults: CallbackHandlers) {
    this.active = { ...defaults };
  }

  register<K extends CallbackKind>(kind: K, handler: CallbackHandlers[K]): void {
    const replacing = this.isOverridden(kind);
    this.active[kind] = handler;
    log.debug(`${replacing ? 'replaced' : 'registered'} ${kind} handler`);
  }

  /** Drop a registered handler; returns false when the default was already active */
  unregister<K extends CallbackKind>(kind: K): boolean {
    if (!this.isOverridden(kind)) return false;
    this.active[kind] = this.defaults[kind];
    log.debug(`restored default ${kind} handler`);
    return true;
  }

  isOverridden(kind: CallbackKind): boolean {
    return this.active[kind] !== this.defaults[kind];
  }

  resolve<K extends CallbackKind>(kind: K): CallbackHandlers[K] {
    return this.active[kind];
  }
}
