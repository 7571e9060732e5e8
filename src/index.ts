export { RelayServer, type RelayServerOptions, type PresenceOptions } from './gateway/server.js';
export { ConnectionSet, Session, type SessionSocket } from './gateway/sessions.js';
export { BroadcastRouter, type BroadcastResult } from './gateway/broadcast.js';
export { ProtocolDispatcher } from './gateway/dispatcher.js';
export {
  CallbackRegistry,
  CALLBACK_KINDS,
  defaultHandlers,
  type CallbackHandlers,
  type CallbackKind,
  type StaticResponse,
} from './callbacks/registry.js';
export { EntityRegistry, type ServerSeed, type PresenceOutcome } from './registry/entities.js';
export { loadMockServers, parseMockServers } from './registry/mock-data.js';
export * from './registry/types.js';
export { SimulationEngine, ServerSimulation, DEFAULT_SIMULATION, type SimulationOptions } from './simulation/engine.js';
export { EventClock, seededRandom } from './simulation/clock.js';
export * from './protocol/index.js';
export { resolveConfig, type RelayConfig, type RelayConfigInput } from './config/config.js';
export { validateConfig, type ValidationResult } from './config/validate.js';
export { RelayError, ProtocolError, TransportError, ConfigError } from './lib/errors.js';
export { createLogger, type Logger } from './lib/logger.js';
export { VERSION } from './version.js';
