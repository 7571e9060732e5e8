/**
 * Relay configuration: defaults ← environment ← explicit overrides
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { DEFAULT_SIMULATION } from '../simulation/engine.js';
import { validateConfig } from './validate.js';

const log = createLogger('config');

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 3000;

const BoundsSchema = z.object({
  minMs: z.number(),
  maxMs: z.number(),
});

export const RelayConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int(),
  staticDir: z.string().min(1).optional(),
  clientId: z.string().min(1).optional(),
  simulation: z.object({
    enabled: z.boolean(),
    presence: BoundsSchema,
    chat: BoundsSchema,
    departChance: z.number(),
    rejoinChance: z.number(),
  }),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type SimulationConfig = RelayConfig['simulation'];

export interface RelayConfigInput {
  host?: string;
  port?: number;
  staticDir?: string;
  clientId?: string;
  simulation?: Partial<SimulationConfig>;
}

const FALSY = new Set(['0', 'false', 'off', 'no']);

/** Read RELAY_* variables; unset or empty variables contribute nothing */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RelayConfigInput {
  const input: RelayConfigInput = {};
  if (env.RELAY_HOST) input.host = env.RELAY_HOST;
  if (env.RELAY_PORT) input.port = Number(env.RELAY_PORT);
  if (env.RELAY_STATIC_DIR) input.staticDir = env.RELAY_STATIC_DIR;
  if (env.RELAY_CLIENT_ID) input.clientId = env.RELAY_CLIENT_ID;
  if (env.RELAY_SIMULATION) {
    input.simulation = { enabled: !FALSY.has(env.RELAY_SIMULATION.trim().toLowerCase()) };
  }
  return input;
}

function merge(base: RelayConfigInput, over: RelayConfigInput): RelayConfigInput {
  const merged: RelayConfigInput = { ...base };
  if (over.host !== undefined) merged.host = over.host;
  if (over.port !== undefined) merged.port = over.port;
  if (over.staticDir !== undefined) merged.staticDir = over.staticDir;
  if (over.clientId !== undefined) merged.clientId = over.clientId;
  if (over.simulation) merged.simulation = { ...base.simulation, ...over.simulation };
  return merged;
}

/**
 * Build the effective configuration. Throws ConfigError listing every problem;
 * warnings are logged.
 */
export function resolveConfig(overrides: RelayConfigInput = {}, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const input = merge(configFromEnv(env), overrides);

  const parsed = RelayConfigSchema.safeParse({
    host: input.host ?? DEFAULT_HOST,
    port: input.port ?? DEFAULT_PORT,
    staticDir: input.staticDir,
    clientId: input.clientId,
    simulation: { enabled: true, ...DEFAULT_SIMULATION, ...input.simulation },
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const result = validateConfig(parsed.data);
  if (!result.valid) throw new ConfigError(result.errors);
  for (const warning of result.warnings) log.warn(warning);

  return parsed.data;
}
