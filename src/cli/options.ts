import { InvalidArgumentError } from 'commander';
import type { RelayConfigInput } from '../config/config.js';

export interface CliOptions {
  host?: string;
  port?: number;
  staticDir?: string;
  clientId?: string;
  /** false only when --no-simulation is given */
  simulation: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Expected an integer 0-65535.');
  }
  return port;
}

/** Map parsed flags onto config overrides. Unset flags leave env and defaults alone. */
export function toConfigInput(opts: CliOptions): RelayConfigInput {
  const input: RelayConfigInput = {};
  if (opts.host !== undefined) input.host = opts.host;
  if (opts.port !== undefined) input.port = opts.port;
  if (opts.staticDir !== undefined) input.staticDir = opts.staticDir;
  if (opts.clientId !== undefined) input.clientId = opts.clientId;
  if (opts.simulation === false) input.simulation = { enabled: false };
  return input;
}
