/**
 * Boot-time configuration validation
 * Fails fast so a bad port or timing window never reaches the listener
 */

import type { RelayConfig } from './config.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Intervals below this flood every client with events */
export const MIN_SANE_INTERVAL_MS = 1000;

/**
 * Validate resolved config before the server starts.
 * Returns errors (fatal) and warnings (informational).
 */
export function validateConfig(config: RelayConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer 0-65535');
  }
  if (config.host.trim() === '') {
    errors.push('host must not be empty');
  }

  const sim = config.simulation;
  for (const key of ['presence', 'chat'] as const) {
    const { minMs, maxMs } = sim[key];
    if (!(minMs > 0) || !(maxMs > 0)) {
      errors.push(`simulation.${key}: intervals must be positive`);
    } else if (minMs > maxMs) {
      errors.push(`simulation.${key}: minMs (${minMs}) exceeds maxMs (${maxMs})`);
    } else if (sim.enabled && minMs < MIN_SANE_INTERVAL_MS) {
      warnings.push(`simulation.${key}: minMs ${minMs} is under ${MIN_SANE_INTERVAL_MS}ms`);
    }
  }

  for (const key of ['departChance', 'rejoinChance'] as const) {
    const p = sim[key];
    if (!(p >= 0 && p <= 1)) {
      errors.push(`simulation.${key} must be within 0-1`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
