import { describe, it, expect } from 'vitest';
import { ConfigError } from '../lib/errors.js';
import { DEFAULT_SIMULATION } from '../simulation/engine.js';
import { configFromEnv, resolveConfig } from './config.js';

describe('configFromEnv', () => {
  it('ignores unset and empty variables', () => {
    expect(configFromEnv({ RELAY_HOST: '' })).toEqual({});
  });

  it('reads every RELAY_ variable', () => {
    expect(configFromEnv({
      RELAY_HOST: '0.0.0.0',
      RELAY_PORT: '8080',
      RELAY_STATIC_DIR: '/srv/www',
      RELAY_CLIENT_ID: 'app-1',
      RELAY_SIMULATION: 'off',
    })).toEqual({
      host: '0.0.0.0',
      port: 8080,
      staticDir: '/srv/www',
      clientId: 'app-1',
      simulation: { enabled: false },
    });
  });

  it('treats other RELAY_SIMULATION values as enabled', () => {
    expect(configFromEnv({ RELAY_SIMULATION: 'yes' }).simulation).toEqual({ enabled: true });
  });
});

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      host: '127.0.0.1',
      port: 3000,
      simulation: { enabled: true, ...DEFAULT_SIMULATION },
    });
  });

  it('lets overrides win over the environment', () => {
    const config = resolveConfig({ port: 4000, simulation: { departChance: 0.5 } }, { RELAY_PORT: '5000', RELAY_SIMULATION: '0' });
    expect(config.port).toBe(4000);
    expect(config.simulation.enabled).toBe(false);
    expect(config.simulation.departChance).toBe(0.5);
    expect(config.simulation.rejoinChance).toBe(DEFAULT_SIMULATION.rejoinChance);
  });

  it('throws ConfigError for a non-numeric port', () => {
    expect(() => resolveConfig({}, { RELAY_PORT: 'abc' })).toThrow(ConfigError);
  });

  it('lists every validation problem', () => {
    try {
      resolveConfig({ port: 70000, simulation: { rejoinChance: 2 } }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.problems).toEqual([
          'port must be an integer 0-65535',
          'simulation.rejoinChance must be within 0-1',
        ]);
      }
    }
  });
});
