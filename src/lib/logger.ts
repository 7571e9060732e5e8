const DEBUG = process.env.DEBUG;
const debugEnabled = !!DEBUG;
const debugScopes = DEBUG && DEBUG !== '1' && DEBUG !== '*'
  ? new Set(DEBUG.split(',').map((s) => s.trim()))
  : null;

const bootTime = Date.now();

function ts(): string {
  const delta = ((Date.now() - bootTime) / 1000).toFixed(1);
  return `+${delta}s`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Scoped stderr logger.
 * `debug` is gated by DEBUG (`1`/`*` for every scope, or a comma list of scopes).
 */
export function createLogger(scope: string): Logger {
  const verbose = debugEnabled && (!debugScopes || debugScopes.has(scope));

  return {
    debug(...args: unknown[]) {
      if (!verbose) return;
      console.error(`${ts()} [${scope}]`, ...args);
    },
    info(...args: unknown[]) {
      console.error(`${ts()} [${scope}]`, ...args);
    },
    warn(...args: unknown[]) {
      console.error(`${ts()} [${scope}] WARN`, ...args);
    },
    error(...args: unknown[]) {
      console.error(`${ts()} [${scope}] ERROR`, ...args);
    },
  };
}
