/**
 * Error classes shared across the relay.
 * Each carries a stable `code` so logs and client replies stay greppable.
 */

export class RelayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Inbound frame that could not be parsed or did not match a known shape */
export class ProtocolError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROTOCOL_ERROR', message, options);
  }
}

/** Socket write or close failure on a single session */
export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
  }
}

export class ConfigError extends RelayError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
