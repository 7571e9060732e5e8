/**
 * Sessions and the set of open connections
 */

import { TransportError } from '../lib/errors.js';

const OPEN = 1;

/** The slice of a ws socket a session needs */
export interface SessionSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

let nextSessionId = 1;

export class Session {
  readonly id = nextSessionId++;
  readonly connectedAt = Date.now();
  private authorized = new Set<string>();

  constructor(private socket: SessionSocket) {}

  get isOpen(): boolean {
    return this.socket.readyState === OPEN;
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.isOpen) {
        reject(new TransportError(`session ${this.id} is not open`));
        return;
      }
      try {
        this.socket.send(data, (err) => {
          if (err) reject(new TransportError(`send to session ${this.id} failed: ${err.message}`, { cause: err }));
          else resolve();
        });
      } catch (err) {
        reject(new TransportError(`send to session ${this.id} failed`, { cause: err }));
      }
    });
  }

  authorize(serverId: string): void {
    this.authorized.add(serverId);
  }

  isAuthorized(serverId: string): boolean {
    return this.authorized.has(serverId);
  }

  authorizedServers(): string[] {
    return Array.from(this.authorized);
  }

  close(code = 1000, reason = ''): void {
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }
}

export class ConnectionSet {
  private sessions = new Set<Session>();

  add(session: Session): void {
    this.sessions.add(session);
  }

  remove(session: Session): boolean {
    return this.sessions.delete(session);
  }

  has(session: Session): boolean {
    return this.sessions.has(session);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Point-in-time copy; safe to iterate across awaits */
  snapshot(): Session[] {
    return Array.from(this.sessions);
  }

  closeAll(code: number, reason: string): void {
    for (const session of this.sessions) {
      session.close(code, reason);
    }
    this.sessions.clear();
  }
}
