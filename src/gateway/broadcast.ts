/**
 * Broadcast router — fan-out of events to every open session
 * Best effort: one serialization, one attempt per session, failed sessions evicted after the pass.
 */

import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { encodeEvent, serializeMessage, type HubEvent } from '../protocol/index.js';
import type { ConnectionSet, Session } from './sessions.js';

const log = createLogger('broadcast');

export interface BroadcastResult {
  delivered: number;
  failed: number;
}

export class BroadcastRouter {
  constructor(private connections: ConnectionSet) {}

  async sendToAll(event: HubEvent): Promise<BroadcastResult> {
    const sessions = this.connections.snapshot();
    if (sessions.length === 0) return { delivered: 0, failed: 0 };

    const data = serializeMessage(encodeEvent(event));
    const results = await Promise.allSettled(sessions.map((s) => s.send(data)));

    const failed: Session[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        failed.push(sessions[i]);
        log.debug(`${event.kind} not delivered to session ${sessions[i].id}: ${errorMessage(result.reason)}`);
      }
    });

    for (const session of failed) this.evict(session);

    return { delivered: sessions.length - failed.length, failed: failed.length };
  }

  private evict(session: Session): void {
    if (!this.connections.remove(session)) return;
    try {
      session.terminate();
    } catch (err) {
      log.debug(`terminate session ${session.id}: ${errorMessage(err)}`);
    }
  }
}
