import { describe, it, expect, beforeEach } from 'vitest';
import { presenceChanged } from '../protocol/index.js';
import { BroadcastRouter } from './broadcast.js';
import { ConnectionSet, Session, type SessionSocket } from './sessions.js';

class FakeSocket implements SessionSocket {
  readyState = 1;
  sent: string[] = [];
  terminated = false;
  failWith: Error | null = null;
  onSend: (() => void) | null = null;

  send(data: string, cb?: (err?: Error) => void): void {
    this.onSend?.();
    const err = this.failWith;
    if (!err) this.sent.push(data);
    queueMicrotask(() => cb?.(err ?? undefined));
  }

  close(): void {
    this.readyState = 3;
  }

  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }
}

const IDLE_FRAME = '{"type":"presence","server":"s1","data":{"uid":"m1","status":"idle","delete":false}}';

describe('BroadcastRouter', () => {
  let connections: ConnectionSet;
  let router: BroadcastRouter;

  function connect(): FakeSocket {
    const socket = new FakeSocket();
    connections.add(new Session(socket));
    return socket;
  }

  beforeEach(() => {
    connections = new ConnectionSet();
    router = new BroadcastRouter(connections);
  });

  it('reports nothing delivered with no sessions', async () => {
    expect(await router.sendToAll(presenceChanged('s1', 'm1', 'idle'))).toEqual({ delivered: 0, failed: 0 });
  });

  it('sends the same frame to every session', async () => {
    const sockets = [connect(), connect(), connect()];
    const result = await router.sendToAll(presenceChanged('s1', 'm1', 'idle'));
    expect(result).toEqual({ delivered: 3, failed: 0 });
    for (const s of sockets) expect(s.sent).toEqual([IDLE_FRAME]);
  });

  it('evicts failed sessions after the pass and still delivers to the rest', async () => {
    const ok1 = connect();
    const bad = connect();
    const ok2 = connect();
    bad.failWith = new Error('EPIPE');

    const result = await router.sendToAll(presenceChanged('s1', 'm1', 'idle'));

    expect(result).toEqual({ delivered: 2, failed: 1 });
    expect(ok1.sent).toEqual([IDLE_FRAME]);
    expect(ok2.sent).toEqual([IDLE_FRAME]);
    expect(bad.terminated).toBe(true);
    expect(connections.size).toBe(2);
  });

  it('counts sockets that already closed as failures', async () => {
    const closed = connect();
    closed.readyState = 3;
    connect();
    expect(await router.sendToAll(presenceChanged('s1', 'm1', 'idle'))).toEqual({ delivered: 1, failed: 1 });
    expect(connections.size).toBe(1);
  });

  it('leaves sessions that join mid-broadcast out of the pass', async () => {
    const first = connect();
    const late = new FakeSocket();
    first.onSend = () => connections.add(new Session(late));

    await router.sendToAll(presenceChanged('s1', 'm1', 'idle'));

    expect(late.sent).toEqual([]);
    expect(connections.size).toBe(2);
  });
});
