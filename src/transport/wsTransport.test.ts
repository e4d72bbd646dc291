import { afterEach, describe, expect, it, vi } from 'vitest';
import type { EventEmitter } from 'node:events';
import type { Mock } from 'vitest';
import { TransportError } from '../protocol/errors.js';
import { connectWebSocketTransport } from './wsTransport.js';

interface FakeSocket extends EventEmitter {
  url: string;
  opts: { headers?: Record<string, string> };
  readyState: number;
  sent: Buffer[];
  failNextSend: Error | null;
  send: Mock;
  close: Mock;
  terminate: Mock;
}

const wsState = vi.hoisted(() => ({ instances: [] as FakeSocket[] }));

vi.mock('ws', async () => {
  const { EventEmitter } = await import('node:events');
  class FakeWebSocket extends EventEmitter {
    static OPEN = 1;
    static CLOSED = 3;
    url: string;
    opts: { headers?: Record<string, string> };
    readyState = 0;
    sent: Buffer[] = [];
    failNextSend: Error | null = null;
    send = vi.fn((data: Buffer, _opts: unknown, cb?: (err?: Error) => void) => {
      const failure = this.failNextSend;
      this.failNextSend = null;
      if (!failure) this.sent.push(data);
      cb?.(failure ?? undefined);
    });
    close = vi.fn(() => {
      this.readyState = FakeWebSocket.CLOSED;
      this.emit('close', 1000, Buffer.from('bye'));
    });
    terminate = vi.fn(() => {
      this.readyState = FakeWebSocket.CLOSED;
    });

    constructor(url: string, opts: { headers?: Record<string, string> }) {
      super();
      this.url = url;
      this.opts = opts;
      wsState.instances.push(this);
    }
  }
  return { WebSocket: FakeWebSocket };
});

function latestSocket(): FakeSocket {
  const ws = wsState.instances.at(-1);
  if (!ws) throw new Error('no socket created');
  return ws;
}

async function openTransport(closeTimeoutMs?: number) {
  const pending = connectWebSocketTransport('wss://dialog.example.test/ws', { closeTimeoutMs });
  const ws = latestSocket();
  ws.readyState = 1;
  ws.emit('open');
  return { transport: await pending, ws };
}

afterEach(() => {
  wsState.instances.length = 0;
  vi.useRealTimers();
});

describe('connectWebSocketTransport', () => {
  it('passes handshake headers through and resolves on open', async () => {
    const pending = connectWebSocketTransport('wss://dialog.example.test/ws', {
      headers: { 'X-Trace-Id': 'trace-1' },
    });
    const ws = latestSocket();
    expect(ws.url).toBe('wss://dialog.example.test/ws');
    expect(ws.opts).toEqual({ headers: { 'X-Trace-Id': 'trace-1' } });

    ws.readyState = 1;
    ws.emit('open');
    await expect(pending).resolves.toBeDefined();
  });

  it('rejects with a TransportError when the socket fails to connect', async () => {
    const pending = connectWebSocketTransport('wss://dialog.example.test/ws');
    latestSocket().emit('error', new Error('connection refused'));

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(pending).rejects.toThrow('websocket connect failed: connection refused');
  });

  it('terminates and rejects when open takes too long', async () => {
    vi.useFakeTimers();
    const pending = connectWebSocketTransport('wss://dialog.example.test/ws', { openTimeoutMs: 50 });
    const assertion = expect(pending).rejects.toThrow('websocket open timed out after 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
    expect(latestSocket().terminate).toHaveBeenCalledTimes(1);
  });
});

describe('WebSocketTransport', () => {
  it('queues binary frames in arrival order and ignores text', async () => {
    const { transport, ws } = await openTransport();
    ws.emit('message', Buffer.from([1]), true);
    ws.emit('message', Buffer.from('{"hello":true}'), false);
    ws.emit('message', [Buffer.from([2]), Buffer.from([3])], true);

    expect([...((await transport.receive()) ?? [])]).toEqual([1]);
    expect([...((await transport.receive()) ?? [])]).toEqual([2, 3]);
  });

  it('reports closed with null once the socket closes', async () => {
    const { transport, ws } = await openTransport();
    const pending = transport.receive();
    ws.emit('close', 1000, Buffer.from(''));
    await expect(pending).resolves.toBeNull();
  });

  it('turns socket errors into a TransportError on receive', async () => {
    const { transport, ws } = await openTransport();
    ws.emit('error', new Error('reset by peer'));
    await expect(transport.receive()).rejects.toThrow('websocket error: reset by peer');
  });

  it('sends frames as binary and wraps send failures', async () => {
    const { transport, ws } = await openTransport();
    await transport.send(Buffer.from([0x11, 0x14]));
    expect(ws.sent).toHaveLength(1);
    expect(ws.send.mock.calls[0]?.[1]).toEqual({ binary: true });

    ws.failNextSend = new Error('write EPIPE');
    await expect(transport.send(Buffer.from([0]))).rejects.toThrow('websocket send failed: write EPIPE');
  });

  it('refuses to send on a socket that is not open', async () => {
    const { transport, ws } = await openTransport();
    ws.readyState = 3;
    await expect(transport.send(Buffer.from([0]))).rejects.toBeInstanceOf(TransportError);
  });

  it('closes once and then reports closed to readers', async () => {
    const { transport, ws } = await openTransport();
    await transport.close();
    await transport.close();

    expect(ws.close).toHaveBeenCalledTimes(1);
    await expect(transport.receive()).resolves.toBeNull();
  });

  it('terminates a socket that never finishes the close handshake', async () => {
    const { transport, ws } = await openTransport(20);
    ws.close.mockImplementation(() => undefined);
    vi.useFakeTimers();

    const closing = transport.close();
    await vi.advanceTimersByTimeAsync(20);
    await closing;
    expect(ws.terminate).toHaveBeenCalledTimes(1);
  });
});
