import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { componentLogger } from '../logger.js';
import { TransportError, toError } from '../protocol/errors.js';
import { AsyncQueue } from '../utils/asyncQueue.js';
import type { Transport } from './types.js';

const DEFAULT_OPEN_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;

const log = componentLogger('transport');

export interface WebSocketTransportOptions {
  /** Passed to the handshake untouched. */
  headers?: Record<string, string>;
  openTimeoutMs?: number;
  closeTimeoutMs?: number;
}

function rawDataToBuffer(raw: RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}

export class WebSocketTransport implements Transport {
  private readonly ws: WebSocket;
  private readonly inbox = new AsyncQueue<Buffer>();
  private readonly closeTimeoutMs: number;
  private closing: Promise<void> | null = null;

  constructor(ws: WebSocket, closeTimeoutMs = DEFAULT_CLOSE_TIMEOUT_MS) {
    this.ws = ws;
    this.closeTimeoutMs = closeTimeoutMs;

    ws.on('message', (raw: RawData, isBinary: boolean) => {
      if (!isBinary) {
        log.warn({ event: 'ws_text_message_ignored' });
        return;
      }
      this.inbox.push(rawDataToBuffer(raw));
    });

    ws.on('error', (err: Error) => {
      log.warn({ event: 'ws_error', message: err.message });
      this.inbox.close(new TransportError(`websocket error: ${err.message}`, { cause: err }));
    });

    ws.on('close', (code: number, reason: Buffer) => {
      log.debug({ event: 'ws_close', code, reason: reason.toString() });
      this.inbox.close();
    });
  }

  send(frame: Buffer): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('websocket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(frame, { binary: true }, (err?: Error) => {
        if (err) {
          reject(new TransportError(`websocket send failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<Buffer | null> {
    return this.inbox.shift();
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.closeSocket();
    }
    return this.closing;
  }

  private async closeSocket(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      this.inbox.close();
      return;
    }

    const waitForClose = new Promise<void>((resolve) => {
      this.ws.once('close', () => resolve());
    });

    try {
      this.ws.close();
    } catch (err) {
      log.debug({ event: 'ws_close_error', message: toError(err).message });
    }

    let timer: NodeJS.Timeout | undefined;
    const forceClose = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        log.warn({ event: 'ws_close_timeout', timeoutMs: this.closeTimeoutMs });
        this.ws.terminate();
        resolve();
      }, this.closeTimeoutMs);
    });
    await Promise.race([waitForClose, forceClose]);
    clearTimeout(timer);
    this.inbox.close();
  }
}

export function connectWebSocketTransport(
  url: string,
  opts: WebSocketTransportOptions = {}
): Promise<WebSocketTransport> {
  const openTimeoutMs = opts.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
  const ws = new WebSocket(url, { headers: opts.headers ?? {} });

  return new Promise<WebSocketTransport>((resolve, reject) => {
    let settled = false;
    const settle = (err?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.off('error', onError);
      ws.off('close', onClose);
      if (err) {
        reject(err);
        return;
      }
      resolve(new WebSocketTransport(ws, opts.closeTimeoutMs));
    };

    const onError = (err: Error) => settle(new TransportError(`websocket connect failed: ${err.message}`, { cause: err }));
    const onClose = () => settle(new TransportError('websocket closed before open'));

    const timer = setTimeout(() => {
      ws.terminate();
      settle(new TransportError(`websocket open timed out after ${openTimeoutMs}ms`));
    }, openTimeoutMs);

    ws.once('open', () => {
      log.info({ event: 'ws_open', url });
      settle();
    });
    ws.once('error', onError);
    ws.once('close', onClose);
  });
}
