import { componentLogger } from '../logger.js';
import { ServerEvent, isConnectionEvent } from '../protocol/messageTypes.js';
import type { Message } from '../protocol/frameCodec.js';
import { ProtocolViolationError, ServerReportedError, TransportError, toError } from '../protocol/errors.js';
import {
  finishConnectionRequest,
  finishSessionRequest,
  startConnectionRequest,
  startSessionRequest,
} from './requests.js';
import type { PayloadInput } from './requests.js';

const log = componentLogger('session');

export const SESSION_STATES = [
  'Idle',
  'Connecting',
  'Connected',
  'SessionStarting',
  'SessionActive',
  'SessionFinishing',
  'Finished',
  'Aborted',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type TransitionListener = (from: SessionState, to: SessionState, reason?: string) => void;

export interface SessionStateMachineOptions {
  /** Encodes and writes one frame. Rejections abort the machine. */
  send: (message: Message) => Promise<void>;
  responseTimeoutMs: number;
}

type PendingResponse = {
  expected: number;
  /** Events this wait does not own are routed as usual instead of being checked. */
  owns: (event: number) => boolean;
  onMatch: (message: Message) => void;
  resolve: () => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
  cleanup: () => void;
};

const CLOSABLE_STATES: ReadonlySet<SessionState> = new Set(['Connected', 'SessionActive', 'SessionFinishing']);

function isTerminal(state: SessionState): boolean {
  return state === 'Finished' || state === 'Aborted';
}

/**
 * Control-plane handshake: open connection (1 -> 50), open session (100 -> 150),
 * close session (102, nothing awaited), close connection (2 -> 52).
 *
 * Inbound FullServer and Error frames are fed in by the receive loop through
 * `handleInbound`; responses complete their transition synchronously there so the
 * loop observes the new state before reading the next frame.
 */
export class SessionStateMachine {
  private current: SessionState = 'Idle';
  private sessionId: string | null = null;
  private connectId: string | null = null;
  private pending: PendingResponse | null = null;
  private closingConnection: Promise<void> | null = null;
  private failure: Error | null = null;
  private sessionEndEvent: number | null = null;
  private readonly listeners: TransitionListener[] = [];
  private readonly send: (message: Message) => Promise<void>;
  private readonly responseTimeoutMs: number;

  constructor(opts: SessionStateMachineOptions) {
    this.send = opts.send;
    this.responseTimeoutMs = opts.responseTimeoutMs;
  }

  get state(): SessionState {
    return this.current;
  }

  get activeSessionId(): string | null {
    return this.sessionId;
  }

  get connectionId(): string | null {
    return this.connectId;
  }

  /** Set once the machine is Aborted. */
  get error(): Error | null {
    return this.failure;
  }

  /** 152 or 153 when the server ended the session itself. */
  get serverEndedSessionWith(): number | null {
    return this.sessionEndEvent;
  }

  get terminal(): boolean {
    return isTerminal(this.current);
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  openConnection(signal?: AbortSignal): Promise<void> {
    this.requireState('openConnection', 'Idle');
    this.transition('Connecting');
    return this.request(startConnectionRequest(), {
      expected: ServerEvent.ConnectionStarted,
      owns: () => true,
      onMatch: (message) => {
        this.connectId = message.connectID ?? null;
        this.transition('Connected', message.connectID ? `connect id ${message.connectID}` : undefined);
      },
      signal,
    });
  }

  openSession(sessionId: string, payload: PayloadInput, signal?: AbortSignal): Promise<void> {
    this.requireState('openSession', 'Connected');
    this.sessionId = sessionId;
    this.sessionEndEvent = null;
    this.transition('SessionStarting');
    return this.request(startSessionRequest(sessionId, payload), {
      expected: ServerEvent.SessionStarted,
      owns: () => true,
      onMatch: () => this.transition('SessionActive'),
      signal,
    });
  }

  /** No-op unless a session is active; racing a server-initiated finish is safe. */
  async closeSession(): Promise<void> {
    if (this.current !== 'SessionActive' || !this.sessionId) return;
    this.transition('SessionFinishing', 'client requested');
    try {
      await this.send(finishSessionRequest(this.sessionId));
    } catch (err) {
      this.abort(toError(err));
      throw err;
    }
  }

  /** True when `closeConnection` would start or join a close rather than reject. */
  get canCloseConnection(): boolean {
    return this.closingConnection !== null || CLOSABLE_STATES.has(this.current);
  }

  /**
   * Idempotent once started: concurrent and repeated calls share one result. A call
   * made before the handshake completes rejects without blocking a later close.
   */
  closeConnection(): Promise<void> {
    if (this.closingConnection) return this.closingConnection;
    if (this.current === 'Finished') return Promise.resolve();
    if (this.failure) return Promise.reject(this.failure);
    if (!CLOSABLE_STATES.has(this.current)) {
      return Promise.reject(new Error(`cannot close the connection in state ${this.current}`));
    }
    this.closingConnection = this.runCloseConnection();
    return this.closingConnection;
  }

  private async runCloseConnection(): Promise<void> {
    if (this.current === 'SessionActive') {
      await this.closeSession();
    }
    if (this.failure) throw this.failure;
    await this.request(finishConnectionRequest(), {
      expected: ServerEvent.ConnectionFinished,
      owns: isConnectionEvent,
      onMatch: () => this.transition('Finished', 'connection finished'),
    });
  }

  /** Feeds one inbound FullServer or Error frame. */
  handleInbound(message: Message): void {
    if (this.terminal) return;

    if (message.kind === 'Error') {
      this.abort(new ServerReportedError(message.errorCode ?? 0, message.payload));
      return;
    }

    const event = message.event;
    if (event === undefined) return;

    const pending = this.pending;
    if (pending && pending.owns(event)) {
      this.pending = null;
      pending.cleanup();
      if (event === pending.expected) {
        pending.onMatch(message);
        pending.resolve();
        return;
      }
      this.abort(new ProtocolViolationError(pending.expected, event));
      return;
    }

    if (event === ServerEvent.SessionFinished || event === ServerEvent.SessionFailed) {
      this.sessionFinishedByServer(event);
    }
  }

  /** Terminal read failure or end of stream on the transport. */
  connectionLost(cause?: Error): void {
    if (this.terminal) return;
    this.abort(new TransportError('connection lost', cause ? { cause } : undefined));
  }

  abort(err: Error): void {
    if (this.terminal) return;
    this.failure = err;
    this.transition('Aborted', err.message);
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      pending.cleanup();
      pending.reject(err);
    }
  }

  private sessionFinishedByServer(event: number) {
    if (this.current !== 'SessionActive' && this.current !== 'SessionFinishing') return;
    this.sessionEndEvent = event;
    this.transition('Connected', `server finished session with ${event}`);
  }

  private request(
    message: Message,
    wait: Pick<PendingResponse, 'expected' | 'owns' | 'onMatch'> & { signal?: AbortSignal }
  ): Promise<void> {
    const { signal } = wait;
    if (signal?.aborted) {
      const err = new Error('aborted before the request was sent', { cause: signal.reason });
      this.abort(err);
      return Promise.reject(err);
    }

    const response = new Promise<void>((resolve, reject) => {
      const onAbort = () => this.abort(new Error('aborted while awaiting a response', { cause: signal?.reason }));
      const timer = setTimeout(() => {
        this.abort(
          new ProtocolViolationError(
            wait.expected,
            undefined,
            `no event ${wait.expected} within ${this.responseTimeoutMs}ms`
          )
        );
      }, this.responseTimeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        ...wait,
        resolve,
        reject,
        timer,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };
    });

    this.send(message).catch((err: unknown) => this.abort(toError(err)));
    return response;
  }

  private requireState(action: string, expected: SessionState) {
    if (this.current !== expected) {
      throw new Error(`cannot ${action} in state ${this.current}`);
    }
  }

  private transition(to: SessionState, reason?: string) {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    log.debug({ event: 'session_transition', from, to, reason, sessionId: this.sessionId });
    for (const listener of this.listeners) {
      listener(from, to, reason);
    }
  }
}
