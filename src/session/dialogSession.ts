import { randomUUID } from 'node:crypto';
import { componentLogger } from '../logger.js';
import type { AppConfig } from '../config.js';
import { toProtocolConfig } from '../config.js';
import { AudioRingBuffer } from '../audio/ringBuffer.js';
import { CaptureSink } from '../audio/captureSink.js';
import type { AudioUplink } from '../audio/captureSink.js';
import { PlaybackSource } from '../audio/playbackSource.js';
import { float32leToSamples } from '../audio/pcm.js';
import { DEFAULT_PROTOCOL_CONFIG, decodeMessage, encodeMessage } from '../protocol/frameCodec.js';
import type { Message, ProtocolConfig } from '../protocol/frameCodec.js';
import { Serialization, ServerEvent } from '../protocol/messageTypes.js';
import { hasSequence } from '../protocol/sequence.js';
import type { SequencePolicy } from '../protocol/sequence.js';
import { TransportError, isDialogError, toError } from '../protocol/errors.js';
import type { Transport } from '../transport/types.js';
import { connectWebSocketTransport } from '../transport/wsTransport.js';
import {
  audioTaskRequest,
  chatTTSTextRequest,
  finishConnectionRequest,
  finishSessionRequest,
  sayHelloRequest,
} from './requests.js';
import type { ChatTTSTextPayload, PayloadInput, SayHelloPayload } from './requests.js';
import { SessionStateMachine } from './stateMachine.js';
import type { SessionState } from './stateMachine.js';

const log = componentLogger('session');

export interface DialogOutcome {
  state: Extract<SessionState, 'Finished' | 'Aborted'>;
  reason?: string;
  error?: Error;
}

export interface DialogSessionOptions {
  transport: Transport;
  ring: AudioRingBuffer;
  responseTimeoutMs: number;
  protocol?: ProtocolConfig;
  sequencePolicy?: SequencePolicy;
  sessionId?: string;
  playback?: { blockFrames: number; channels: number };
  captureChannels?: number;
}

type Listener<T> = (value: T) => void;

// states in which the server still holds an open connection worth saying goodbye to
const GOODBYE_STATES: ReadonlySet<SessionState> = new Set(['Connected', 'SessionActive', 'SessionFinishing']);

/**
 * One connection to the dialogue service: handshake, receive loop, audio routing
 * and teardown. Create a new instance per connection.
 */
export class DialogSession implements AudioUplink {
  readonly sessionId: string;
  readonly ring: AudioRingBuffer;
  /** Settles once the receive loop has stopped and the transport is closed. */
  readonly done: Promise<DialogOutcome>;

  private readonly transport: Transport;
  private readonly machine: SessionStateMachine;
  private readonly protocol: ProtocolConfig;
  private readonly audioProtocol: ProtocolConfig;
  private readonly sequencePolicy: SequencePolicy;
  private readonly playbackShape: { blockFrames: number; channels: number };
  private readonly captureChannels: number;
  private readonly eventListeners: Listener<Message>[] = [];
  private readonly audioListeners: Listener<Float32Array>[] = [];
  private readonly errorListeners: Listener<Error>[] = [];
  private readonly closeListeners: Listener<DialogOutcome>[] = [];
  private loop: Promise<void> | null = null;
  private finishing: Promise<void> | null = null;
  private transportClosing: Promise<void> | null = null;
  private tearingDown: Promise<void> | null = null;

  constructor(opts: DialogSessionOptions) {
    this.transport = opts.transport;
    this.ring = opts.ring;
    this.sessionId = opts.sessionId ?? randomUUID();
    this.protocol = opts.protocol ?? DEFAULT_PROTOCOL_CONFIG;
    this.audioProtocol = { ...this.protocol, serialization: Serialization.Raw };
    this.sequencePolicy = opts.sequencePolicy ?? hasSequence;
    this.playbackShape = opts.playback ?? { blockFrames: 512, channels: 1 };
    this.captureChannels = opts.captureChannels ?? 1;

    this.machine = new SessionStateMachine({
      send: (message) => this.sendMessage(message),
      responseTimeoutMs: opts.responseTimeoutMs,
    });
    this.machine.onTransition((from, to) => {
      if (to === 'Aborted') this.handleAbort(from);
    });

    this.done = new Promise<DialogOutcome>((resolve, reject) => {
      this.closeListeners.push((outcome) => {
        if (outcome.error) {
          reject(outcome.error);
        } else {
          resolve(outcome);
        }
      });
    });
    // callers that only use onClose/onError need not observe `done`
    this.done.catch((err: unknown) => log.debug({ event: 'dialog_done_rejected', message: toError(err).message }));
  }

  get state(): SessionState {
    return this.machine.state;
  }

  get connectionId(): string | null {
    return this.machine.connectionId;
  }

  onEvent(listener: Listener<Message>): void {
    this.eventListeners.push(listener);
  }

  onAudio(listener: Listener<Float32Array>): void {
    this.audioListeners.push(listener);
  }

  onError(listener: Listener<Error>): void {
    this.errorListeners.push(listener);
  }

  onClose(listener: Listener<DialogOutcome>): void {
    this.closeListeners.push(listener);
  }

  /** Opens the connection and the session. On failure the transport is closed before rejecting. */
  async start(payload: PayloadInput, signal?: AbortSignal): Promise<void> {
    if (this.loop) {
      throw new Error('dialog session already started');
    }
    this.loop = this.receiveLoop();
    try {
      await this.machine.openConnection(signal);
      await this.machine.openSession(this.sessionId, payload, signal);
      log.info({ event: 'dialog_session_started', sessionId: this.sessionId, connectId: this.connectionId });
    } catch (err) {
      this.machine.abort(toError(err));
      await this.loop;
      throw err;
    }
  }

  sayHello(payload: SayHelloPayload | Buffer): Promise<void> {
    return this.sendInSession('sayHello', sayHelloRequest(this.sessionId, payload));
  }

  chatTTSText(payload: ChatTTSTextPayload | Buffer): Promise<void> {
    return this.sendInSession('chatTTSText', chatTTSTextRequest(this.sessionId, payload));
  }

  /** Uploads one block of little-endian PCM16 microphone audio. */
  sendAudio(pcm: Buffer): Promise<void> {
    return this.sendInSession('sendAudio', audioTaskRequest(this.sessionId, pcm));
  }

  closeSession(): Promise<void> {
    return this.machine.closeSession();
  }

  /** Closes the session and the connection. Repeated and concurrent calls share one result. */
  finish(): Promise<void> {
    if (!this.finishing) {
      if (!this.loop) {
        return Promise.reject(new Error('dialog session was never started'));
      }
      if (!this.machine.terminal && !this.machine.canCloseConnection) {
        return Promise.reject(new Error(`cannot finish in state ${this.machine.state}`));
      }
      this.finishing = this.runFinish();
    }
    return this.finishing;
  }

  capture(opts: { signal?: AbortSignal; onError?: (err: Error) => void } = {}): CaptureSink {
    return new CaptureSink(this, { channels: this.captureChannels, ...opts });
  }

  playback(): PlaybackSource {
    return new PlaybackSource(this.ring, this.playbackShape);
  }

  private async runFinish() {
    if (!this.machine.terminal) {
      await this.machine.closeConnection();
    }
    await this.loop;
  }

  private async sendInSession(action: string, message: Message) {
    if (this.machine.state !== 'SessionActive') {
      throw new Error(`cannot ${action} in state ${this.machine.state}`);
    }
    try {
      await this.sendMessage(message);
    } catch (err) {
      if (isDialogError(err, 'TRANSPORT_ERROR')) this.machine.abort(err);
      throw err;
    }
  }

  private async sendMessage(message: Message) {
    const config = message.kind === 'AudioOnlyClient' ? this.audioProtocol : this.protocol;
    const frame = encodeMessage(message, config, this.sequencePolicy);
    try {
      await this.transport.send(frame);
    } catch (err) {
      throw isDialogError(err) ? err : new TransportError('send failed', { cause: err });
    }
  }

  private async receiveLoop() {
    while (!this.machine.terminal) {
      let frame: Buffer | null;
      try {
        frame = await this.transport.receive();
      } catch (err) {
        this.machine.connectionLost(toError(err));
        break;
      }
      if (frame === null) {
        this.machine.connectionLost();
        break;
      }

      let message: Message;
      try {
        message = decodeMessage(frame, this.sequencePolicy);
      } catch (err) {
        log.warn({ event: 'frame_decode_failed', message: toError(err).message, bytes: frame.length });
        this.machine.abort(toError(err));
        break;
      }
      this.route(message);
    }

    await (this.tearingDown ?? this.closeTransport());
    const error = this.machine.error;
    const outcome: DialogOutcome = error
      ? { state: 'Aborted', reason: error.message, error }
      : { state: 'Finished', reason: 'connection finished' };
    log.info({ event: 'dialog_session_closed', sessionId: this.sessionId, state: outcome.state, reason: outcome.reason });
    this.emit(this.closeListeners, outcome);
  }

  private route(message: Message) {
    switch (message.kind) {
      case 'AudioOnlyServer': {
        const samples = float32leToSamples(message.payload);
        const dropped = this.ring.push(samples);
        if (dropped > 0) {
          log.warn({ event: 'playback_overflow', dropped, capacity: this.ring.capacity });
        }
        this.emit(this.audioListeners, samples);
        return;
      }
      case 'FullServer':
        if (message.event === ServerEvent.ASRInfo) {
          // the user started talking over playback
          this.ring.clear();
        }
        this.machine.handleInbound(message);
        this.emit(this.eventListeners, message);
        return;
      case 'Error':
        this.machine.handleInbound(message);
        return;
      case 'FrontEndResult':
        this.emit(this.eventListeners, message);
        return;
      default:
        log.warn({ event: 'unexpected_client_frame', kind: message.kind });
    }
  }

  private handleAbort(previous: SessionState) {
    const error = this.machine.error;
    if (error) {
      log.warn({ event: 'dialog_session_aborted', sessionId: this.sessionId, from: previous, message: error.message });
      this.emit(this.errorListeners, error);
    }
    this.tearingDown = this.teardown(previous, error);
  }

  private async teardown(previous: SessionState, error: Error | null) {
    if (error instanceof TransportError && GOODBYE_STATES.has(previous)) {
      const goodbye =
        previous === 'SessionActive'
          ? [finishSessionRequest(this.sessionId), finishConnectionRequest()]
          : [finishConnectionRequest()];
      for (const message of goodbye) {
        try {
          await this.sendMessage(message);
        } catch (err) {
          log.debug({ event: 'teardown_send_failed', frameEvent: message.event, message: toError(err).message });
        }
      }
    }
    await this.closeTransport();
  }

  private closeTransport(): Promise<void> {
    if (!this.transportClosing) {
      this.transportClosing = this.transport.close().catch((err: unknown) => {
        log.warn({ event: 'transport_close_failed', message: toError(err).message });
      });
    }
    return this.transportClosing;
  }

  private emit<T>(listeners: Listener<T>[], value: T) {
    for (const listener of listeners) {
      try {
        listener(value);
      } catch (err) {
        log.warn({ event: 'listener_failed', message: toError(err).message });
      }
    }
  }
}

export function createDialogSession(config: AppConfig, transport: Transport): DialogSession {
  const output = config.audio.output;
  return new DialogSession({
    transport,
    ring: AudioRingBuffer.forDuration(output.sampleRate, output.maxBufferedSeconds),
    responseTimeoutMs: config.session.responseTimeoutMs,
    protocol: toProtocolConfig(config.protocol),
    playback: { blockFrames: output.blockFrames, channels: output.channels },
    captureChannels: config.audio.input.channels,
  });
}

export async function connectDialog(config: AppConfig): Promise<DialogSession> {
  const { url, headers, openTimeoutMs } = config.transport;
  if (!url) {
    throw new Error('transport.url is not configured (set it in config.json or DIALOG_WS_URL)');
  }
  const transport = await connectWebSocketTransport(url, {
    headers,
    openTimeoutMs,
    closeTimeoutMs: config.session.closeTimeoutMs,
  });
  return createDialogSession(config, transport);
}
