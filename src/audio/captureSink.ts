import { componentLogger } from '../logger.js';
import { toError } from '../protocol/errors.js';
import { pcm16Frames } from './pcm.js';

const log = componentLogger('audio');

/** The part of a dialog session the microphone path talks to. */
export interface AudioUplink {
  sendAudio(pcm: Buffer): Promise<void>;
  closeSession(): Promise<void>;
}

export interface CaptureSinkOptions {
  channels: number;
  /** Aborting finishes the in-flight block, then closes the session. */
  signal?: AbortSignal;
  onError?: (err: Error) => void;
}

/**
 * Receives little-endian PCM16 blocks from a capture device and forwards each one
 * as an audio upload, in order, without blocking the device callback.
 */
export class CaptureSink {
  private readonly uplink: AudioUplink;
  private readonly channels: number;
  private readonly onError?: (err: Error) => void;
  private chain: Promise<void> = Promise.resolve();
  private stopped = false;
  private stopping: Promise<void> | null = null;
  private sent = 0;
  private skipped = 0;

  constructor(uplink: AudioUplink, opts: CaptureSinkOptions) {
    this.uplink = uplink;
    this.channels = opts.channels;
    this.onError = opts.onError;

    const { signal } = opts;
    if (signal?.aborted) {
      this.stopOnAbort();
    } else {
      signal?.addEventListener('abort', () => this.stopOnAbort(), { once: true });
    }
  }

  get blocksSent(): number {
    return this.sent;
  }

  get blocksSkipped(): number {
    return this.skipped;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Returns false when the block was skipped. */
  write(block: Buffer): boolean {
    if (this.stopped) {
      this.skipped += 1;
      log.warn({ event: 'capture_block_after_stop', bytes: block.length });
      return false;
    }
    if (block.length === 0 || !Number.isInteger(pcm16Frames(block, this.channels))) {
      this.skipped += 1;
      log.warn({ event: 'capture_block_misaligned', bytes: block.length, channels: this.channels });
      return false;
    }

    // devices commonly reuse their block buffer
    const pcm = Buffer.from(block);
    this.chain = this.chain.then(() => this.send(pcm));
    return true;
  }

  /** Resolves once every accepted block has been handed to the uplink. */
  whenIdle(): Promise<void> {
    return this.chain;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopped = true;
      this.stopping = this.chain.then(() => this.uplink.closeSession());
    }
    return this.stopping;
  }

  // never rejects; failures are reported and stop the sink
  private async send(pcm: Buffer) {
    if (this.stopped && !this.stopping) return;
    try {
      await this.uplink.sendAudio(pcm);
      this.sent += 1;
    } catch (err) {
      this.stopped = true;
      this.report(toError(err));
    }
  }

  private stopOnAbort() {
    this.stop().catch((err: unknown) => this.report(toError(err)));
  }

  private report(err: Error) {
    log.warn({ event: 'capture_send_failed', message: err.message });
    this.onError?.(err);
  }
}
