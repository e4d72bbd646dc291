import { componentLogger } from '../logger.js';
import { toError } from '../protocol/errors.js';
import { samplesToPcm16le } from './pcm.js';
import type { AudioRingBuffer } from './ringBuffer.js';

const log = componentLogger('audio');

export interface PlaybackSourceOptions {
  blockFrames: number;
  channels: number;
}

export type BlockWriter = (block: Float32Array) => void;

/**
 * Serves fixed-size output blocks from the ring buffer. The returned block is
 * reused between calls; copy it if it must outlive the next read.
 */
export class PlaybackSource {
  readonly blockSamples: number;
  private readonly ring: AudioRingBuffer;
  private readonly block: Float32Array;
  private readonly pcm: Buffer;
  private partial = 0;
  private silent = 0;
  private failures = 0;

  constructor(ring: AudioRingBuffer, opts: PlaybackSourceOptions) {
    if (!Number.isInteger(opts.blockFrames) || opts.blockFrames < 1) {
      throw new RangeError(`blockFrames must be a positive integer, got ${opts.blockFrames}`);
    }
    this.ring = ring;
    this.blockSamples = opts.blockFrames * opts.channels;
    this.block = new Float32Array(this.blockSamples);
    this.pcm = Buffer.alloc(this.blockSamples * 2);
  }

  /** Blocks that were only partly filled. */
  get underruns(): number {
    return this.partial;
  }

  /** Blocks served with no buffered audio at all. */
  get silentBlocks(): number {
    return this.silent;
  }

  get deviceErrors(): number {
    return this.failures;
  }

  read(): Float32Array {
    const filled = this.ring.pullInto(this.block);
    if (filled < this.block.length) {
      this.block.fill(0, filled);
      if (filled === 0) {
        this.silent += 1;
      } else {
        this.partial += 1;
        log.debug({ event: 'playback_underrun', filled, wanted: this.block.length });
      }
    }
    return this.block;
  }

  readPcm16(): Buffer {
    return samplesToPcm16le(this.read(), this.pcm);
  }

  /** Reads one block into `write`. A throwing device is logged and counted, never rethrown. */
  pump(write: BlockWriter): boolean {
    const block = this.read();
    try {
      write(block);
      return true;
    } catch (err) {
      this.failures += 1;
      log.warn({ event: 'playback_device_error', message: toError(err).message });
      return false;
    }
  }
}
