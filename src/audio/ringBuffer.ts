/**
 * Fixed-capacity FIFO of float samples shared by one producer and one consumer.
 *
 * Storage and indices live in SharedArrayBuffers so the consumer may run on a
 * worker thread (see `handle` / `attach`). Every push and pull takes a spin lock
 * word through Atomics for the index update and the copy only; neither call waits
 * for data or for space.
 *
 * State layout (Int32Array):
 * | 0 LOCK | 1 HEAD | 2 LENGTH | 3 DROPPED (low 31 bits wrap) |
 */

const LOCK = 0;
const HEAD = 1;
const LENGTH = 2;
const DROPPED = 3;
const STATE_SLOTS = 4;

const UNLOCKED = 0;
const LOCKED = 1;

export interface RingBufferHandle {
  samples: SharedArrayBuffer;
  state: SharedArrayBuffer;
}

export function capacityFor(sampleRate: number, maxBufferedSeconds: number): number {
  const capacity = Math.floor(sampleRate * maxBufferedSeconds);
  if (!Number.isFinite(capacity) || capacity < 1) {
    throw new RangeError(`ring buffer capacity must be positive, got ${capacity}`);
  }
  return capacity;
}

export class AudioRingBuffer {
  readonly capacity: number;
  readonly handle: RingBufferHandle;
  private readonly storage: Float32Array;
  private readonly state: Int32Array;

  constructor(capacity: number, handle?: RingBufferHandle) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    const samples = handle?.samples ?? new SharedArrayBuffer(capacity * Float32Array.BYTES_PER_ELEMENT);
    const state = handle?.state ?? new SharedArrayBuffer(STATE_SLOTS * Int32Array.BYTES_PER_ELEMENT);
    if (samples.byteLength !== capacity * Float32Array.BYTES_PER_ELEMENT) {
      throw new RangeError('shared sample storage does not match the capacity');
    }
    this.handle = { samples, state };
    this.storage = new Float32Array(samples);
    this.state = new Int32Array(state);
  }

  static forDuration(sampleRate: number, maxBufferedSeconds: number): AudioRingBuffer {
    return new AudioRingBuffer(capacityFor(sampleRate, maxBufferedSeconds));
  }

  /** Opens a second view over a buffer created in another thread. */
  static attach(handle: RingBufferHandle): AudioRingBuffer {
    return new AudioRingBuffer(handle.samples.byteLength / Float32Array.BYTES_PER_ELEMENT, handle);
  }

  get size(): number {
    return Atomics.load(this.state, LENGTH);
  }

  /** Samples discarded by overflow since construction or the last `clear`. */
  get droppedSamples(): number {
    return Atomics.load(this.state, DROPPED);
  }

  private lock() {
    while (Atomics.compareExchange(this.state, LOCK, UNLOCKED, LOCKED) !== UNLOCKED) {
      // holders only copy and update indices
    }
  }

  private unlock() {
    Atomics.store(this.state, LOCK, UNLOCKED);
  }

  /**
   * Appends at the tail. When the result would exceed capacity the oldest samples
   * are discarded so the most recent `capacity` remain. Returns how many were dropped.
   */
  push(samples: Float32Array): number {
    const incoming = samples.length;
    if (incoming === 0) return 0;
    const cap = this.capacity;

    this.lock();
    try {
      const head = this.state[HEAD];
      const length = this.state[LENGTH];
      let dropped: number;

      if (incoming >= cap) {
        this.storage.set(samples.subarray(incoming - cap));
        dropped = length + incoming - cap;
        this.state[HEAD] = 0;
        this.state[LENGTH] = cap;
      } else {
        const tail = (head + length) % cap;
        const firstPart = Math.min(incoming, cap - tail);
        this.storage.set(samples.subarray(0, firstPart), tail);
        if (firstPart < incoming) {
          this.storage.set(samples.subarray(firstPart), 0);
        }
        const total = length + incoming;
        dropped = Math.max(0, total - cap);
        this.state[HEAD] = (head + dropped) % cap;
        this.state[LENGTH] = total - dropped;
      }

      if (dropped > 0) {
        this.state[DROPPED] = (this.state[DROPPED] + dropped) & 0x7fff_ffff;
      }
      return dropped;
    } finally {
      this.unlock();
    }
  }

  /**
   * Moves up to `dest.length` samples from the head into `dest`, oldest first,
   * and returns the count. The remainder of `dest` is left untouched.
   */
  pullInto(dest: Float32Array): number {
    if (dest.length === 0) return 0;
    const cap = this.capacity;

    this.lock();
    try {
      const head = this.state[HEAD];
      const length = this.state[LENGTH];
      const count = Math.min(dest.length, length);
      if (count === 0) return 0;

      const firstPart = Math.min(count, cap - head);
      dest.set(this.storage.subarray(head, head + firstPart));
      if (firstPart < count) {
        dest.set(this.storage.subarray(0, count - firstPart), firstPart);
      }
      this.state[HEAD] = (head + count) % cap;
      this.state[LENGTH] = length - count;
      return count;
    } finally {
      this.unlock();
    }
  }

  /** Removes up to `n` samples; a shorter result means the buffer ran dry. */
  pull(n: number): Float32Array {
    const out = new Float32Array(Math.max(0, Math.min(Math.floor(n), this.size)));
    const count = this.pullInto(out);
    return count === out.length ? out : out.subarray(0, count);
  }

  clear(): void {
    this.lock();
    try {
      this.state[HEAD] = 0;
      this.state[LENGTH] = 0;
      this.state[DROPPED] = 0;
    } finally {
      this.unlock();
    }
  }
}
