import { describe, expect, it } from 'vitest';
import { AudioRingBuffer } from './ringBuffer.js';
import { PlaybackSource } from './playbackSource.js';

describe('PlaybackSource', () => {
  it('serves full blocks from the ring buffer', () => {
    const ring = new AudioRingBuffer(16);
    ring.push(new Float32Array([0.25, 0.5, 0.75, 1]));
    const source = new PlaybackSource(ring, { blockFrames: 4, channels: 1 });

    expect(Array.from(source.read())).toEqual([0.25, 0.5, 0.75, 1]);
    expect(source.underruns).toBe(0);
    expect(ring.size).toBe(0);
  });

  it('zero-pads a short block into the same reused array', () => {
    const ring = new AudioRingBuffer(16);
    const source = new PlaybackSource(ring, { blockFrames: 2, channels: 2 });
    ring.push(new Float32Array([1, 1, 1, 1]));
    const first = source.read();

    ring.push(new Float32Array([0.5]));
    const second = source.read();

    expect(second).toBe(first);
    expect(Array.from(second)).toEqual([0.5, 0, 0, 0]);
    expect(source.underruns).toBe(1);

    expect(Array.from(source.read())).toEqual([0, 0, 0, 0]);
    expect(source.silentBlocks).toBe(1);
    expect(source.underruns).toBe(1);
  });

  it('offers the block as clamped little-endian pcm16', () => {
    const ring = new AudioRingBuffer(8);
    ring.push(new Float32Array([1, -1, 0.5, 2]));
    const pcm = new PlaybackSource(ring, { blockFrames: 4, channels: 1 }).readPcm16();

    expect(pcm.length).toBe(8);
    expect([0, 2, 4, 6].map((offset) => pcm.readInt16LE(offset))).toEqual([32767, -32767, 16384, 32767]);
  });

  it('counts a throwing device instead of rethrowing', () => {
    const ring = new AudioRingBuffer(4);
    const source = new PlaybackSource(ring, { blockFrames: 2, channels: 1 });

    expect(
      source.pump(() => {
        throw new Error('device unplugged');
      })
    ).toBe(false);
    expect(source.pump(() => undefined)).toBe(true);
    expect(source.deviceErrors).toBe(1);
  });

  it('rejects an empty block size', () => {
    expect(() => new PlaybackSource(new AudioRingBuffer(4), { blockFrames: 0, channels: 1 })).toThrow(RangeError);
  });
});
