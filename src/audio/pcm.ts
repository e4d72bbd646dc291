const FLOAT32_BYTES = 4;
const PCM16_BYTES = 2;

/** Server audio arrives as little-endian IEEE-754 float32; a trailing partial sample is ignored. */
export function float32leToSamples(bytes: Buffer): Float32Array {
  const count = Math.floor(bytes.length / FLOAT32_BYTES);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i += 1) {
    samples[i] = bytes.readFloatLE(i * FLOAT32_BYTES);
  }
  return samples;
}

export function samplesToFloat32le(samples: Float32Array): Buffer {
  const out = Buffer.alloc(samples.length * FLOAT32_BYTES);
  for (let i = 0; i < samples.length; i += 1) {
    out.writeFloatLE(samples[i], i * FLOAT32_BYTES);
  }
  return out;
}

/** Clamps to [-1, 1] and scales by 32767 into `out` when given, else a new buffer. */
export function samplesToPcm16le(samples: Float32Array, out?: Buffer): Buffer {
  const target = out ?? Buffer.alloc(samples.length * PCM16_BYTES);
  if (target.length < samples.length * PCM16_BYTES) {
    throw new RangeError(`pcm16 buffer holds ${target.length} bytes, need ${samples.length * PCM16_BYTES}`);
  }
  for (let i = 0; i < samples.length; i += 1) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    target.writeInt16LE(Math.round(clamped * 0x7fff), i * PCM16_BYTES);
  }
  return target;
}

export function pcm16Frames(block: Buffer, channels: number): number {
  return block.length / (PCM16_BYTES * channels);
}
