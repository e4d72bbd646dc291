import { describe, expect, it, vi } from 'vitest';
import { CaptureSink } from './captureSink.js';
import type { AudioUplink } from './captureSink.js';

function recordingUplink() {
  const calls: string[] = [];
  const blocks: Buffer[] = [];
  const uplink = {
    sendAudio: vi.fn(async (pcm: Buffer) => {
      await new Promise<void>((resolve) => setImmediate(resolve));
      blocks.push(pcm);
      calls.push(`audio:${pcm.length}`);
    }),
    closeSession: vi.fn(async () => {
      calls.push('close');
    }),
  } satisfies AudioUplink;
  return { uplink, calls, blocks };
}

describe('CaptureSink', () => {
  it('forwards copies of accepted blocks in write order', async () => {
    const { uplink, blocks } = recordingUplink();
    const sink = new CaptureSink(uplink, { channels: 1 });
    const device = Buffer.from([1, 0, 2, 0]);

    expect(sink.write(device)).toBe(true);
    device.fill(9);
    expect(sink.write(Buffer.from([3, 0]))).toBe(true);
    await sink.whenIdle();

    expect(blocks.map((b) => [...b])).toEqual([[1, 0, 2, 0], [3, 0]]);
    expect(sink.blocksSent).toBe(2);
  });

  it('skips blocks that do not hold whole frames', async () => {
    const { uplink } = recordingUplink();
    const mono = new CaptureSink(uplink, { channels: 1 });
    const stereo = new CaptureSink(uplink, { channels: 2 });

    expect(mono.write(Buffer.alloc(3))).toBe(false);
    expect(mono.write(Buffer.alloc(0))).toBe(false);
    expect(stereo.write(Buffer.alloc(6))).toBe(false);
    expect(stereo.write(Buffer.alloc(8))).toBe(true);
    await stereo.whenIdle();

    expect(mono.blocksSkipped).toBe(2);
    expect(stereo.blocksSkipped).toBe(1);
    expect(uplink.sendAudio).toHaveBeenCalledTimes(1);
  });

  it('finishes queued blocks before closing the session on abort', async () => {
    const { uplink, calls } = recordingUplink();
    const controller = new AbortController();
    const sink = new CaptureSink(uplink, { channels: 1, signal: controller.signal });

    sink.write(Buffer.alloc(4));
    sink.write(Buffer.alloc(2));
    controller.abort();
    expect(sink.write(Buffer.alloc(2))).toBe(false);
    await sink.stop();

    expect(calls).toEqual(['audio:4', 'audio:2', 'close']);
    expect(uplink.closeSession).toHaveBeenCalledTimes(1);
    expect(sink.blocksSkipped).toBe(1);
  });

  it('stops immediately when handed an already aborted signal', async () => {
    const { uplink } = recordingUplink();
    const sink = new CaptureSink(uplink, { channels: 1, signal: AbortSignal.abort() });

    expect(sink.isStopped).toBe(true);
    expect(sink.write(Buffer.alloc(2))).toBe(false);
    await sink.stop();
    expect(uplink.closeSession).toHaveBeenCalledTimes(1);
  });

  it('reports a failed upload and refuses further blocks', async () => {
    const { uplink } = recordingUplink();
    uplink.sendAudio.mockRejectedValueOnce(new Error('socket closed'));
    const onError = vi.fn();
    const sink = new CaptureSink(uplink, { channels: 1, onError });

    sink.write(Buffer.alloc(2));
    await sink.whenIdle();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
    expect(sink.write(Buffer.alloc(2))).toBe(false);
    expect(sink.blocksSent).toBe(0);
  });
});
