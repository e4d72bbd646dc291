import { describe, expect, it } from 'vitest';
import { encodeMessage } from '../protocol/frameCodec.js';
import {
  audioTaskRequest,
  finishConnectionRequest,
  jsonPayload,
  sayHelloRequest,
  startConnectionRequest,
  startSessionRequest,
} from './requests.js';

describe('request builders', () => {
  it('encodes start-connection without a session id', () => {
    expect([...encodeMessage(startConnectionRequest())]).toEqual([
      0x11, 0x14, 0x10, 0x00, 0, 0, 0, 1, 0, 0, 0, 2, 0x7b, 0x7d,
    ]);
  });

  it('leaves the session id off finish-connection', () => {
    const message = finishConnectionRequest();
    expect(message.event).toBe(2);
    expect(message.sessionID).toBeUndefined();
    expect(message.payload.toString()).toBe('{}');
  });

  it('serializes session payloads as json and passes buffers through', () => {
    const start = startSessionRequest('sess-1', { dialog: { bot_name: 'tester' } });
    expect(start.sessionID).toBe('sess-1');
    expect(start.payload.toString()).toBe('{"dialog":{"bot_name":"tester"}}');

    const raw = Buffer.from('{"content":"prebuilt"}');
    expect(sayHelloRequest('sess-1', raw).payload).toBe(raw);
    expect(jsonPayload({ a: 1 }).toString()).toBe('{"a":1}');
  });

  it('builds audio uploads as audio-only task requests', () => {
    const pcm = Buffer.from([1, 0]);
    expect(audioTaskRequest('sess-1', pcm)).toEqual({
      kind: 'AudioOnlyClient',
      flags: 0b0100,
      event: 200,
      sessionID: 'sess-1',
      payload: pcm,
    });
  });
});
