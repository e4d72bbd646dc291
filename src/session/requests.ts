import { ClientEvent, MessageFlags } from '../protocol/messageTypes.js';
import type { Message } from '../protocol/frameCodec.js';

const EMPTY_OBJECT = Buffer.from('{}', 'utf8');

/** Session parameters sent with StartSession. The core forwards them as opaque JSON. */
export interface StartSessionPayload {
  tts?: {
    audio_config: {
      channel: number;
      format: string;
      sample_rate: number;
    };
  };
  dialog: {
    bot_name: string;
    dialog_id?: string;
    extra?: Record<string, unknown>;
  };
}

export interface SayHelloPayload {
  content: string;
}

export interface ChatTTSTextPayload {
  start: boolean;
  end: boolean;
  content: string;
}

export type PayloadInput = Buffer | object;

export function jsonPayload(value: PayloadInput): Buffer {
  return Buffer.isBuffer(value) ? value : Buffer.from(JSON.stringify(value), 'utf8');
}

function control(event: number, payload: Buffer, sessionID?: string): Message {
  return {
    kind: 'FullClient',
    flags: MessageFlags.WithEvent,
    event,
    ...(sessionID === undefined ? {} : { sessionID }),
    payload,
  };
}

export function startConnectionRequest(): Message {
  return control(ClientEvent.StartConnection, EMPTY_OBJECT);
}

export function finishConnectionRequest(): Message {
  return control(ClientEvent.FinishConnection, EMPTY_OBJECT);
}

export function startSessionRequest(sessionId: string, payload: PayloadInput): Message {
  return control(ClientEvent.StartSession, jsonPayload(payload), sessionId);
}

export function finishSessionRequest(sessionId: string): Message {
  return control(ClientEvent.FinishSession, EMPTY_OBJECT, sessionId);
}

export function sayHelloRequest(sessionId: string, payload: SayHelloPayload | Buffer): Message {
  return control(ClientEvent.SayHello, jsonPayload(payload), sessionId);
}

export function chatTTSTextRequest(sessionId: string, payload: ChatTTSTextPayload | Buffer): Message {
  return control(ClientEvent.ChatTTSText, jsonPayload(payload), sessionId);
}

/** Microphone upload: little-endian PCM16 bytes, sent as a raw audio-only frame. */
export function audioTaskRequest(sessionId: string, pcm: Buffer): Message {
  return {
    kind: 'AudioOnlyClient',
    flags: MessageFlags.WithEvent,
    event: ClientEvent.TaskRequest,
    sessionID: sessionId,
    payload: pcm,
  };
}
