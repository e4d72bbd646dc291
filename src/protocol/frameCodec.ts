/**
 * Frame encoding and decoding
 *
 * | ver(4b) hdrWords(4b) | type(4b) flags(4b) | ser(4b) comp(4b) | zero padding to hdrWords*4 |
 * | [sequence i32, audio kinds only] | [error code u32, Error kind only] |
 * | [event i32 | [session id len u32 + utf8] | [connect id len u32 + utf8]] |
 * | payload len u32 | payload |
 *
 * All multi-byte fields are big endian.
 */

import { gunzipSync, gzipSync } from 'fflate';
import {
  Compression,
  FLAGS_MASK,
  Serialization,
  carriesConnectId,
  carriesSessionId,
  codeToKind,
  hasEvent,
  isAudioKind,
  kindToCode,
} from './messageTypes.js';
import type { CompressionCode, MessageKind, SerializationCode } from './messageTypes.js';
import { InvalidMessageError, MalformedFrameError, UnknownMessageTypeError } from './errors.js';
import { hasSequence } from './sequence.js';
import type { SequencePolicy } from './sequence.js';

export const MAX_PAYLOAD_BYTES = 0xffff_ffff;
const FIXED_HEADER_BYTES = 3;
const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

export interface Message {
  kind: MessageKind;
  flags: number;
  event?: number;
  sessionID?: string;
  connectID?: string;
  sequence?: number;
  errorCode?: number;
  payload: Buffer;
}

export interface ProtocolConfig {
  version: number;
  headerSizeWords: number;
  serialization: SerializationCode;
  compression: CompressionCode;
  /** Upper bound for the post-compression payload; never above MAX_PAYLOAD_BYTES. */
  maxPayloadBytes?: number;
}

export const DEFAULT_PROTOCOL_CONFIG: Readonly<ProtocolConfig> = Object.freeze({
  version: 1,
  headerSizeWords: 1,
  serialization: Serialization.Json,
  compression: Compression.None,
});

export interface FrameHeader {
  version: number;
  headerSizeWords: number;
  /** Raw nibbles; peers may send codes this client has no name for. */
  serialization: number;
  compression: number;
}

export interface DecodedFrame {
  header: FrameHeader;
  message: Message;
}

function assertNibble(value: number, name: string, min = 0) {
  if (!Number.isInteger(value) || value < min || value > 0b1111) {
    throw new InvalidMessageError(`${name} must be an integer in [${min}, 15], got ${value}`);
  }
}

function assertInt32(value: number, name: string) {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new InvalidMessageError(`${name} must be a signed 32-bit integer, got ${value}`);
  }
}

function int32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32BE(value, 0);
  return buf;
}

function uint32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(value, 0);
  return buf;
}

function lengthPrefixed(bytes: Buffer): Buffer[] {
  return [uint32(bytes.length), bytes];
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function compressPayload(payload: Buffer, compression: number): Buffer {
  if (compression === Compression.Gzip && payload.length > 0) {
    return toBuffer(gzipSync(payload));
  }
  return payload;
}

function decompressPayload(payload: Buffer, compression: number): Buffer {
  if (compression !== Compression.Gzip || payload.length === 0) {
    return payload;
  }
  try {
    return toBuffer(gunzipSync(payload));
  } catch (err) {
    throw new MalformedFrameError('payload', payload.length, payload.length, {
      cause: err,
      reason: 'payload is not valid gzip data',
    });
  }
}

export function encodeMessage(
  msg: Message,
  config: ProtocolConfig = DEFAULT_PROTOCOL_CONFIG,
  sequencePolicy: SequencePolicy = hasSequence
): Buffer {
  assertNibble(config.version, 'version');
  assertNibble(config.headerSizeWords, 'headerSizeWords', 1);
  assertNibble(config.serialization, 'serialization');
  assertNibble(config.compression, 'compression');
  assertNibble(msg.flags, 'flags');

  const chunks: Buffer[] = [];

  const header = Buffer.alloc(config.headerSizeWords * 4);
  header.writeUInt8((config.version << 4) | config.headerSizeWords, 0);
  header.writeUInt8((kindToCode(msg.kind) << 4) | (msg.flags & FLAGS_MASK), 1);
  header.writeUInt8((config.serialization << 4) | config.compression, 2);
  chunks.push(header);

  const wantsSequence = sequencePolicy(msg.flags);
  if (isAudioKind(msg.kind)) {
    if (wantsSequence) {
      if (msg.sequence === undefined) {
        throw new InvalidMessageError(`flags 0b${msg.flags.toString(2)} require a sequence number`);
      }
      assertInt32(msg.sequence, 'sequence');
      chunks.push(int32(msg.sequence));
    } else if (msg.sequence !== undefined) {
      throw new InvalidMessageError('sequence given but the flags declare none');
    }
  } else if (msg.sequence !== undefined) {
    throw new InvalidMessageError(`${msg.kind} frames do not carry a sequence number`);
  }

  if (msg.kind === 'Error') {
    const code = msg.errorCode;
    if (code === undefined) {
      throw new InvalidMessageError('Error frames require an error code');
    }
    if (!Number.isInteger(code) || code < 0 || code > 0xffff_ffff) {
      throw new InvalidMessageError(`errorCode must be an unsigned 32-bit integer, got ${code}`);
    }
    chunks.push(uint32(code));
  } else if (msg.errorCode !== undefined) {
    throw new InvalidMessageError(`${msg.kind} frames do not carry an error code`);
  }

  if (hasEvent(msg.flags)) {
    if (msg.event === undefined) {
      throw new InvalidMessageError('WithEvent flag set but no event given');
    }
    assertInt32(msg.event, 'event');
    chunks.push(int32(msg.event));

    if (carriesSessionId(msg.event)) {
      if (!msg.sessionID) {
        throw new InvalidMessageError(`event ${msg.event} requires a session id`);
      }
      chunks.push(...lengthPrefixed(Buffer.from(msg.sessionID, 'utf8')));
    } else if (msg.sessionID !== undefined) {
      throw new InvalidMessageError(`event ${msg.event} does not carry a session id`);
    }
    if (carriesConnectId(msg.event)) {
      chunks.push(...lengthPrefixed(Buffer.from(msg.connectID ?? '', 'utf8')));
    } else if (msg.connectID !== undefined) {
      throw new InvalidMessageError(`event ${msg.event} does not carry a connect id`);
    }
  } else if (msg.event !== undefined) {
    throw new InvalidMessageError(`event ${msg.event} given without the WithEvent flag`);
  } else if (msg.sessionID !== undefined || msg.connectID !== undefined) {
    throw new InvalidMessageError('session and connect ids require the WithEvent flag');
  }

  const payload = compressPayload(msg.payload, config.compression);
  const limit = Math.min(config.maxPayloadBytes ?? MAX_PAYLOAD_BYTES, MAX_PAYLOAD_BYTES);
  if (payload.length > limit) {
    throw new InvalidMessageError(`payload of ${payload.length} bytes exceeds the ${limit} byte limit`);
  }
  chunks.push(uint32(payload.length));
  if (payload.length > 0) {
    chunks.push(payload);
  }

  return Buffer.concat(chunks);
}

/** Sequential big-endian reader that names the field it was reading when input runs out. */
class FrameReader {
  private offset = 0;
  private readonly data: Buffer;

  constructor(data: Buffer) {
    this.data = data;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  private need(bytes: number, field: string) {
    if (this.remaining < bytes) {
      throw new MalformedFrameError(field, bytes, this.remaining);
    }
  }

  uint8(field: string): number {
    this.need(1, field);
    const value = this.data.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  int32(field: string): number {
    this.need(4, field);
    const value = this.data.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  uint32(field: string): number {
    this.need(4, field);
    const value = this.data.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  bytes(length: number, field: string): Buffer {
    this.need(length, field);
    const value = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  string(field: string): string {
    const length = this.uint32(`${field} size`);
    return this.bytes(length, field).toString('utf8');
  }
}

export function decodeFrame(
  data: Uint8Array,
  sequencePolicy: SequencePolicy = hasSequence
): DecodedFrame {
  const buf = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const reader = new FrameReader(buf);

  const versionAndSize = reader.uint8('version and header size');
  const headerSizeWords = versionAndSize & 0b1111;
  if (headerSizeWords === 0) {
    throw new MalformedFrameError('header size', 4, reader.remaining, {
      reason: 'header size of 0 words cannot hold the fixed header',
    });
  }

  const typeAndFlags = reader.uint8('message type and flags');
  const typeCode = typeAndFlags >> 4;
  const flags = typeAndFlags & FLAGS_MASK;
  const kind = codeToKind(typeCode);
  if (!kind) {
    throw new UnknownMessageTypeError(typeCode);
  }

  const serializationAndCompression = reader.uint8('serialization and compression');
  const header: FrameHeader = {
    version: versionAndSize >> 4,
    headerSizeWords,
    serialization: serializationAndCompression >> 4,
    compression: serializationAndCompression & 0b1111,
  };

  reader.bytes(headerSizeWords * 4 - FIXED_HEADER_BYTES, 'header padding');

  const message: Message = { kind, flags, payload: Buffer.alloc(0) };

  if (isAudioKind(kind) && sequencePolicy(flags)) {
    message.sequence = reader.int32('sequence');
  }
  if (kind === 'Error') {
    message.errorCode = reader.uint32('error code');
  }
  if (hasEvent(flags)) {
    const event = reader.int32('event');
    message.event = event;
    if (carriesSessionId(event)) {
      message.sessionID = reader.string('session id');
    }
    if (carriesConnectId(event)) {
      message.connectID = reader.string('connect id');
    }
  }

  const payloadSize = reader.uint32('payload size');
  message.payload = decompressPayload(reader.bytes(payloadSize, 'payload'), header.compression);

  return { header, message };
}

export function decodeMessage(data: Uint8Array, sequencePolicy: SequencePolicy = hasSequence): Message {
  return decodeFrame(data, sequencePolicy).message;
}
