export {
  MESSAGE_KINDS,
  MessageFlags,
  Serialization,
  Compression,
  ClientEvent,
  ServerEvent,
  kindToCode,
  codeToKind,
  isAudioKind,
  hasEvent,
  carriesSessionId,
  carriesConnectId,
} from './protocol/messageTypes.js';
export type { MessageKind, SerializationCode, CompressionCode } from './protocol/messageTypes.js';
export { hasSequence } from './protocol/sequence.js';
export type { SequencePolicy } from './protocol/sequence.js';
export {
  MAX_PAYLOAD_BYTES,
  DEFAULT_PROTOCOL_CONFIG,
  encodeMessage,
  decodeFrame,
  decodeMessage,
} from './protocol/frameCodec.js';
export type { Message, ProtocolConfig, FrameHeader, DecodedFrame } from './protocol/frameCodec.js';
export {
  DialogError,
  MalformedFrameError,
  UnknownMessageTypeError,
  InvalidMessageError,
  ProtocolViolationError,
  TransportError,
  ServerReportedError,
  isDialogError,
} from './protocol/errors.js';
export type { DialogErrorCode } from './protocol/errors.js';

export { AudioRingBuffer, capacityFor } from './audio/ringBuffer.js';
export type { RingBufferHandle } from './audio/ringBuffer.js';
export { CaptureSink } from './audio/captureSink.js';
export type { AudioUplink, CaptureSinkOptions } from './audio/captureSink.js';
export { PlaybackSource } from './audio/playbackSource.js';
export type { PlaybackSourceOptions, BlockWriter } from './audio/playbackSource.js';
export { float32leToSamples, samplesToFloat32le, samplesToPcm16le } from './audio/pcm.js';

export { SessionStateMachine, SESSION_STATES } from './session/stateMachine.js';
export type { SessionState, TransitionListener } from './session/stateMachine.js';
export { DialogSession, createDialogSession, connectDialog } from './session/dialogSession.js';
export type { DialogOutcome, DialogSessionOptions } from './session/dialogSession.js';
export * from './session/requests.js';

export type { Transport } from './transport/types.js';
export { WebSocketTransport, connectWebSocketTransport } from './transport/wsTransport.js';
export type { WebSocketTransportOptions } from './transport/wsTransport.js';

export { loadConfig, reloadConfig, parseConfig, toProtocolConfig } from './config.js';
export type { AppConfig, AudioInputConfig, AudioOutputConfig } from './config.js';
export { logger } from './logger.js';
