export const MESSAGE_KINDS = [
  'FullClient',
  'AudioOnlyClient',
  'FullServer',
  'AudioOnlyServer',
  'FrontEndResult',
  'Error',
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

/** 4-bit type codes carried in the high nibble of the second header byte. */
const KIND_CODES = {
  FullClient: 0b0001,
  AudioOnlyClient: 0b0010,
  FullServer: 0b1001,
  AudioOnlyServer: 0b1011,
  FrontEndResult: 0b1100,
  Error: 0b1111,
} as const satisfies Record<MessageKind, number>;

const codeToKindTable: ReadonlyMap<number, MessageKind> = new Map(
  MESSAGE_KINDS.map((kind) => [KIND_CODES[kind], kind] as const)
);

export function kindToCode(kind: MessageKind): number {
  return KIND_CODES[kind];
}

export function codeToKind(code: number): MessageKind | undefined {
  return codeToKindTable.get(code);
}

export function isAudioKind(kind: MessageKind): boolean {
  return kind === 'AudioOnlyClient' || kind === 'AudioOnlyServer';
}

/** Low nibble of the second header byte. The two low bits select sequence semantics. */
export const MessageFlags = {
  NoSeq: 0b0000,
  PositiveSeq: 0b0001,
  LastNoSeq: 0b0010,
  NegativeSeq: 0b0011,
  WithEvent: 0b0100,
} as const;

export const SEQUENCE_MASK = 0b0011;
export const FLAGS_MASK = 0b1111;

export function hasEvent(flags: number): boolean {
  return (flags & MessageFlags.WithEvent) === MessageFlags.WithEvent;
}

export const Serialization = {
  Raw: 0b0000,
  Json: 0b0001,
  Thrift: 0b0011,
  Custom: 0b1111,
} as const;

export type SerializationCode = (typeof Serialization)[keyof typeof Serialization];

export const Compression = {
  None: 0b0000,
  Gzip: 0b0001,
  Custom: 0b1111,
} as const;

export type CompressionCode = (typeof Compression)[keyof typeof Compression];

export const ClientEvent = {
  StartConnection: 1,
  FinishConnection: 2,
  StartSession: 100,
  FinishSession: 102,
  TaskRequest: 200,
  SayHello: 300,
  ChatTTSText: 500,
} as const;

export const ServerEvent = {
  ConnectionStarted: 50,
  ConnectionFailed: 51,
  ConnectionFinished: 52,
  SessionStarted: 150,
  SessionFinished: 152,
  SessionFailed: 153,
  ASRInfo: 450,
  ASRResponse: 451,
} as const;

// Connection-lifecycle events never carry a session id; the server-side
// subset carries a connect id in its place.
const CONNECTION_EVENTS: ReadonlySet<number> = new Set([1, 2, 50, 51, 52]);
const CONNECT_ID_EVENTS: ReadonlySet<number> = new Set([50, 51, 52]);

export function carriesSessionId(event: number): boolean {
  return !CONNECTION_EVENTS.has(event);
}

export function carriesConnectId(event: number): boolean {
  return CONNECT_ID_EVENTS.has(event);
}

export function isConnectionEvent(event: number): boolean {
  return CONNECTION_EVENTS.has(event);
}
