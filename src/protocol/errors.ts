export type DialogErrorCode =
  | 'MALFORMED_FRAME'
  | 'UNKNOWN_MESSAGE_TYPE'
  | 'INVALID_MESSAGE'
  | 'PROTOCOL_VIOLATION'
  | 'TRANSPORT_ERROR'
  | 'SERVER_REPORTED_ERROR';

export class DialogError extends Error {
  readonly code: DialogErrorCode;

  constructor(code: DialogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DialogError';
    this.code = code;
  }
}

/** Input ended before the field being read was complete. Frames cannot be resynchronized. */
export class MalformedFrameError extends DialogError {
  readonly field: string;
  readonly needed: number;
  readonly remaining: number;

  constructor(
    field: string,
    needed: number,
    remaining: number,
    options?: { cause?: unknown; reason?: string }
  ) {
    super(
      'MALFORMED_FRAME',
      `malformed frame: ${options?.reason ?? `reading ${field} needs ${needed} bytes, ${remaining} remaining`}`,
      { cause: options?.cause }
    );
    this.name = 'MalformedFrameError';
    this.field = field;
    this.needed = needed;
    this.remaining = remaining;
  }
}

export class UnknownMessageTypeError extends DialogError {
  readonly typeCode: number;

  constructor(typeCode: number) {
    super('UNKNOWN_MESSAGE_TYPE', `unknown message type bits: ${typeCode.toString(2).padStart(4, '0')}`);
    this.name = 'UnknownMessageTypeError';
    this.typeCode = typeCode;
  }
}

export class InvalidMessageError extends DialogError {
  constructor(message: string) {
    super('INVALID_MESSAGE', message);
    this.name = 'InvalidMessageError';
  }
}

export class ProtocolViolationError extends DialogError {
  readonly expected: number;
  readonly received?: number;

  constructor(expected: number, received: number | undefined, message?: string) {
    super(
      'PROTOCOL_VIOLATION',
      message ??
        (received === undefined
          ? `expected event ${expected}, got none`
          : `expected event ${expected}, got ${received}`)
    );
    this.name = 'ProtocolViolationError';
    this.expected = expected;
    this.received = received;
  }
}

export class TransportError extends DialogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
    this.name = 'TransportError';
  }
}

export class ServerReportedError extends DialogError {
  readonly errorCode: number;
  readonly payload: Buffer;

  constructor(errorCode: number, payload: Buffer) {
    super('SERVER_REPORTED_ERROR', `server error ${errorCode}: ${payload.toString('utf8')}`);
    this.name = 'ServerReportedError';
    this.errorCode = errorCode;
    this.payload = payload;
  }
}

export function isDialogError(err: unknown, code?: DialogErrorCode): err is DialogError {
  if (!(err instanceof DialogError)) return false;
  return code === undefined || err.code === code;
}

export function toError(err: unknown, fallbackMessage = 'unknown error'): Error {
  if (err instanceof Error) return err;
  if (typeof err === 'string') return new Error(err);
  try {
    return new Error(JSON.stringify(err));
  } catch {
    return new Error(fallbackMessage);
  }
}
