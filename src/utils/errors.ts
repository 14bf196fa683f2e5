export class TimeoutError extends Error {
  constructor(message = "timeout") {
    super(message);
    this.name = "TimeoutError";
  }
}

export class AbortError extends Error {
  constructor(message = "aborted") {
    super(message);
    this.name = "AbortError";
  }
}

// StreamEOFError marks a short read on the underlying byte stream.
//
// It is an I/O failure and never a protocol failure: callers can tell a closed
// connection apart from a malformed frame by checking for WireError first.
export class StreamEOFError extends Error {
  constructor(message = "eof") {
    super(message);
    this.name = "StreamEOFError";
  }
}

export type WireErrorCode =
  | "truncated"
  | "invalid_length"
  | "size_limit_exceeded"
  | "length_overflow"
  | "value_out_of_range"
  | "empty_message"
  | "unknown_opcode"
  | "invalid_opcode"
  | "duplicate_opcode"
  | "type_mismatch"
  | "message_too_large"
  | "invalid_frame_length"
  | "invalid_checksum_config"
  | "invalid_encryption_config"
  | "timestamp_out_of_range";

// WireError is the single failure type of the codec and framing layers.
export class WireError extends Error {
  readonly code: WireErrorCode;
  /** Field name for field-level failures. */
  readonly field?: string;
  /** Raw opcode byte (0..255) for unknown_opcode. */
  readonly opcode?: number;

  constructor(args: Readonly<{ code: WireErrorCode; message?: string; field?: string; opcode?: number }>) {
    const where = args.field != null ? ` (field ${args.field})` : "";
    const prefix = `${args.code}${where}`;
    const message = args.message != null && args.message !== "" ? `${prefix}: ${args.message}` : prefix;
    super(message);
    this.name = "WireError";
    this.code = args.code;
    if (args.field !== undefined) this.field = args.field;
    if (args.opcode !== undefined) this.opcode = args.opcode;
  }
}

export type HandshakeErrorCode =
  | "unexpected_message"
  | "already_progressed"
  | "invalid_public_key"
  | "invalid_signature"
  | "signature_mismatch";

export class HandshakeError extends Error {
  readonly code: HandshakeErrorCode;
  override readonly cause?: unknown;

  constructor(code: HandshakeErrorCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "HandshakeError";
    this.code = code;
    if (cause !== undefined) this.cause = cause;
  }
}

export function isTimeoutError(e: unknown): e is TimeoutError {
  return e instanceof TimeoutError;
}

export function isAbortError(e: unknown): e is AbortError {
  return e instanceof AbortError;
}

export function isStreamEOFError(e: unknown): e is StreamEOFError {
  return e instanceof StreamEOFError;
}

export function isWireError(e: unknown, code?: WireErrorCode): e is WireError {
  return e instanceof WireError && (code == null || e.code === code);
}

export function isHandshakeError(e: unknown, code?: HandshakeErrorCode): e is HandshakeError {
  return e instanceof HandshakeError && (code == null || e.code === code);
}

export function throwIfAborted(signal?: AbortSignal, message?: string): void {
  if (signal?.aborted) throw new AbortError(message);
}
