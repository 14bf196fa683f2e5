import type { WireErrorCode } from "../utils/errors.js";

export type FrameDirection = "read" | "write";

export type StreamIoEvent = "read" | "write" | "flush";

export type HandshakeRole = "client" | "server";

export type HandshakeResult = "ok" | "fail";
export type HandshakeReason = "protocol_error" | "io_error" | "timeout" | "canceled";

export type ProtocolObserver = {
  /** A whole message frame was written or read; messageType is the decoded variant name. */
  onFrame(direction: FrameDirection, messageType: string, payloadBytes: number): void;
  /** A received frame failed to decode. */
  onDecodeError(code: WireErrorCode): void;
  /** Raw stream traffic, reported by LoggingStream. */
  onStreamIo(event: StreamIoEvent, bytes: Uint8Array): void;
  onHandshake(role: HandshakeRole, result: HandshakeResult, reason: HandshakeReason | undefined, elapsedSeconds: number): void;
};

export type ProtocolObserverLike = Partial<ProtocolObserver>;

export const NoopObserver: ProtocolObserver = {
  onFrame: () => {},
  onDecodeError: () => {},
  onStreamIo: () => {},
  onHandshake: () => {}
};

export function normalizeObserver(observer?: ProtocolObserverLike): ProtocolObserver {
  if (observer == null) return NoopObserver;
  return {
    onFrame: observer.onFrame ?? NoopObserver.onFrame,
    onDecodeError: observer.onDecodeError ?? NoopObserver.onDecodeError,
    onStreamIo: observer.onStreamIo ?? NoopObserver.onStreamIo,
    onHandshake: observer.onHandshake ?? NoopObserver.onHandshake
  };
}

export function nowSeconds(): number {
  if (typeof performance !== "undefined" && typeof performance.now === "function") {
    return performance.now() / 1000;
  }
  return Date.now() / 1000;
}
