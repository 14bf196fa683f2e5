export { field, INT_SPECS } from "./field/kinds.js";
export type {
  BytesFieldKind,
  FieldDescriptor,
  FieldKind,
  FieldValue,
  IntFieldKind,
  IntKind,
  IntValue,
  StructOf
} from "./field/kinds.js";
export { defineStruct, deserializeField, serializeField, MAX_FIELD_BYTES } from "./field/codec.js";
export type { DecodeOptions, StructCodec } from "./field/codec.js";
export { ByteCursor, ByteWriter } from "./field/cursor.js";

export { defineMessage, isUnknownMessage, UNKNOWN } from "./message/types.js";
export type { Envelope, MessageType, MessageValue, UnknownMessage } from "./message/types.js";
export { defineUnion } from "./message/codec.js";
export type { MessageCodec, UnionMessage } from "./message/codec.js";

export { encodeFrame, decodeFrameLength, readFrame, writeFrame, MAX_FRAME_LEN, MAX_FRAME_PAYLOAD } from "./framing/frame.js";
export type { DuplexStream } from "./framing/frame.js";
export { ByteReader } from "./framing/byteReader.js";
export { MessageStream } from "./framing/messageStream.js";
export type { MessageStreamOptions } from "./framing/messageStream.js";
export { LoggingStream, hexDumpObserver, formatStreamIo } from "./framing/loggingStream.js";
export { createMemoryPipe, memoryStreamFrom, MemoryStream } from "./framing/memoryStream.js";

export { sealPacket, openPacket } from "./packet/packet.js";
export type { PacketChecksum, PacketEncryption, PacketOptions } from "./packet/packet.js";

export { ClientHello, ClientReady, Login, LoginWithUnknown, ServerHello } from "./login/messages.js";
export type { LoginMessage, LoginWithUnknownMessage } from "./login/messages.js";
export { checksumSelector, checksumSize } from "./login/checksum.js";
export type { ChecksumSelector } from "./login/checksum.js";
export { clientHelloDate, clientHelloIntegrity, clientHelloTimestamp, createClientHello, randomI64 } from "./login/obfuscation.js";
export { HandshakeSession } from "./login/session.js";
export type { CompletedHandshake, HandshakePhase } from "./login/session.js";
export { clientHandshake, serverHandshake, verifyServerHello } from "./login/handshake.js";
export type { ClientHandshakeOptions, ClientHandshakeResult, ServerHandshakeOptions, ServerHandshakeResult } from "./login/handshake.js";
export { p256Keys } from "./login/keys.js";
export type { KeyPair, KeyProvider } from "./login/keys.js";

export {
  DEFAULT_PRIMARY_OBFUSCATION,
  DEFAULT_SECONDARY_OBFUSCATION,
  protocolConfigFromEnv,
  resolveProtocolConfig
} from "./config.js";
export type { ProtocolConfig, ProtocolConfigInput } from "./config.js";

export { NoopObserver, normalizeObserver } from "./observability/observer.js";
export type { ProtocolObserver, ProtocolObserverLike } from "./observability/observer.js";
export { formatHexDump } from "./utils/hexdump.js";
export {
  AbortError,
  HandshakeError,
  StreamEOFError,
  TimeoutError,
  WireError,
  isHandshakeError,
  isStreamEOFError,
  isWireError
} from "./utils/errors.js";
export type { HandshakeErrorCode, WireErrorCode } from "./utils/errors.js";
