import { MAX_FIELD_BYTES } from "./field/codec.js";
import { PACKET_CHECKSUMS, PACKET_ENCRYPTIONS, type PacketChecksum, type PacketEncryption } from "./packet/packet.js";

// Pre-shared obfuscation constants of the login handshake. They are not secrets.
export const DEFAULT_PRIMARY_OBFUSCATION = 3214621489648854472n;
export const DEFAULT_SECONDARY_OBFUSCATION = -4214651440992349575n;

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

export type ProtocolConfig = Readonly<{
  primaryObfuscation: bigint;
  secondaryObfuscation: bigint;
  /** Per-field ceiling for decoded blobs (at most MAX_FIELD_BYTES). */
  maxFieldBytes: number;
  checksum: PacketChecksum;
  encryption: PacketEncryption;
  /** Total handshake timeout in milliseconds (0 disables). */
  handshakeTimeoutMs: number;
}>;

export type ProtocolConfigInput = Partial<ProtocolConfig>;

function assertI64(name: string, v: bigint): void {
  if (BigInt.asIntN(64, v) !== v) throw new RangeError(`${name} must fit a signed 64-bit integer`);
}

// resolveProtocolConfig fills defaults and validates every option.
export function resolveProtocolConfig(input: ProtocolConfigInput = {}): ProtocolConfig {
  const primaryObfuscation = input.primaryObfuscation ?? DEFAULT_PRIMARY_OBFUSCATION;
  const secondaryObfuscation = input.secondaryObfuscation ?? DEFAULT_SECONDARY_OBFUSCATION;
  assertI64("primaryObfuscation", primaryObfuscation);
  assertI64("secondaryObfuscation", secondaryObfuscation);

  const maxFieldBytes = input.maxFieldBytes ?? MAX_FIELD_BYTES;
  if (!Number.isSafeInteger(maxFieldBytes) || maxFieldBytes < 0 || maxFieldBytes > MAX_FIELD_BYTES) {
    throw new RangeError(`maxFieldBytes must be an integer in 0..${MAX_FIELD_BYTES}`);
  }

  const handshakeTimeoutMs = input.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
  if (!Number.isSafeInteger(handshakeTimeoutMs) || handshakeTimeoutMs < 0) {
    throw new RangeError("handshakeTimeoutMs must be >= 0");
  }

  const checksum = input.checksum ?? "none";
  if (!PACKET_CHECKSUMS.includes(checksum)) throw new RangeError(`unsupported checksum ${checksum}`);
  const encryption = input.encryption ?? "none";
  if (!PACKET_ENCRYPTIONS.includes(encryption)) throw new RangeError(`unsupported encryption ${encryption}`);

  return { primaryObfuscation, secondaryObfuscation, maxFieldBytes, checksum, encryption, handshakeTimeoutMs };
}

function parseBigIntEnv(name: string, raw: string): bigint {
  if (!/^-?\d+$/.test(raw.trim())) throw new RangeError(`${name} must be a decimal integer`);
  return BigInt(raw.trim());
}

function parseIntEnv(name: string, raw: string): number {
  const v = Number(raw.trim());
  if (raw.trim() === "" || !Number.isSafeInteger(v)) throw new RangeError(`${name} must be an integer`);
  return v;
}

function parseChoice<T extends string>(name: string, raw: string, allowed: readonly T[]): T {
  const v = allowed.find((a) => a === raw.trim());
  if (v === undefined) throw new RangeError(`${name} must be one of ${allowed.join(", ")}`);
  return v;
}

// protocolConfigFromEnv reads LOGINWIRE_* variables; unset variables keep their defaults.
//
//   LOGINWIRE_PRIMARY_OBFUSCATION, LOGINWIRE_SECONDARY_OBFUSCATION, LOGINWIRE_MAX_FIELD_BYTES,
//   LOGINWIRE_CHECKSUM, LOGINWIRE_ENCRYPTION, LOGINWIRE_HANDSHAKE_TIMEOUT_MS
export function protocolConfigFromEnv(env: Readonly<Record<string, string | undefined>>): ProtocolConfig {
  const input: { -readonly [K in keyof ProtocolConfig]?: ProtocolConfig[K] } = {};
  const primary = env["LOGINWIRE_PRIMARY_OBFUSCATION"];
  if (primary != null) input.primaryObfuscation = parseBigIntEnv("LOGINWIRE_PRIMARY_OBFUSCATION", primary);
  const secondary = env["LOGINWIRE_SECONDARY_OBFUSCATION"];
  if (secondary != null) input.secondaryObfuscation = parseBigIntEnv("LOGINWIRE_SECONDARY_OBFUSCATION", secondary);
  const maxField = env["LOGINWIRE_MAX_FIELD_BYTES"];
  if (maxField != null) input.maxFieldBytes = parseIntEnv("LOGINWIRE_MAX_FIELD_BYTES", maxField);
  const checksum = env["LOGINWIRE_CHECKSUM"];
  if (checksum != null) input.checksum = parseChoice("LOGINWIRE_CHECKSUM", checksum, PACKET_CHECKSUMS);
  const encryption = env["LOGINWIRE_ENCRYPTION"];
  if (encryption != null) input.encryption = parseChoice("LOGINWIRE_ENCRYPTION", encryption, PACKET_ENCRYPTIONS);
  const timeout = env["LOGINWIRE_HANDSHAKE_TIMEOUT_MS"];
  if (timeout != null) input.handshakeTimeoutMs = parseIntEnv("LOGINWIRE_HANDSHAKE_TIMEOUT_MS", timeout);
  return resolveProtocolConfig(input);
}
