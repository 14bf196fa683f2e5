import { WireError } from "../utils/errors.js";

// PacketChecksum selects the trailer appended after the handshake; only "none" exists so far.
export type PacketChecksum = "none";

// PacketEncryption selects the payload cipher after the handshake; only "none" exists so far.
export type PacketEncryption = "none";

export type PacketOptions = Readonly<{
  checksum?: PacketChecksum;
  encryption?: PacketEncryption;
}>;

export const PACKET_CHECKSUMS: readonly PacketChecksum[] = ["none"];
export const PACKET_ENCRYPTIONS: readonly PacketEncryption[] = ["none"];

export function assertPacketOptions(opts: PacketOptions): void {
  const checksum: string = opts.checksum ?? "none";
  const encryption: string = opts.encryption ?? "none";
  if (!PACKET_CHECKSUMS.some((c) => c === checksum)) {
    throw new WireError({ code: "invalid_checksum_config", message: `unsupported packet checksum ${checksum}` });
  }
  if (!PACKET_ENCRYPTIONS.some((e) => e === encryption)) {
    throw new WireError({ code: "invalid_encryption_config", message: `unsupported packet encryption ${encryption}` });
  }
}

// sealPacket runs the outbound stages (encrypt, then checksum) over an encoded message.
export function sealPacket(payload: Uint8Array, opts: PacketOptions = {}): Uint8Array {
  assertPacketOptions(opts);
  const out = payload;
  switch (opts.encryption ?? "none") {
    case "none":
      break;
  }
  switch (opts.checksum ?? "none") {
    case "none":
      break;
  }
  return out;
}

// openPacket reverses sealPacket on a received frame payload.
export function openPacket(body: Uint8Array, opts: PacketOptions = {}): Uint8Array {
  assertPacketOptions(opts);
  const out = body;
  switch (opts.checksum ?? "none") {
    case "none":
      break;
  }
  switch (opts.encryption ?? "none") {
    case "none":
      break;
  }
  return out;
}
