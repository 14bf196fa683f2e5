import { WireError } from "../utils/errors.js";

// ChecksumSelector is the checksum negotiated by ServerHello.
//
// The selector byte for crc16 is 1 even though a CRC16 trailer is 2 bytes wide; the byte is
// a code, not a size, for that variant.
export type ChecksumSelector =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "crc16" }>
  | Readonly<{ kind: "hmac_sha256"; size: number }>;

export const MIN_HMAC_CHECKSUM_SIZE = 4;
export const MAX_HMAC_CHECKSUM_SIZE = 32;

// checksumSelector decodes the ServerHello checksum-size byte.
export function checksumSelector(size: number): ChecksumSelector {
  if (size === 0) return { kind: "none" };
  if (size === 1) return { kind: "crc16" };
  if (Number.isInteger(size) && size >= MIN_HMAC_CHECKSUM_SIZE && size <= MAX_HMAC_CHECKSUM_SIZE) {
    return { kind: "hmac_sha256", size };
  }
  throw new WireError({ code: "invalid_checksum_config", field: "checksumSize", message: `size ${size}` });
}

// checksumSize encodes a selector back into its ServerHello byte.
export function checksumSize(selector: ChecksumSelector): number {
  switch (selector.kind) {
    case "none":
      return 0;
    case "crc16":
      return 1;
    case "hmac_sha256":
      if (!Number.isInteger(selector.size) || selector.size < MIN_HMAC_CHECKSUM_SIZE || selector.size > MAX_HMAC_CHECKSUM_SIZE) {
        throw new WireError({ code: "invalid_checksum_config", field: "checksumSize", message: `hmac size ${selector.size}` });
      }
      return selector.size;
  }
}
