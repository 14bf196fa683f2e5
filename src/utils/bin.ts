// All multi-byte integers on the wire are little-endian.

// u16le encodes a number into 2 bytes little-endian (two's complement for negatives).
export function u16le(n: number): Uint8Array {
  const b = new Uint8Array(2);
  b[0] = n & 0xff;
  b[1] = (n >>> 8) & 0xff;
  return b;
}

// u32le encodes a number into 4 bytes little-endian (two's complement for negatives).
export function u32le(n: number): Uint8Array {
  const b = new Uint8Array(4);
  const v = n >>> 0;
  b[0] = v & 0xff;
  b[1] = (v >>> 8) & 0xff;
  b[2] = (v >>> 16) & 0xff;
  b[3] = (v >>> 24) & 0xff;
  return b;
}

// u64le encodes a bigint into 8 bytes little-endian (two's complement for negatives).
export function u64le(n: bigint): Uint8Array {
  const b = new Uint8Array(8);
  let v = BigInt.asUintN(64, n);
  for (let i = 0; i < 8; i++) {
    b[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return b;
}

// readU16le reads a 2-byte little-endian unsigned number.
export function readU16le(buf: Uint8Array, off: number): number {
  return (buf[off]! | (buf[off + 1]! << 8)) >>> 0;
}

// readI16le reads a 2-byte little-endian signed number.
export function readI16le(buf: Uint8Array, off: number): number {
  const v = readU16le(buf, off);
  return v >= 0x8000 ? v - 0x10000 : v;
}

// readU32le reads a 4-byte little-endian unsigned number.
export function readU32le(buf: Uint8Array, off: number): number {
  return (
    buf[off]! |
    (buf[off + 1]! << 8) |
    (buf[off + 2]! << 16) |
    (buf[off + 3]! << 24)
  ) >>> 0;
}

// readI32le reads a 4-byte little-endian signed number.
export function readI32le(buf: Uint8Array, off: number): number {
  return readU32le(buf, off) | 0;
}

// readU64le reads an 8-byte little-endian unsigned bigint.
export function readU64le(buf: Uint8Array, off: number): bigint {
  let v = 0n;
  for (let i = 7; i >= 0; i--) v = (v << 8n) | BigInt(buf[off + i]!);
  return v;
}

// readI64le reads an 8-byte little-endian signed bigint.
export function readI64le(buf: Uint8Array, off: number): bigint {
  return BigInt.asIntN(64, readU64le(buf, off));
}

// toI8 reinterprets a byte as a signed 8-bit value.
export function toI8(byte: number): number {
  const v = byte & 0xff;
  return v >= 0x80 ? v - 0x100 : v;
}

// concatBytes concatenates buffers into a single Uint8Array.
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const c of chunks) total += c.length;
  const out = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.length;
  }
  return out;
}
