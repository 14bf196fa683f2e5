import { readI16le, readI32le, readI64le, readU16le, readU32le, readU64le, toI8, u16le, u32le, u64le } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";
import { ByteCursor, ByteWriter } from "./cursor.js";
import { encodedFieldSize, INT_SPECS, type FieldDescriptor, type FieldKind, type IntKind, type StructOf } from "./kinds.js";

// Hard ceiling for a decoded variable-length field (10 MiB).
export const MAX_FIELD_BYTES = 10 * 1024 * 1024;

export type DecodeOptions = Readonly<{
  /** Lower per-field ceiling; values above MAX_FIELD_BYTES are clamped to it. */
  maxFieldBytes?: number;
}>;

export type FieldRuntimeValue = number | bigint | Uint8Array;

export function resolveMaxFieldBytes(opts: DecodeOptions | undefined): number {
  const v = opts?.maxFieldBytes;
  if (v === undefined) return MAX_FIELD_BYTES;
  if (!Number.isSafeInteger(v) || v < 0) throw new RangeError("maxFieldBytes must be a non-negative integer");
  return Math.min(v, MAX_FIELD_BYTES);
}

function toBigInt(kind: IntKind, value: unknown, field: string): bigint {
  if (kind === "i64" || kind === "u64") {
    if (typeof value !== "bigint") throw new WireError({ code: "value_out_of_range", field, message: `${kind} expects a bigint` });
    return value;
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new WireError({ code: "value_out_of_range", field, message: `${kind} expects an integer number` });
  }
  return BigInt(value);
}

// encodeInt writes value as a little-endian integer of the given kind.
export function encodeInt(kind: IntKind, value: unknown, field: string): Uint8Array {
  const spec = INT_SPECS[kind];
  const v = toBigInt(kind, value, field);
  if (v < spec.min || v > spec.max) {
    throw new WireError({ code: "value_out_of_range", field, message: `${v} does not fit ${kind}` });
  }
  switch (spec.width) {
    case 1:
      return Uint8Array.of(Number(v) & 0xff);
    case 2:
      return u16le(Number(v));
    case 4:
      return u32le(Number(v));
    case 8:
      return u64le(v);
  }
}

// decodeInt reads one integer of the given kind from the cursor.
export function decodeInt(kind: IntKind, cursor: ByteCursor, field: string): number | bigint {
  const spec = INT_SPECS[kind];
  const b = cursor.take(spec.width, field);
  switch (kind) {
    case "i8":
      return toI8(b[0]!);
    case "u8":
      return b[0]!;
    case "i16":
      return readI16le(b, 0);
    case "u16":
      return readU16le(b, 0);
    case "i32":
      return readI32le(b, 0);
    case "u32":
      return readU32le(b, 0);
    case "i64":
      return readI64le(b, 0);
    case "u64":
      return readU64le(b, 0);
  }
}

// serializeField appends the encoding of one field value.
export function serializeField(kind: FieldKind, value: unknown, field: string, w: ByteWriter): void {
  if (kind.type === "int") {
    w.push(encodeInt(kind.int, value, field));
    return;
  }
  if (!(value instanceof Uint8Array)) {
    throw new WireError({ code: "value_out_of_range", field, message: "bytes field expects a Uint8Array" });
  }
  const spec = INT_SPECS[kind.prefix];
  const n = BigInt(value.length);
  if (n > spec.max) {
    throw new WireError({ code: "length_overflow", field, message: `${value.length} bytes do not fit a ${kind.prefix} prefix` });
  }
  const prefix = kind.prefix === "i64" || kind.prefix === "u64" ? n : value.length;
  w.push(encodeInt(kind.prefix, prefix, field));
  w.push(value);
}

// deserializeField reads one field value; blobs are copied out of the source buffer.
export function deserializeField(kind: FieldKind, cursor: ByteCursor, field: string, maxFieldBytes = MAX_FIELD_BYTES): FieldRuntimeValue {
  if (kind.type === "int") return decodeInt(kind.int, cursor, field);
  const n = BigInt(decodeInt(kind.prefix, cursor, field));
  if (n < 0n) throw new WireError({ code: "invalid_length", field, message: `negative length ${n}` });
  if (n > BigInt(maxFieldBytes)) {
    throw new WireError({ code: "size_limit_exceeded", field, message: `length ${n} exceeds ${maxFieldBytes}` });
  }
  return cursor.take(Number(n), field).slice();
}

// StructCodec serializes an ordered field table.
export type StructCodec<T> = Readonly<{
  fields: readonly FieldDescriptor[];
  serialize(value: T): Uint8Array;
  serializeInto(value: T, w: ByteWriter): void;
  deserialize(bytes: Uint8Array, offset?: number, opts?: DecodeOptions): { value: T; consumed: number };
  deserializeFrom(cursor: ByteCursor, opts?: DecodeOptions): T;
  encodedSize(value: T): number;
}>;

// defineStruct builds a codec from a field table; the value type is derived from the table.
export function defineStruct<const Fs extends readonly FieldDescriptor[]>(fields: Fs): StructCodec<StructOf<Fs>> {
  const seen = new Set<string>();
  for (const f of fields) {
    if (seen.has(f.name)) throw new Error(`duplicate field ${f.name}`);
    seen.add(f.name);
  }

  const serializeInto = (value: StructOf<Fs>, w: ByteWriter): void => {
    for (const f of fields) serializeField(f.kind, Reflect.get(value, f.name), f.name, w);
  };

  const deserializeFrom = (cursor: ByteCursor, opts?: DecodeOptions): StructOf<Fs> => {
    const max = resolveMaxFieldBytes(opts);
    const out: Record<string, FieldRuntimeValue> = {};
    for (const f of fields) out[f.name] = deserializeField(f.kind, cursor, f.name, max);
    // Every field of the table was decoded with its declared kind.
    return out as StructOf<Fs>;
  };

  return {
    fields,
    serializeInto,
    deserializeFrom,
    serialize(value) {
      const w = new ByteWriter();
      serializeInto(value, w);
      return w.finish();
    },
    deserialize(bytes, offset = 0, opts) {
      const cursor = new ByteCursor(bytes, offset);
      const value = deserializeFrom(cursor, opts);
      return { value, consumed: cursor.offset - offset };
    },
    encodedSize(value) {
      let n = 0;
      for (const f of fields) n += encodedFieldSize(f.kind, Reflect.get(value, f.name));
      return n;
    }
  };
}
