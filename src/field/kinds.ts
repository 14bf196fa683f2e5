// IntKind names a fixed-width little-endian integer.
export type IntKind = "i8" | "u8" | "i16" | "u16" | "i32" | "u32" | "i64" | "u64";

// 64-bit kinds are carried as bigint; everything narrower fits a JS number.
export type WideIntKind = "i64" | "u64";

export type IntValue<K extends IntKind> = K extends WideIntKind ? bigint : number;

export type IntSpec = Readonly<{
  width: 1 | 2 | 4 | 8;
  signed: boolean;
  min: bigint;
  max: bigint;
}>;

function spec(width: 1 | 2 | 4 | 8, signed: boolean): IntSpec {
  const bits = BigInt(width * 8);
  if (signed) return { width, signed, min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  return { width, signed, min: 0n, max: (1n << bits) - 1n };
}

export const INT_SPECS: Readonly<Record<IntKind, IntSpec>> = {
  i8: spec(1, true),
  u8: spec(1, false),
  i16: spec(2, true),
  u16: spec(2, false),
  i32: spec(4, true),
  u32: spec(4, false),
  i64: spec(8, true),
  u64: spec(8, false)
};

export type IntFieldKind<K extends IntKind = IntKind> = Readonly<{ type: "int"; int: K }>;

// BytesFieldKind is a variable-length blob preceded by its byte length.
export type BytesFieldKind<P extends IntKind = IntKind> = Readonly<{ type: "bytes"; prefix: P }>;

export type FieldKind = IntFieldKind | BytesFieldKind;

export type FieldDescriptor<N extends string = string, K extends FieldKind = FieldKind> = Readonly<{
  name: N;
  kind: K;
}>;

export type FieldValue<K extends FieldKind> = K extends IntFieldKind<infer I extends IntKind> ? IntValue<I> : Uint8Array;

// StructOf derives the value type of an ordered field table.
export type StructOf<Fs extends readonly FieldDescriptor[]> = {
  readonly [F in Fs[number] as F["name"]]: FieldValue<F["kind"]>;
};

function int<N extends string, K extends IntKind>(name: N, kind: K): FieldDescriptor<N, IntFieldKind<K>> {
  return { name, kind: { type: "int", int: kind } };
}

// field builds descriptors for field tables:
//
//   const fields = [field.i64("integrity"), field.bytes("publicKey", "i16")] as const;
export const field = {
  i8: <N extends string>(name: N) => int(name, "i8"),
  u8: <N extends string>(name: N) => int(name, "u8"),
  i16: <N extends string>(name: N) => int(name, "i16"),
  u16: <N extends string>(name: N) => int(name, "u16"),
  i32: <N extends string>(name: N) => int(name, "i32"),
  u32: <N extends string>(name: N) => int(name, "u32"),
  i64: <N extends string>(name: N) => int(name, "i64"),
  u64: <N extends string>(name: N) => int(name, "u64"),
  bytes: <N extends string, P extends IntKind>(name: N, prefix: P): FieldDescriptor<N, BytesFieldKind<P>> => ({
    name,
    kind: { type: "bytes", prefix }
  })
};

// encodedFieldSize is the on-wire size of one field value.
export function encodedFieldSize(kind: FieldKind, value: unknown): number {
  if (kind.type === "int") return INT_SPECS[kind.int].width;
  const n = value instanceof Uint8Array ? value.length : 0;
  return INT_SPECS[kind.prefix].width + n;
}
