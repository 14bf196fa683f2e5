import { ByteCursor, ByteWriter } from "../field/cursor.js";
import type { DecodeOptions } from "../field/codec.js";
import { toI8 } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";
import { assertOpcode, isUnknownMessage, UNKNOWN, type AnyMessageType, type Envelope, type MessageType, type UnknownMessage } from "./types.js";

export type KnownMessage<V> = V extends MessageType<infer N, infer T> ? Envelope<N, T> : never;

// UnionMessage is the value type of a union: one envelope per variant, plus Unknown when declared.
export type UnionMessage<Vs extends readonly AnyMessageType[], U extends boolean> =
  | KnownMessage<Vs[number]>
  | (U extends true ? UnknownMessage : never);

export type MessageCodec<M extends Readonly<{ type: string }>> = Readonly<{
  name: string;
  /** Whether unrecognized opcodes decode to an Unknown value instead of failing. */
  hasUnknown: boolean;
  variants: readonly AnyMessageType[];
  /** encode writes the opcode byte followed by the body. */
  encode(message: M): Uint8Array;
  /** decode reads the opcode byte and dispatches the rest of the payload. */
  decode(bytes: Uint8Array, opts?: DecodeOptions): M;
  /** unwrap extracts the body of a specific variant or fails with type_mismatch. */
  unwrap<T>(type: MessageType<string, T>, message: M): T;
  /** opcodeOf returns the signed opcode the message is encoded with. */
  opcodeOf(message: M): number;
}>;

export type UnionDefinition<Vs extends readonly AnyMessageType[], U extends boolean> = Readonly<{
  name: string;
  variants: Vs;
  /** Declares the Unknown catch-all variant. */
  unknown?: U;
}>;

// defineUnion builds an opcode-dispatching codec over a fixed set of message types.
export function defineUnion<const Vs extends readonly AnyMessageType[], const U extends boolean = false>(
  def: UnionDefinition<Vs, U>
): MessageCodec<UnionMessage<Vs, U>> {
  type M = UnionMessage<Vs, U>;
  const hasUnknown = def.unknown === true;
  const byOpcode = new Map<number, AnyMessageType>();
  const byName = new Map<string, AnyMessageType>();
  for (const v of def.variants) {
    assertOpcode(v.opcode, v.name);
    const clash = byOpcode.get(v.opcode);
    if (clash != null) {
      throw new WireError({ code: "duplicate_opcode", message: `${def.name}: ${v.name} and ${clash.name} share opcode ${v.opcode}` });
    }
    if (byName.has(v.name)) throw new Error(`${def.name}: duplicate variant ${v.name}`);
    byOpcode.set(v.opcode, v);
    byName.set(v.name, v);
  }

  const opcodeOf = (message: Readonly<{ type: string }>): number => {
    if (isUnknownMessage(message)) {
      if (!hasUnknown) throw new WireError({ code: "type_mismatch", message: `${def.name} declares no ${UNKNOWN} variant` });
      if (!Number.isInteger(message.opcode) || message.opcode < -128 || message.opcode > 127) {
        throw new WireError({ code: "invalid_opcode", message: `${UNKNOWN} opcode ${message.opcode} is not a signed byte` });
      }
      const claimed = byOpcode.get(message.opcode);
      if (claimed != null) {
        throw new WireError({ code: "invalid_opcode", message: `${UNKNOWN} opcode ${message.opcode} belongs to ${claimed.name}` });
      }
      return message.opcode;
    }
    const variant = byName.get(message.type);
    if (variant == null) throw new WireError({ code: "type_mismatch", message: `${def.name} has no variant ${message.type}` });
    return variant.opcode;
  };

  const encode = (message: Readonly<{ type: string }>): Uint8Array => {
    const opcode = opcodeOf(message);
    const w = new ByteWriter();
    w.push(Uint8Array.of(opcode & 0xff));
    if (isUnknownMessage(message)) {
      w.push(message.data);
      return w.finish();
    }
    const variant = byOpcode.get(opcode);
    if (variant == null || !variant.is(message)) {
      throw new WireError({ code: "type_mismatch", message: `${message.type} is not a ${def.name} message` });
    }
    variant.body.serializeInto(message.value, w);
    return w.finish();
  };

  const decode = (bytes: Uint8Array, opts?: DecodeOptions): Envelope<string, unknown> | UnknownMessage => {
    if (bytes.length < 1) throw new WireError({ code: "empty_message", message: "no opcode byte" });
    const raw = bytes[0]!;
    const variant = byOpcode.get(toI8(raw));
    if (variant == null) {
      if (hasUnknown) return { type: UNKNOWN, opcode: toI8(raw), data: bytes.slice(1) };
      throw new WireError({ code: "unknown_opcode", opcode: raw, message: `0x${raw.toString(16).padStart(2, "0")}` });
    }
    // Bytes after the last declared field are ignored.
    const value = variant.body.deserializeFrom(new ByteCursor(bytes, 1), opts);
    return variant.wrap(value);
  };

  return {
    name: def.name,
    hasUnknown,
    variants: def.variants,
    encode,
    // The opcode table only hands out variants of this union.
    decode: (bytes, opts) => decode(bytes, opts) as M,
    opcodeOf,
    unwrap(type, message) {
      if (!type.is(message)) {
        throw new WireError({ code: "type_mismatch", message: `expected ${type.name}, got ${message.type}` });
      }
      return message.value;
    }
  };
}
