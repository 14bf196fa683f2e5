import { defineStruct, type StructCodec } from "../field/codec.js";
import type { FieldDescriptor, StructOf } from "../field/kinds.js";
import { WireError } from "../utils/errors.js";

// Name of the catch-all variant; no message type may use it.
export const UNKNOWN = "Unknown" as const;

// Opcode −128 is reserved for the catch-all, so declared opcodes span −127..127.
export const MIN_OPCODE = -127;
export const MAX_OPCODE = 127;

// Envelope is a decoded known message tagged with its type name.
export type Envelope<N extends string, T> = Readonly<{ type: N; value: T }>;

// UnknownMessage carries an unrecognized opcode and the unparsed rest of the payload.
export type UnknownMessage = Readonly<{
  type: typeof UNKNOWN;
  /** Signed 8-bit opcode as read from the wire. */
  opcode: number;
  data: Uint8Array;
}>;

// MessageType binds a field table to a unique opcode.
export type MessageType<N extends string, T> = Readonly<{
  name: N;
  /** Signed 8-bit opcode. */
  opcode: number;
  body: StructCodec<T>;
  wrap(value: T): Envelope<N, T>;
  is(message: Readonly<{ type: string }>): message is Envelope<N, T>;
}>;

export type AnyMessageType = MessageType<string, unknown>;

export type MessageValue<M> = M extends MessageType<string, infer T> ? T : never;

export type MessageDefinition<N extends string, Fs extends readonly FieldDescriptor[]> = Readonly<{
  name: N;
  opcode: number;
  fields: Fs;
}>;

export function assertOpcode(opcode: number, name: string): void {
  if (!Number.isInteger(opcode) || opcode < MIN_OPCODE || opcode > MAX_OPCODE) {
    throw new WireError({ code: "invalid_opcode", message: `${name}: opcode ${opcode} outside ${MIN_OPCODE}..${MAX_OPCODE}` });
  }
}

// defineMessage declares a message type from its opcode and ordered field table.
export function defineMessage<const N extends string, const Fs extends readonly FieldDescriptor[]>(
  def: MessageDefinition<N, Fs>
): MessageType<N, StructOf<Fs>> {
  if (def.name === "" || def.name === UNKNOWN) throw new Error(`invalid message name ${JSON.stringify(def.name)}`);
  assertOpcode(def.opcode, def.name);
  const name = def.name;
  return {
    name,
    opcode: def.opcode,
    body: defineStruct(def.fields),
    wrap: (value) => ({ type: name, value }),
    is: (message): message is Envelope<N, StructOf<Fs>> => message.type === name && "value" in message
  };
}

export function isUnknownMessage(message: Readonly<{ type: string }>): message is UnknownMessage {
  return (
    message.type === UNKNOWN &&
    "opcode" in message &&
    typeof message.opcode === "number" &&
    "data" in message &&
    message.data instanceof Uint8Array
  );
}
