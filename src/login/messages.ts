import { field } from "../field/kinds.js";
import { defineUnion } from "../message/codec.js";
import { defineMessage, type MessageValue } from "../message/types.js";

// ClientHello opens the login handshake with two obfuscated 64-bit values.
export const ClientHello = defineMessage({
  name: "ClientHello",
  opcode: 0x00,
  fields: [field.i64("obfuscatedIntegrity"), field.i64("obfuscatedTimestamp")]
});
export type ClientHello = MessageValue<typeof ClientHello>;

// ServerHello carries the server public key (SEC1), a DER signature over it and the checksum size selector.
export const ServerHello = defineMessage({
  name: "ServerHello",
  opcode: 0x01,
  fields: [field.bytes("publicKey", "i16"), field.bytes("signature", "i16"), field.i8("checksumSize")]
});
export type ServerHello = MessageValue<typeof ServerHello>;

// ClientReady finishes the handshake with the client public key (SEC1).
export const ClientReady = defineMessage({
  name: "ClientReady",
  opcode: 0x02,
  fields: [field.bytes("publicKey", "i16")]
});
export type ClientReady = MessageValue<typeof ClientReady>;

// Login is the handshake codec; unrecognized opcodes fail with unknown_opcode.
export const Login = defineUnion({
  name: "Login",
  variants: [ClientHello, ServerHello, ClientReady]
});
export type LoginMessage = ReturnType<typeof Login.decode>;

// LoginWithUnknown also accepts unrecognized opcodes as Unknown values.
export const LoginWithUnknown = defineUnion({
  name: "LoginWithUnknown",
  variants: [ClientHello, ServerHello, ClientReady],
  unknown: true
});
export type LoginWithUnknownMessage = ReturnType<typeof LoginWithUnknown.decode>;
