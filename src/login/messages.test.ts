import { describe, expect, test } from "vitest";
import { DEFAULT_PRIMARY_OBFUSCATION, DEFAULT_SECONDARY_OBFUSCATION } from "../config.js";
import { u64le } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";
import { ClientHello, ClientReady, Login, LoginWithUnknown, ServerHello } from "./messages.js";
import { createClientHello } from "./obfuscation.js";

describe("login messages", () => {
  test("ClientHello is opcode 0 and two i64 fields", () => {
    const bytes = Login.encode(ClientHello.wrap({ obfuscatedIntegrity: 1n, obfuscatedTimestamp: -1n }));
    expect(Array.from(bytes)).toEqual([0, 1, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
    expect(Login.decode(bytes)).toEqual({ type: "ClientHello", value: { obfuscatedIntegrity: 1n, obfuscatedTimestamp: -1n } });
  });

  test("ServerHello layout", () => {
    const hello = { publicKey: new Uint8Array([1, 2, 3]), signature: new Uint8Array([4, 5]), checksumSize: 4 };
    const bytes = Login.encode(ServerHello.wrap(hello));
    expect(Array.from(bytes)).toEqual([1, 3, 0, 1, 2, 3, 2, 0, 4, 5, 4]);
    expect(Login.unwrap(ServerHello, Login.decode(bytes))).toEqual(hello);
  });

  test("ClientReady layout", () => {
    expect(Array.from(Login.encode(ClientReady.wrap({ publicKey: new Uint8Array([9, 9]) })))).toEqual([2, 2, 0, 9, 9]);
  });

  test("checksumSize is a signed byte", () => {
    const bytes = new Uint8Array([1, 0, 0, 0, 0, 0xff]);
    expect(Login.unwrap(ServerHello, Login.decode(bytes)).checksumSize).toBe(-1);
    expect(() => Login.encode(ServerHello.wrap({ publicKey: new Uint8Array(), signature: new Uint8Array(), checksumSize: 128 }))).toThrow(
      /^value_out_of_range \(field checksumSize\)/
    );
  });

  test("a negative key length is rejected", () => {
    expect(() => Login.decode(new Uint8Array([2, 0xff, 0xff]))).toThrow(/^invalid_length \(field publicKey\)/);
  });

  test("Login rejects unknown opcodes; LoginWithUnknown keeps them", () => {
    expect(() => Login.decode(new Uint8Array([3]))).toThrow(WireError);
    expect(LoginWithUnknown.decode(new Uint8Array([3, 0xaa]))).toEqual({ type: "Unknown", opcode: 3, data: new Uint8Array([0xaa]) });
  });

  test("ClientHello body starts with the obfuscated integrity", () => {
    const hello = createClientHello({
      integrity: 12345n,
      timestampMillis: 1_700_000_000_000n,
      primary: DEFAULT_PRIMARY_OBFUSCATION,
      secondary: DEFAULT_SECONDARY_OBFUSCATION
    });
    const body = ClientHello.body.serialize(hello);
    expect(body.length).toBe(16);
    expect(Array.from(body.subarray(0, 8))).toEqual(Array.from(u64le(12345n ^ DEFAULT_PRIMARY_OBFUSCATION)));
  });

  test("opcode 0x7f is unknown to Login", () => {
    let err: unknown;
    try {
      Login.decode(new Uint8Array([0x7f]));
    } catch (e) {
      err = e;
    }
    expect(err instanceof WireError && err.code).toBe("unknown_opcode");
    expect(err instanceof WireError && err.opcode).toBe(0x7f);
    expect(LoginWithUnknown.decode(new Uint8Array([0x7f, 1, 2]))).toEqual({ type: "Unknown", opcode: 0x7f, data: new Uint8Array([1, 2]) });
  });

  test("padding after a ClientReady is ignored", () => {
    const bytes = Login.encode(ClientReady.wrap({ publicKey: new Uint8Array([1]) }));
    expect(Login.decode(new Uint8Array([...bytes, 0]))).toEqual({ type: "ClientReady", value: { publicKey: new Uint8Array([1]) } });
  });
});
