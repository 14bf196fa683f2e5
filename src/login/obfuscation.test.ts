import { describe, expect, test } from "vitest";
import { DEFAULT_PRIMARY_OBFUSCATION, DEFAULT_SECONDARY_OBFUSCATION } from "../config.js";
import { isWireError } from "../utils/errors.js";
import { clientHelloDate, clientHelloIntegrity, clientHelloTimestamp, createClientHello, randomI64 } from "./obfuscation.js";

const P = DEFAULT_PRIMARY_OBFUSCATION;
const S = DEFAULT_SECONDARY_OBFUSCATION;

describe("client hello obfuscation", () => {
  test("zero constants leave a plain XOR of integrity into the timestamp", () => {
    const hello = createClientHello({ integrity: 42n, timestampMillis: 1_700_000_000_000n, primary: 0n, secondary: 0n });
    expect(hello).toEqual({ obfuscatedIntegrity: 42n, obfuscatedTimestamp: 1_700_000_000_042n });
  });

  test("recovers integrity and timestamp with the default constants", () => {
    const hello = createClientHello({ integrity: 12345n, timestampMillis: 1_700_000_000_000n, primary: P, secondary: S });
    expect(hello.obfuscatedIntegrity).toBe(12345n ^ P);
    expect(clientHelloIntegrity(hello, P)).toBe(12345n);
    expect(clientHelloTimestamp(hello, P, S)).toBe(1_700_000_000_000n);
    expect(clientHelloDate(hello, P, S).getTime()).toBe(1_700_000_000_000);
  });

  test("negative integrity stays within i64", () => {
    const hello = createClientHello({ integrity: -1n, timestampMillis: 0n, primary: P, secondary: S });
    expect(BigInt.asIntN(64, hello.obfuscatedIntegrity)).toBe(hello.obfuscatedIntegrity);
    expect(BigInt.asIntN(64, hello.obfuscatedTimestamp)).toBe(hello.obfuscatedTimestamp);
    expect(clientHelloIntegrity(hello, P)).toBe(-1n);
    expect(clientHelloTimestamp(hello, P, S)).toBe(0n);
  });

  test("wrong constants recover a different integrity", () => {
    const hello = createClientHello({ integrity: 7n, timestampMillis: 0n, primary: P, secondary: S });
    expect(clientHelloIntegrity(hello, P + 1n)).not.toBe(7n);
  });

  test("pre-epoch timestamps have no Date", () => {
    const hello = createClientHello({ integrity: 5n, timestampMillis: -1n, primary: P, secondary: S });
    expect(clientHelloTimestamp(hello, P, S)).toBe(-1n);
    let err: unknown;
    try {
      clientHelloDate(hello, P, S);
    } catch (e) {
      err = e;
    }
    expect(isWireError(err, "timestamp_out_of_range")).toBe(true);
  });

  test("values outside i64 are rejected", () => {
    expect(() => createClientHello({ integrity: 1n << 63n, timestampMillis: 0n, primary: P, secondary: S })).toThrow(RangeError);
  });

  test("randomI64 yields signed 64-bit values", () => {
    const a = randomI64();
    const b = randomI64();
    expect(BigInt.asIntN(64, a)).toBe(a);
    expect(a).not.toBe(b);
  });
});
