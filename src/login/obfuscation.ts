import { randomBytes } from "@noble/hashes/utils";
import { readI64le } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";
import type { ClientHello } from "./messages.js";

// Largest millisecond offset a JS Date can represent.
const MAX_DATE_MS = 8_640_000_000_000_000n;

export type ClientHelloParams = Readonly<{
  /** Random value chosen by the client. */
  integrity: bigint;
  /** Unix time in milliseconds. */
  timestampMillis: bigint;
  primary: bigint;
  secondary: bigint;
}>;

function i64(name: string, v: bigint): bigint {
  if (BigInt.asIntN(64, v) !== v) throw new RangeError(`${name} must fit a signed 64-bit integer`);
  return v;
}

// createClientHello obfuscates integrity and timestamp with the shared constants.
//
// The XOR chain is reversible and detects no tampering.
export function createClientHello(p: ClientHelloParams): ClientHello {
  const integrity = i64("integrity", p.integrity);
  const timestampMillis = i64("timestampMillis", p.timestampMillis);
  const primary = i64("primary", p.primary);
  const secondary = i64("secondary", p.secondary);
  return {
    obfuscatedIntegrity: BigInt.asIntN(64, integrity ^ primary),
    obfuscatedTimestamp: BigInt.asIntN(64, timestampMillis ^ integrity ^ secondary)
  };
}

export function clientHelloIntegrity(hello: ClientHello, primary: bigint): bigint {
  return BigInt.asIntN(64, hello.obfuscatedIntegrity ^ primary);
}

export function clientHelloTimestamp(hello: ClientHello, primary: bigint, secondary: bigint): bigint {
  return BigInt.asIntN(64, hello.obfuscatedTimestamp ^ clientHelloIntegrity(hello, primary) ^ secondary);
}

// clientHelloDate recovers the timestamp as a Date; pre-epoch or unrepresentable values fail.
export function clientHelloDate(hello: ClientHello, primary: bigint, secondary: bigint): Date {
  const ms = clientHelloTimestamp(hello, primary, secondary);
  if (ms < 0n || ms > MAX_DATE_MS) {
    throw new WireError({ code: "timestamp_out_of_range", field: "obfuscatedTimestamp", message: `${ms} ms` });
  }
  return new Date(Number(ms));
}

// randomI64 returns a cryptographically random signed 64-bit integer.
export function randomI64(): bigint {
  return readI64le(randomBytes(8), 0);
}
