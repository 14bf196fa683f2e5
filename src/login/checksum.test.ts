import { describe, expect, test } from "vitest";
import { WireError } from "../utils/errors.js";
import { checksumSelector, checksumSize } from "./checksum.js";

describe("checksum selector", () => {
  test("decodes the ServerHello byte", () => {
    expect(checksumSelector(0)).toEqual({ kind: "none" });
    expect(checksumSelector(1)).toEqual({ kind: "crc16" });
    expect(checksumSelector(4)).toEqual({ kind: "hmac_sha256", size: 4 });
    expect(checksumSelector(32)).toEqual({ kind: "hmac_sha256", size: 32 });
  });

  test("rejects sizes with no meaning", () => {
    for (const size of [2, 3, 33, -1, 127]) {
      expect(() => checksumSelector(size)).toThrow(WireError);
    }
  });

  test("encodes back to the same byte", () => {
    for (const size of [0, 1, 4, 16, 32]) expect(checksumSize(checksumSelector(size))).toBe(size);
  });

  test("invalid hmac sizes do not encode", () => {
    expect(() => checksumSize({ kind: "hmac_sha256", size: 2 })).toThrow(/^invalid_checksum_config \(field checksumSize\): hmac size 2$/);
  });
});
