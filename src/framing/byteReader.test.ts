import { describe, expect, test } from "vitest";
import { ByteReader } from "./byteReader.js";
import { StreamEOFError } from "../utils/errors.js";

describe("ByteReader", () => {
  test("reads across multiple chunks", async () => {
    const chunks = [new Uint8Array([1, 2]), new Uint8Array([3]), new Uint8Array([4, 5, 6])];
    const reader = new ByteReader(async () => chunks.shift() ?? null);
    await expect(reader.readExactly(4)).resolves.toEqual(new Uint8Array([1, 2, 3, 4]));
    expect(reader.bufferedBytes()).toBe(2);
    await expect(reader.readExactly(2)).resolves.toEqual(new Uint8Array([5, 6]));
  });

  test("skips empty chunks", async () => {
    const chunks = [new Uint8Array(), new Uint8Array([9])];
    const reader = new ByteReader(async () => chunks.shift() ?? null);
    await expect(reader.readExactly(1)).resolves.toEqual(new Uint8Array([9]));
  });

  test("zero-length read needs no data", async () => {
    const reader = new ByteReader(async () => null);
    await expect(reader.readExactly(0)).resolves.toEqual(new Uint8Array());
  });

  test("rejects on EOF with a short read", async () => {
    const chunks = [new Uint8Array([1, 2])];
    const reader = new ByteReader(async () => chunks.shift() ?? null);
    const err = await reader.readExactly(3).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StreamEOFError);
    expect(String(err)).toContain("eof after 2 of 3 bytes");
  });

  test("rejects negative length", async () => {
    const reader = new ByteReader(async () => null);
    await expect(reader.readExactly(-1)).rejects.toThrow(/invalid length/);
  });
});
