import { describe, expect, test } from "vitest";
import { StreamEOFError, WireError } from "../utils/errors.js";
import { decodeFrameLength, encodeFrame, MAX_FRAME_PAYLOAD, readFrame, writeFrame } from "./frame.js";
import { createMemoryPipe, memoryStreamFrom } from "./memoryStream.js";

describe("frame", () => {
  test("length prefix counts itself", () => {
    expect(Array.from(encodeFrame(new Uint8Array([0, 1, 2])))).toEqual([5, 0, 0, 1, 2]);
    expect(Array.from(encodeFrame(new Uint8Array()))).toEqual([2, 0]);
  });

  test("largest payload fills the signed 16-bit prefix", () => {
    const frame = encodeFrame(new Uint8Array(MAX_FRAME_PAYLOAD));
    expect(MAX_FRAME_PAYLOAD).toBe(32765);
    expect(frame.length).toBe(32767);
    expect(Array.from(frame.subarray(0, 2))).toEqual([0xff, 0x7f]);
  });

  test("oversized payload fails with message_too_large", () => {
    expect(() => encodeFrame(new Uint8Array(MAX_FRAME_PAYLOAD + 1))).toThrow(WireError);
    try {
      encodeFrame(new Uint8Array(MAX_FRAME_PAYLOAD + 1));
    } catch (e) {
      expect(e instanceof WireError && e.code).toBe("message_too_large");
    }
  });

  test("decodeFrameLength rejects lengths below the header size", () => {
    expect(decodeFrameLength(new Uint8Array([2, 0]))).toBe(0);
    expect(decodeFrameLength(new Uint8Array([5, 0]))).toBe(3);
    for (const header of [[1, 0], [0, 0], [0xff, 0xff], [0x00, 0x80]]) {
      expect(() => decodeFrameLength(new Uint8Array(header))).toThrow(/^invalid_frame_length: length -?\d+$/);
    }
  });

  test("writeFrame then readFrame over a pipe", async () => {
    const [a, b] = createMemoryPipe();
    await writeFrame(a, new Uint8Array([7, 8, 9]));
    expect(a.written).toEqual([new Uint8Array([5, 0, 7, 8, 9])]);
    expect(a.flushes).toBe(1);
    await expect(readFrame(b)).resolves.toEqual(new Uint8Array([7, 8, 9]));
  });

  test("readFrame reassembles split chunks", async () => {
    const stream = memoryStreamFrom(new Uint8Array([6]), new Uint8Array([0, 1, 2]), new Uint8Array([3, 4, 4, 0]));
    await expect(readFrame(stream)).resolves.toEqual(new Uint8Array([1, 2, 3, 4]));
    expect(await stream.readExactly(2)).toEqual(new Uint8Array([4, 0]));
  });

  test("back-to-back frames in one chunk", async () => {
    const stream = memoryStreamFrom(new Uint8Array([3, 0, 0xaa, 2, 0, 4, 0, 1, 2]));
    await expect(readFrame(stream)).resolves.toEqual(new Uint8Array([0xaa]));
    await expect(readFrame(stream)).resolves.toEqual(new Uint8Array());
    await expect(readFrame(stream)).resolves.toEqual(new Uint8Array([1, 2]));
  });

  test("short header or body is an EOF, not a protocol error", async () => {
    await expect(readFrame(memoryStreamFrom(new Uint8Array([5])))).rejects.toBeInstanceOf(StreamEOFError);
    await expect(readFrame(memoryStreamFrom(new Uint8Array([5, 0, 1])))).rejects.toBeInstanceOf(StreamEOFError);
    await expect(readFrame(memoryStreamFrom())).rejects.toBeInstanceOf(StreamEOFError);
  });

  test("invalid length on the wire", async () => {
    await expect(readFrame(memoryStreamFrom(new Uint8Array([1, 0])))).rejects.toBeInstanceOf(WireError);
  });
});
