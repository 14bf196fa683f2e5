import { describe, expect, test } from "vitest";
import { StreamEOFError } from "../utils/errors.js";
import { ChunkQueue } from "./chunkQueue.js";
import { createMemoryPipe } from "./memoryStream.js";

describe("ChunkQueue", () => {
  test("delivers queued chunks after end", async () => {
    const q = new ChunkQueue();
    q.push(new Uint8Array([1]));
    q.end();
    await expect(q.next()).resolves.toEqual(new Uint8Array([1]));
    await expect(q.next()).resolves.toBeNull();
    expect(() => q.push(new Uint8Array([2]))).toThrow(/push after end/);
  });

  test("wakes a pending reader", async () => {
    const q = new ChunkQueue();
    const p = q.next();
    q.push(new Uint8Array([3]));
    await expect(p).resolves.toEqual(new Uint8Array([3]));
  });

  test("fail rejects a pending reader", async () => {
    const q = new ChunkQueue();
    const p = q.next();
    q.fail(new Error("reset"));
    await expect(p).rejects.toThrow("reset");
    await expect(q.next()).rejects.toThrow("reset");
  });

  test("rejects a second concurrent read", async () => {
    const q = new ChunkQueue();
    const first = q.next();
    await expect(q.next()).rejects.toThrow(/concurrent read/);
    q.end();
    await expect(first).resolves.toBeNull();
  });
});

describe("createMemoryPipe", () => {
  test("bytes flow both ways", async () => {
    const [a, b] = createMemoryPipe();
    await a.write(new Uint8Array([1, 2]));
    await b.write(new Uint8Array([3]));
    await expect(b.readExactly(2)).resolves.toEqual(new Uint8Array([1, 2]));
    await expect(a.readExactly(1)).resolves.toEqual(new Uint8Array([3]));
  });

  test("close unblocks the peer with EOF", async () => {
    const [a, b] = createMemoryPipe();
    const pending = b.readExactly(1);
    a.close();
    await expect(pending).rejects.toBeInstanceOf(StreamEOFError);
    await expect(a.write(new Uint8Array([1]))).rejects.toThrow(/stream closed/);
  });
});
