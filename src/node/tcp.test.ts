import { Socket } from "node:net";
import { describe, expect, test } from "vitest";
import { StreamEOFError } from "../utils/errors.js";
import { SocketStream } from "./tcp.js";

// The socket is never connected; tests drive it by emitting its events.
describe("SocketStream", () => {
  test("reads data events as a byte stream", async () => {
    const socket = new Socket();
    const stream = new SocketStream(socket);
    socket.emit("data", Buffer.from([5, 0, 1]));
    socket.emit("data", Buffer.from([2, 3]));
    await expect(stream.readExactly(2)).resolves.toEqual(new Uint8Array([5, 0]));
    await expect(stream.readExactly(3)).resolves.toEqual(new Uint8Array([1, 2, 3]));
    stream.close();
  });

  test("end turns a short read into EOF", async () => {
    const socket = new Socket();
    const stream = new SocketStream(socket);
    socket.emit("data", Buffer.from([1]));
    socket.emit("end");
    await expect(stream.readExactly(1)).resolves.toEqual(new Uint8Array([1]));
    await expect(stream.readExactly(1)).rejects.toBeInstanceOf(StreamEOFError);
    stream.close();
  });

  test("socket errors reach the pending reader", async () => {
    const socket = new Socket();
    const stream = new SocketStream(socket);
    const pending = stream.readExactly(4);
    socket.emit("error", new Error("connection reset"));
    await expect(pending).rejects.toThrow("connection reset");
    stream.close();
  });

  test("close destroys the socket and unblocks readers", async () => {
    const socket = new Socket();
    const stream = new SocketStream(socket);
    const pending = stream.readExactly(1);
    stream.close();
    await expect(pending).rejects.toBeInstanceOf(StreamEOFError);
    expect(socket.destroyed).toBe(true);
  });
});
