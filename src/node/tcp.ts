import { createConnection, createServer, type Server, type Socket } from "node:net";
import { ByteReader } from "../framing/byteReader.js";
import { ChunkQueue } from "../framing/chunkQueue.js";
import type { DuplexStream } from "../framing/frame.js";
import { withDeadline } from "../utils/deadline.js";

// SocketStream adapts a node:net socket to the framing layer.
export class SocketStream implements DuplexStream {
  private readonly queue = new ChunkQueue();
  private readonly reader: ByteReader;

  constructor(readonly socket: Socket) {
    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => {
      if (!this.queue.isEnded()) this.queue.push(chunk);
    });
    socket.on("end", () => this.queue.end());
    socket.on("close", () => this.queue.end());
    socket.on("error", (err: Error) => this.queue.fail(err));
    this.reader = new ByteReader(() => this.queue.next());
  }

  readExactly(n: number): Promise<Uint8Array> {
    return this.reader.readExactly(n);
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (err) => (err != null ? reject(err) : resolve()));
    });
  }

  // Writes are handed to the kernel as they are made and Nagle is off, so there is nothing to flush.
  async flush(): Promise<void> {}

  close(): void {
    this.queue.end();
    this.socket.destroy();
  }
}

export type ConnectTcpOptions = Readonly<{
  host: string;
  port: number;
  signal?: AbortSignal;
  /** Connect timeout in milliseconds (0 disables). */
  timeoutMs?: number;
}>;

// connectTcp opens a TCP connection and resolves once it is established.
export async function connectTcp(opts: ConnectTcpOptions): Promise<SocketStream> {
  const socket = createConnection({ host: opts.host, port: opts.port });
  const connected = new Promise<SocketStream>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(new SocketStream(socket));
    });
  });
  const timeoutMs = opts.timeoutMs ?? 0;
  const deadline = timeoutMs > 0 ? Date.now() + timeoutMs : null;
  return await withDeadline(connected, deadline, {
    ...(opts.signal !== undefined ? { signal: opts.signal } : {}),
    onCancel: () => socket.destroy()
  });
}

export type ListenTcpOptions = Readonly<{
  port: number;
  host?: string;
  /** Handles one accepted connection; the stream is closed once the returned promise settles. */
  onConnection: (stream: SocketStream) => Promise<void>;
  /** Receives errors thrown by onConnection. */
  onError: (err: unknown) => void;
}>;

// listenTcp starts a TCP server and resolves once it is listening.
export async function listenTcp(opts: ListenTcpOptions): Promise<Server> {
  const server = createServer((socket) => {
    const stream = new SocketStream(socket);
    void opts
      .onConnection(stream)
      .catch((err: unknown) => opts.onError(err))
      .finally(() => stream.close());
  });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  return server;
}
