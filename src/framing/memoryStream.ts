import { ByteReader } from "./byteReader.js";
import { ChunkQueue } from "./chunkQueue.js";
import type { DuplexStream } from "./frame.js";

// MemoryStream is one end of an in-process duplex pipe.
export class MemoryStream implements DuplexStream {
  private readonly reader: ByteReader;
  /** Every chunk written by this end, in order. */
  readonly written: Uint8Array[] = [];
  flushes = 0;

  constructor(
    private readonly incoming: ChunkQueue,
    private readonly outgoing: ChunkQueue
  ) {
    this.reader = new ByteReader(() => incoming.next());
  }

  readExactly(n: number): Promise<Uint8Array> {
    return this.reader.readExactly(n);
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.outgoing.isEnded()) throw new Error("stream closed");
    const copy = bytes.slice();
    this.written.push(copy);
    this.outgoing.push(copy);
  }

  async flush(): Promise<void> {
    this.flushes++;
  }

  close(): void {
    this.outgoing.end();
    this.incoming.end();
  }
}

// createMemoryPipe returns two connected stream ends: bytes written to one are read from the other.
export function createMemoryPipe(): [MemoryStream, MemoryStream] {
  const aToB = new ChunkQueue();
  const bToA = new ChunkQueue();
  return [new MemoryStream(bToA, aToB), new MemoryStream(aToB, bToA)];
}

// memoryStreamFrom returns a read-only stream that yields the given bytes, then EOF.
export function memoryStreamFrom(...chunks: Uint8Array[]): MemoryStream {
  const incoming = new ChunkQueue();
  for (const c of chunks) incoming.push(c);
  incoming.end();
  return new MemoryStream(incoming, new ChunkQueue());
}
