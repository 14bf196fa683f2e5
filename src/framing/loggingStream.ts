import { normalizeObserver, type ProtocolObserver, type ProtocolObserverLike, type StreamIoEvent } from "../observability/observer.js";
import { formatHexDump } from "../utils/hexdump.js";
import type { DuplexStream } from "./frame.js";

// LoggingStream reports every read, write and flush of the wrapped stream to an observer.
export class LoggingStream implements DuplexStream {
  private readonly observer: ProtocolObserver;

  constructor(
    private readonly inner: DuplexStream,
    observer: ProtocolObserverLike
  ) {
    this.observer = normalizeObserver(observer);
  }

  async readExactly(n: number): Promise<Uint8Array> {
    const bytes = await this.inner.readExactly(n);
    if (bytes.length > 0) this.observer.onStreamIo("read", bytes);
    return bytes;
  }

  async write(bytes: Uint8Array): Promise<void> {
    this.observer.onStreamIo("write", bytes);
    await this.inner.write(bytes);
  }

  async flush(): Promise<void> {
    await this.inner.flush();
    this.observer.onStreamIo("flush", new Uint8Array());
  }

  close(): void {
    this.inner.close();
  }
}

// formatStreamIo renders one stream event the way hexDumpObserver prints it.
export function formatStreamIo(event: StreamIoEvent, bytes: Uint8Array): string {
  if (event === "flush") return "[FLUSH]";
  return `[${event.toUpperCase()}] ${bytes.length} bytes:\n${formatHexDump(bytes)}`;
}

// hexDumpObserver prints stream traffic as hex dumps through sink.
export function hexDumpObserver(sink: (text: string) => void): ProtocolObserverLike {
  return {
    onStreamIo: (event, bytes) => sink(formatStreamIo(event, bytes))
  };
}
