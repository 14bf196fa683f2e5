import { readI16le, u16le } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";

// Frame length prefix size; the prefix counts itself.
export const FRAME_HEADER_LEN = 2;
// Largest length a signed 16-bit prefix can carry.
export const MAX_FRAME_LEN = 0x7fff;
// Largest opcode+body payload that fits one frame.
export const MAX_FRAME_PAYLOAD = MAX_FRAME_LEN - FRAME_HEADER_LEN;

// DuplexStream is the byte stream the framing layer runs over.
export type DuplexStream = {
  /** Reads exactly n bytes; rejects with StreamEOFError on a short read. */
  readExactly(n: number): Promise<Uint8Array>;
  /** Writes all bytes. */
  write(bytes: Uint8Array): Promise<void>;
  /** Flushes buffered writes. */
  flush(): Promise<void>;
  /** Closes the stream and unblocks pending readers. */
  close(): void;
};

// encodeFrame prefixes the payload with its self-inclusive i16 little-endian length.
export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_FRAME_PAYLOAD) {
    throw new WireError({ code: "message_too_large", message: `${payload.length} bytes exceed ${MAX_FRAME_PAYLOAD}` });
  }
  const out = new Uint8Array(FRAME_HEADER_LEN + payload.length);
  out.set(u16le(FRAME_HEADER_LEN + payload.length), 0);
  out.set(payload, FRAME_HEADER_LEN);
  return out;
}

// decodeFrameLength validates a length prefix and returns the payload size that follows it.
export function decodeFrameLength(header: Uint8Array): number {
  if (header.length < FRAME_HEADER_LEN) throw new RangeError("frame header too short");
  const n = readI16le(header, 0);
  if (n < FRAME_HEADER_LEN) throw new WireError({ code: "invalid_frame_length", message: `length ${n}` });
  return n - FRAME_HEADER_LEN;
}

// writeFrame writes one frame and flushes.
export async function writeFrame(stream: DuplexStream, payload: Uint8Array): Promise<void> {
  await stream.write(encodeFrame(payload));
  await stream.flush();
}

// readFrame reads one whole frame and returns its payload.
export async function readFrame(stream: DuplexStream): Promise<Uint8Array> {
  const header = await stream.readExactly(FRAME_HEADER_LEN);
  return await stream.readExactly(decodeFrameLength(header));
}
