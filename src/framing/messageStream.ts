import type { DecodeOptions } from "../field/codec.js";
import type { MessageCodec } from "../message/codec.js";
import type { MessageType } from "../message/types.js";
import { normalizeObserver, type ProtocolObserver, type ProtocolObserverLike } from "../observability/observer.js";
import { assertPacketOptions, openPacket, sealPacket, type PacketOptions } from "../packet/packet.js";
import { isWireError } from "../utils/errors.js";
import { readFrame, writeFrame, type DuplexStream } from "./frame.js";

export type MessageStreamOptions = Readonly<{
  /** Per-field decode limits. */
  decode?: DecodeOptions;
  /** Checksum and encryption stages applied to every frame payload. */
  packet?: PacketOptions;
  observer?: ProtocolObserverLike;
}>;

// MessageStream reads and writes whole codec messages over a framed duplex stream.
//
// Decoding happens only after a full frame has been buffered.
export class MessageStream<M extends Readonly<{ type: string }>> {
  private readonly observer: ProtocolObserver;
  private readonly decodeOpts: DecodeOptions;
  private readonly packetOpts: PacketOptions;

  constructor(
    readonly stream: DuplexStream,
    readonly codec: MessageCodec<M>,
    opts: MessageStreamOptions = {}
  ) {
    this.observer = normalizeObserver(opts.observer);
    this.decodeOpts = opts.decode ?? {};
    this.packetOpts = opts.packet ?? {};
    assertPacketOptions(this.packetOpts);
  }

  // writeMessage encodes, frames, writes and flushes one message.
  async writeMessage(message: M): Promise<void> {
    const payload = sealPacket(this.codec.encode(message), this.packetOpts);
    await writeFrame(this.stream, payload);
    this.observer.onFrame("write", message.type, payload.length);
  }

  // readMessage reads one frame and decodes it with the codec.
  async readMessage(): Promise<M> {
    const payload = await readFrame(this.stream);
    let message: M;
    try {
      message = this.codec.decode(openPacket(payload, this.packetOpts), this.decodeOpts);
    } catch (e) {
      if (isWireError(e)) this.observer.onDecodeError(e.code);
      throw e;
    }
    this.observer.onFrame("read", message.type, payload.length);
    return message;
  }

  // readMessageOf reads one message and unwraps it as the given type (type_mismatch otherwise).
  async readMessageOf<T>(type: MessageType<string, T>): Promise<T> {
    return this.codec.unwrap(type, await this.readMessage());
  }

  close(): void {
    this.stream.close();
  }
}
