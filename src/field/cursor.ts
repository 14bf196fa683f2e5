import { concatBytes } from "../utils/bin.js";
import { WireError } from "../utils/errors.js";

// ByteCursor consumes a buffer front to back.
export class ByteCursor {
  private off: number;

  constructor(private readonly buf: Uint8Array, offset = 0) {
    if (!Number.isSafeInteger(offset) || offset < 0 || offset > buf.length) throw new RangeError("invalid offset");
    this.off = offset;
  }

  get offset(): number {
    return this.off;
  }

  remaining(): number {
    return this.buf.length - this.off;
  }

  // take returns the next n bytes as a view, or throws truncated naming the field.
  take(n: number, field: string): Uint8Array {
    if (this.remaining() < n) {
      throw new WireError({ code: "truncated", field, message: `need ${n} bytes, have ${this.remaining()}` });
    }
    const out = this.buf.subarray(this.off, this.off + n);
    this.off += n;
    return out;
  }
}

// ByteWriter collects encoded chunks.
export class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  push(chunk: Uint8Array): void {
    this.chunks.push(chunk);
    this.total += chunk.length;
  }

  get length(): number {
    return this.total;
  }

  finish(): Uint8Array {
    return concatBytes(this.chunks);
  }
}
