// ChunkQueue hands pushed chunks to a single sequential consumer.
export class ChunkQueue {
  private readonly items: Uint8Array[] = [];
  private waiter: ((chunk: Uint8Array | null) => void) | null = null;
  private failure: Error | null = null;
  private failWaiter: ((err: Error) => void) | null = null;
  private ended = false;

  // push throws once the queue has ended; producers that can race end() check isEnded() first.
  push(chunk: Uint8Array): void {
    if (this.ended) throw new Error("push after end");
    const w = this.waiter;
    if (w != null) {
      this.clearWaiter();
      w(chunk);
      return;
    }
    this.items.push(chunk);
  }

  // end marks the source as finished; queued chunks are still delivered.
  end(): void {
    if (this.ended) return;
    this.ended = true;
    const w = this.waiter;
    if (w != null) {
      this.clearWaiter();
      w(null);
    }
  }

  // fail ends the source with an error surfaced to the next read.
  fail(err: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = err;
    const w = this.failWaiter;
    if (w != null) {
      this.clearWaiter();
      w(err);
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  next(): Promise<Uint8Array | null> {
    const head = this.items.shift();
    if (head != null) return Promise.resolve(head);
    if (this.failure != null) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    if (this.waiter != null) return Promise.reject(new Error("concurrent read"));
    return new Promise((resolve, reject) => {
      this.waiter = resolve;
      this.failWaiter = reject;
    });
  }

  private clearWaiter(): void {
    this.waiter = null;
    this.failWaiter = null;
  }
}
