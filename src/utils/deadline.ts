import { AbortError, TimeoutError, throwIfAborted } from "./errors.js";

export type DeadlineOptions = Readonly<{ signal?: AbortSignal; onCancel?: () => void }>;

// deadlineFromTimeout converts a relative timeout into an absolute deadline (null disables).
export function deadlineFromTimeout(timeoutMs: number | undefined, fallbackMs: number): number | null {
  const ms = timeoutMs ?? fallbackMs;
  if (!Number.isFinite(ms) || ms < 0) throw new RangeError("timeoutMs must be >= 0");
  if (ms === 0) return null;
  return Date.now() + ms;
}

// withDeadline races p against an absolute deadline and an optional AbortSignal.
//
// onCancel runs when the deadline or the signal fires first; it is the place to close the
// underlying stream so the losing operation settles.
export async function withDeadline<T>(p: Promise<T>, deadlineMs: number | null, opts: DeadlineOptions = {}): Promise<T> {
  if (opts.signal?.aborted) {
    opts.onCancel?.();
    // The caller has given up on p.
    void p.catch(() => undefined);
    throwIfAborted(opts.signal, "canceled");
  }
  if (deadlineMs == null && opts.signal == null) return await p;
  const remaining = deadlineMs == null ? null : deadlineMs - Date.now();
  if (remaining != null && remaining <= 0) {
    opts.onCancel?.();
    void p.catch(() => undefined);
    throw new TimeoutError("timeout");
  }
  return await new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer != null) clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onAbort);
      fn();
    };
    const onAbort = () => {
      opts.onCancel?.();
      finish(() => reject(new AbortError("canceled")));
    };
    const timer =
      remaining != null
        ? setTimeout(() => {
            opts.onCancel?.();
            finish(() => reject(new TimeoutError("timeout")));
          }, remaining)
        : undefined;
    opts.signal?.addEventListener("abort", onAbort);
    p.then(
      (v) => finish(() => resolve(v)),
      (e: unknown) => finish(() => reject(e))
    );
  });
}
