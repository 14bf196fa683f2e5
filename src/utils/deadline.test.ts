import { describe, expect, test } from "vitest";
import { deadlineFromTimeout, withDeadline } from "./deadline.js";
import { AbortError, TimeoutError } from "./errors.js";

describe("deadlineFromTimeout", () => {
  test("zero disables the deadline", () => {
    expect(deadlineFromTimeout(0, 1000)).toBeNull();
    expect(deadlineFromTimeout(undefined, 0)).toBeNull();
  });

  test("falls back when unset", () => {
    const before = Date.now();
    const d = deadlineFromTimeout(undefined, 1000);
    expect(d).not.toBeNull();
    expect(d ?? 0).toBeGreaterThanOrEqual(before + 1000);
  });

  test("rejects negative timeouts", () => {
    expect(() => deadlineFromTimeout(-1, 0)).toThrow("timeoutMs must be >= 0");
  });
});

describe("withDeadline", () => {
  test("passes through the result", async () => {
    await expect(withDeadline(Promise.resolve(3), Date.now() + 1000)).resolves.toBe(3);
    await expect(withDeadline(Promise.resolve(4), null)).resolves.toBe(4);
  });

  test("times out and runs onCancel", async () => {
    let canceled = 0;
    const never = new Promise<number>(() => {});
    await expect(withDeadline(never, Date.now() + 10, { onCancel: () => canceled++ })).rejects.toBeInstanceOf(TimeoutError);
    expect(canceled).toBe(1);
  });

  test("an expired deadline fails immediately", async () => {
    await expect(withDeadline(Promise.resolve(1), Date.now() - 1)).rejects.toBeInstanceOf(TimeoutError);
  });

  test("abort wins over a pending operation", async () => {
    const ac = new AbortController();
    let canceled = 0;
    const p = withDeadline(new Promise<number>(() => {}), null, { signal: ac.signal, onCancel: () => canceled++ });
    ac.abort();
    await expect(p).rejects.toBeInstanceOf(AbortError);
    expect(canceled).toBe(1);
  });

  test("an already aborted signal fails without waiting", async () => {
    const ac = new AbortController();
    ac.abort();
    await expect(withDeadline(Promise.resolve(1), null, { signal: ac.signal })).rejects.toThrow("canceled");
  });
});
