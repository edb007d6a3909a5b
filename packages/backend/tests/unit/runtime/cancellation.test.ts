import { describe, expect, it, vi } from "vitest";
import { CancelledError } from "../../../src/errors.js";
import { CancellationRegistry, CancellationToken } from "../../../src/runtime/cancellation.js";

describe("CancellationToken", () => {
  it("records the reason and aborts its signal once", () => {
    const token = new CancellationToken("op-1");

    expect(token.cancel("stop now")).toBe(true);
    expect(token.cancel("again")).toBe(false);
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe("stop now");
    expect(token.cancelledAt).toBeInstanceOf(Date);
    expect(token.signal.aborted).toBe(true);
  });

  it("throws a CancelledError after cancellation", () => {
    const token = new CancellationToken("op-2");
    expect(() => token.throwIfCancelled()).not.toThrow();

    token.cancel();

    expect(() => token.throwIfCancelled()).toThrow(CancelledError);
    expect(() => token.throwIfCancelled()).toThrow("Operation op-2 was cancelled: user cancelled");
  });

  it("notifies listeners and honours unsubscribe", () => {
    const token = new CancellationToken("op-3");
    const kept = vi.fn();
    const removed = vi.fn();
    token.onCancel(kept);
    const unsubscribe = token.onCancel(removed);
    unsubscribe();

    token.cancel("bye");

    expect(kept).toHaveBeenCalledWith("bye");
    expect(removed).not.toHaveBeenCalled();
    expect(token.listenerCount()).toBe(0);
  });

  it("runs a late listener immediately", () => {
    const token = new CancellationToken("op-4");
    token.cancel("done");
    const listener = vi.fn();

    token.onCancel(listener);

    expect(listener).toHaveBeenCalledWith("done");
  });

  it("keeps notifying after a listener throws", () => {
    const token = new CancellationToken("op-5");
    const second = vi.fn();
    token.onCancel(() => {
      throw new Error("listener failure");
    });
    token.onCancel(second);

    token.cancel();

    expect(second).toHaveBeenCalledTimes(1);
  });
});

describe("CancellationRegistry", () => {
  it("creates, cancels and releases tokens by id", () => {
    const registry = new CancellationRegistry();
    const token = registry.create("run-1");

    expect(registry.get("run-1")).toBe(token);
    expect(registry.cancel("run-1", "user asked")).toBe(true);
    expect(token.reason).toBe("user asked");
    expect(registry.cancel("missing")).toBe(false);
    expect(registry.release("run-1")).toBe(true);
    expect(registry.get("run-1")).toBeNull();
  });

  it("rejects a duplicate id", () => {
    const registry = new CancellationRegistry();
    registry.create("dup");

    expect(() => registry.create("dup")).toThrow("Cancellation token already registered: dup");
  });

  it("cancels every active token", () => {
    const registry = new CancellationRegistry();
    registry.create("a");
    registry.create("b").cancel();
    registry.create("c");

    expect(registry.cancelAll("shutdown")).toBe(2);
    expect(registry.stats()).toEqual({ total: 3, active: 0, cancelled: 3 });
  });

  it("sweeps tokens older than the ttl", () => {
    let now = 1_000;
    const registry = new CancellationRegistry({ tokenTtlMs: 500, now: () => now });
    registry.create("old");
    now = 1_400;
    registry.create("young");
    now = 1_600;

    expect(registry.sweep()).toBe(1);
    expect(registry.get("old")).toBeNull();
    expect(registry.get("young")).not.toBeNull();
  });
});
