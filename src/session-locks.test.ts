import { describe, it, expect } from "vitest";
import { SessionLocks } from "./session-locks.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function hold(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

describe("SessionLocks", () => {
  it("runs tasks for one session in the order they were queued", async () => {
    const locks = new SessionLocks();
    const order: string[] = [];
    const first = hold();

    const a = locks.run("e1", "s1", async () => {
      await first.promise;
      order.push("a");
    });
    const b = locks.run("e1", "s1", async () => {
      order.push("b");
    });
    first.release();
    await Promise.all([a, b]);

    expect(order).toEqual(["a", "b"]);
    expect(locks.activeSessions("e1")).toBe(0);
  });

  it("does not hold other sessions behind a busy one", async () => {
    const locks = new SessionLocks();
    const busy = hold();
    const slow = locks.run("e1", "s1", () => busy.promise);

    expect(await locks.run("e1", "s2", async () => "done")).toBe("done");
    expect(await locks.run("e2", "s1", async () => "done")).toBe("done");
    expect(locks.activeSessions("e1")).toBe(1);

    busy.release();
    await slow;
    expect(locks.activeSessions("e1")).toBe(0);
  });

  it("keeps running after a failed task", async () => {
    const locks = new SessionLocks();
    const failed = locks.run("e1", "s1", async () => {
      throw new Error("boom");
    });
    const next = locks.run("e1", "s1", async () => 42);

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe(42);
  });

  it("runs an event task after queued session tasks and before later ones", async () => {
    const locks = new SessionLocks();
    const order: string[] = [];
    const first = hold();

    const before = locks.run("e1", "s1", async () => {
      await first.promise;
      order.push("session before");
    });
    const event = locks.runEvent("e1", async () => {
      order.push("event");
    });
    const after = locks.run("e1", "s2", async () => {
      order.push("session after");
    });
    const elsewhere = locks.run("e2", "s1", async () => {
      order.push("other event");
    });

    await elsewhere;
    expect(order).toEqual(["other event"]);

    first.release();
    await Promise.all([before, event, after]);
    expect(order).toEqual(["other event", "session before", "event", "session after"]);
  });

  it("releases the event after a failed event task", async () => {
    const locks = new SessionLocks();
    const failed = locks.runEvent("e1", async () => {
      throw new Error("boom");
    });
    const next = locks.run("e1", "s1", async () => "ran");

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("ran");
  });
});
