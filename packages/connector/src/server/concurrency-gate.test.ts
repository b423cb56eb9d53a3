import { describe, expect, test } from "vitest";
import { ConcurrencyGate } from "./concurrency-gate.js";
import { BackendError } from "./errors.js";

describe("ConcurrencyGate", () => {
  test("grants up to maxActive slots immediately", async () => {
    const gate = new ConcurrencyGate({ maxActive: 2, maxQueued: 0 });
    await gate.acquire();
    await gate.acquire();
    expect(gate.activeCount).toBe(2);
  });

  test("queues callers and hands released slots over in order", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 2 });
    const release = await gate.acquire();
    const order: string[] = [];
    const second = gate.acquire().then((next) => {
      order.push("second");
      return next;
    });
    const third = gate.acquire().then((next) => {
      order.push("third");
      return next;
    });
    expect(gate.queuedCount).toBe(2);

    release();
    const releaseSecond = await second;
    expect(order).toEqual(["second"]);
    expect(gate.activeCount).toBe(1);

    releaseSecond();
    await third;
    expect(order).toEqual(["second", "third"]);
    expect(gate.queuedCount).toBe(0);
  });

  test("rejects with overloaded once the queue is full", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 1 });
    await gate.acquire();
    void gate.acquire();

    const rejection = gate.acquire();
    await expect(rejection).rejects.toBeInstanceOf(BackendError);
    await expect(rejection).rejects.toMatchObject({
      kind: "overloaded",
      code: "overloaded",
      message: "Backend busy: 1 in flight, 1 queued",
    });
  });

  test("release is idempotent", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 0 });
    const release = await gate.acquire();
    release();
    release();
    expect(gate.activeCount).toBe(0);
  });

  test("removes an aborted waiter from the queue", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 1 });
    const release = await gate.acquire();
    const controller = new AbortController();
    const waiting = gate.acquire(controller.signal);

    controller.abort();
    await expect(waiting).rejects.toMatchObject({ kind: "cancelled" });
    expect(gate.queuedCount).toBe(0);

    release();
    expect(gate.activeCount).toBe(0);
  });

  test("rejects an already-aborted signal without taking a slot", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 1 });
    await expect(gate.acquire(AbortSignal.abort())).rejects.toMatchObject({ kind: "cancelled" });
    expect(gate.activeCount).toBe(0);
  });

  test("close rejects queued and future callers", async () => {
    const gate = new ConcurrencyGate({ maxActive: 1, maxQueued: 1 });
    await gate.acquire();
    const waiting = gate.acquire();
    const closed = new Error("closed");

    gate.close(closed);

    await expect(waiting).rejects.toBe(closed);
    await expect(gate.acquire()).rejects.toBe(closed);
  });

  test("requires at least one active slot", () => {
    expect(() => new ConcurrencyGate({ maxActive: 0, maxQueued: 1 })).toThrow(
      "maxActive must be at least 1 (got 0)"
    );
  });
});
