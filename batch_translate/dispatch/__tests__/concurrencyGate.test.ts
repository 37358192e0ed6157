import { describe, expect, it } from "vitest";
import { ConcurrencyGate } from "../concurrencyGate.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ConcurrencyGate", () => {
  it("rejects non-positive or fractional limits", () => {
    expect(() => new ConcurrencyGate(0)).toThrow(RangeError);
    expect(() => new ConcurrencyGate(1.5)).toThrow(RangeError);
  });

  it("queues acquirers beyond the limit and serves them in order", async () => {
    const gate = new ConcurrencyGate(2);
    const order: string[] = [];

    await gate.acquire();
    await gate.acquire();
    expect(gate.inFlight).toBe(2);

    const third = gate.acquire().then(() => order.push("third"));
    const fourth = gate.acquire().then(() => order.push("fourth"));
    expect(gate.waiting).toBe(2);

    gate.release();
    await third;
    expect(order).toEqual(["third"]);
    expect(gate.inFlight).toBe(2);

    gate.release();
    await fourth;
    expect(order).toEqual(["third", "fourth"]);

    gate.release();
    gate.release();
    expect(gate.inFlight).toBe(0);
    expect(gate.waiting).toBe(0);
  });

  it("throws on release without acquire", () => {
    const gate = new ConcurrencyGate(1);
    expect(() => gate.release()).toThrow("without a matching acquire");
  });

  it("releases the slot when the task rejects", async () => {
    const gate = new ConcurrencyGate(1);
    await expect(gate.run(async () => Promise.reject(new Error("nope")))).rejects.toThrow("nope");
    expect(gate.inFlight).toBe(0);

    const gateOpen = deferred();
    const running = gate.run(() => gateOpen.promise);
    expect(gate.inFlight).toBe(1);
    gateOpen.resolve();
    await running;
    expect(gate.inFlight).toBe(0);
  });
});
