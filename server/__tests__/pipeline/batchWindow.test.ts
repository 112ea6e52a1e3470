import { describe, it, expect } from "vitest";
import { BatchWindow, EventQueue } from "../../pipeline/batchWindow";
import { T0 } from "../fakes";

const HOUR = 60 * 60 * 1000;

function at(offsetMs: number): string {
  return new Date(T0 + offsetMs).toISOString();
}

describe("EventQueue", () => {
  it("returns events oldest first regardless of insertion order", () => {
    const queue = new EventQueue();
    queue.add("user-1", { id: "b", eventAt: at(2000) });
    queue.add("user-1", { id: "a", eventAt: at(1000) });
    queue.add("user-1", { id: "c", eventAt: at(3000) });

    expect(queue.peek("user-1").map((e) => e.id)).toEqual(["a", "b", "c"]);
    expect(queue.oldestEventAt("user-1")).toBe(at(1000));
  });

  it("does not duplicate an event added twice", () => {
    const queue = new EventQueue();
    queue.add("user-1", { id: "a", eventAt: at(0) });
    queue.add("user-1", { id: "a", eventAt: at(0) });
    expect(queue.size("user-1")).toBe(1);
  });

  it("drains at most the requested number and leaves the rest", () => {
    const queue = new EventQueue();
    for (let i = 0; i < 4; i++) {
      queue.add("user-1", { id: `e${i}`, eventAt: at(i * 1000) });
    }

    expect(queue.drain("user-1", 3).map((e) => e.id)).toEqual(["e0", "e1", "e2"]);
    expect(queue.peek("user-1").map((e) => e.id)).toEqual(["e3"]);
    expect(queue.drain("user-1", 10).map((e) => e.id)).toEqual(["e3"]);
    expect(queue.users()).toEqual([]);
  });

  it("removes single events", () => {
    const queue = new EventQueue();
    queue.add("user-1", { id: "a", eventAt: at(0) });
    queue.remove("user-1", "a");
    queue.remove("user-2", "missing");
    expect(queue.has("user-1", "a")).toBe(false);
    expect(queue.size("user-1")).toBe(0);
  });
});

describe("BatchWindow", () => {
  it("flushes once the trigger count is reached", () => {
    const window = new BatchWindow(5, 12 * HOUR);
    for (let i = 0; i < 4; i++) {
      window.add("user-1", { id: `e${i}`, eventAt: at(i) });
    }
    expect(window.flushReason("user-1", T0)).toBeNull();

    window.add("user-1", { id: "e4", eventAt: at(4) });
    expect(window.flushReason("user-1", T0)).toBe("count");
  });

  it("flushes when the oldest event has waited the maximum", () => {
    const window = new BatchWindow(5, 12 * HOUR);
    window.add("user-1", { id: "e0", eventAt: at(0) });

    expect(window.flushReason("user-1", T0 + 12 * HOUR - 1)).toBeNull();
    expect(window.flushReason("user-1", T0 + 12 * HOUR)).toBe("max_wait");
  });

  it("never flushes an empty window", () => {
    const window = new BatchWindow(1, 0);
    expect(window.flushReason("user-1", T0)).toBeNull();
  });

  it("reports stats", () => {
    const window = new BatchWindow(5, 12 * HOUR);
    window.add("user-1", { id: "e0", eventAt: at(0) });
    window.add("user-1", { id: "e1", eventAt: at(HOUR) });

    expect(window.stats("user-1", T0 + 13 * HOUR)).toEqual({
      size: 2,
      oldestEventAt: at(0),
      flushReason: "max_wait",
    });
  });
});
