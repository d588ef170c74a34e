import { describe, it, expect } from "vitest";
import { RequestRegistry } from "../services/requestRegistry";

describe("RequestRegistry", () => {
  it("flags a repeated request id as duplicate", () => {
    const registry = new RequestRegistry();
    expect(registry.admit("req-1")).toBe("accepted");
    expect(registry.admit("req-1")).toBe("duplicate");
    expect(registry.admit("req-2")).toBe("accepted");
  });

  it("remembers a cancel that arrives before the request", () => {
    const registry = new RequestRegistry();
    expect(registry.cancel("req-1")).toBe(true);
    expect(registry.admit("req-1")).toBe("accepted");
    expect(registry.isCancelled("req-1")).toBe(true);
  });

  it("refuses to cancel once processing has started", () => {
    const registry = new RequestRegistry();
    registry.admit("req-1");
    expect(registry.cancel("req-1")).toBe(true);

    registry.admit("req-2");
    registry.markStarted("req-2");
    expect(registry.cancel("req-2")).toBe(false);
    expect(registry.isCancelled("req-2")).toBe(false);

    registry.markCompleted("req-2");
    expect(registry.cancel("req-2")).toBe(false);
  });

  it("prunes expired entries once full but keeps started ones", () => {
    let clock = 0;
    const registry = new RequestRegistry({ maxSize: 2, ttlMs: 1000, now: () => clock });

    registry.admit("req-a");
    registry.markStarted("req-a");
    registry.admit("req-b");
    registry.markCompleted("req-b");

    clock = 5000;
    expect(registry.admit("req-c")).toBe("accepted");
    expect(registry.size()).toBe(2);
    expect(registry.admit("req-a")).toBe("duplicate");
  });

  it("drops the oldest completed entry when nothing has expired", () => {
    let clock = 0;
    const registry = new RequestRegistry({ maxSize: 2, ttlMs: 1_000_000, now: () => clock });

    clock = 1;
    registry.admit("req-a");
    registry.markCompleted("req-a");
    clock = 2;
    registry.admit("req-b");
    registry.markCompleted("req-b");

    clock = 3;
    registry.admit("req-c");
    expect(registry.size()).toBe(2);
    expect(registry.admit("req-a")).toBe("accepted");
  });
});
