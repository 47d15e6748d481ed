import { describe, it, expect } from "vitest";
import { CircuitBreaker, breakerKey } from "./circuit-breaker.js";

function clock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("breakerKey", () => {
  it("joins category, model and task", () => {
    expect(breakerKey("network")).toBe("network");
    expect(breakerKey("model-adapter", { modelName: "luma" })).toBe("model-adapter_luma");
    expect(breakerKey("generation", { modelName: "pika", taskId: "t1" })).toBe("generation_pika_t1");
    expect(breakerKey("workflow", { taskId: "t1" })).toBe("workflow_t1");
  });
});

describe("CircuitBreaker", () => {
  it("opens after five failures inside the cooldown", () => {
    const time = clock();
    const breaker = new CircuitBreaker({ now: time.now });

    for (let i = 0; i < 4; i++) breaker.recordFailure("k");
    expect(breaker.isOpen("k")).toBe(false);

    breaker.recordFailure("k");
    expect(breaker.isOpen("k")).toBe(true);
    expect(breaker.getState("k")?.failureCount).toBe(5);
  });

  it("resets the counter on success", () => {
    const breaker = new CircuitBreaker();
    for (let i = 0; i < 4; i++) breaker.recordFailure("k");

    breaker.recordSuccess("k");
    breaker.recordFailure("k");

    expect(breaker.getState("k")?.failureCount).toBe(1);
    expect(breaker.isOpen("k")).toBe(false);
  });

  it("clears itself once the cooldown elapses", () => {
    const time = clock(1_000);
    const breaker = new CircuitBreaker({ now: time.now, cooldownMs: 300_000 });
    for (let i = 0; i < 5; i++) breaker.recordFailure("k");

    time.advance(299_999);
    expect(breaker.isOpen("k")).toBe(true);

    time.advance(1);
    expect(breaker.isOpen("k")).toBe(false);
    expect(breaker.getState("k")).toEqual({ failureCount: 0 });
  });

  it("keeps keys independent", () => {
    const breaker = new CircuitBreaker({ threshold: 2 });
    breaker.recordFailure("a");
    breaker.recordFailure("a");

    expect(breaker.isOpen("a")).toBe(true);
    expect(breaker.isOpen("b")).toBe(false);
  });
});
