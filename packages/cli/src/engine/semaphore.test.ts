import { describe, it, expect } from "vitest";
import { Semaphore } from "./semaphore.js";

describe("Semaphore", () => {
  it("hands out permits until none are left", async () => {
    const semaphore = new Semaphore(2);
    await semaphore.acquire();
    expect(semaphore.getAvailablePermits()).toBe(1);

    semaphore.release();
    expect(semaphore.getAvailablePermits()).toBe(2);
  });

  it("queues waiters in FIFO order", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    const order: number[] = [];
    const first = semaphore.acquire().then(() => order.push(1));
    const second = semaphore.acquire().then(() => order.push(2));
    expect(semaphore.getQueueDepth()).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual([1, 2]);
    expect(semaphore.getQueueDepth()).toBe(0);
  });

  it("drops a waiter that times out", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    await expect(semaphore.acquire(20)).rejects.toThrow("Semaphore acquire timeout after 20ms");
    expect(semaphore.getQueueDepth()).toBe(0);
  });

  it("never holds more than its permits", async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.runExclusive(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 5));
          running--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(semaphore.getAvailablePermits()).toBe(2);
  });

  it("releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(semaphore.getAvailablePermits()).toBe(1);
  });

  it("needs at least one permit", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});
