import { computeBackoffDelayMs, sleep, type BackoffPolicy } from "../../src/shared/retry/backoff";

const policy: BackoffPolicy = { baseDelayMs: 1000, maxIntervalMs: 64_000, maxTotalMs: 172_800_000 };

describe("computeBackoffDelayMs", () => {
  it("doubles from the base delay", () => {
    expect([0, 1, 2, 3].map((attempt) => computeBackoffDelayMs(policy, attempt, 0))).toEqual([1000, 2000, 4000, 8000]);
  });

  it("never exceeds the max interval", () => {
    expect(computeBackoffDelayMs(policy, 6, 0)).toBe(64_000);
    expect(computeBackoffDelayMs(policy, 7, 0)).toBe(64_000);
    expect(computeBackoffDelayMs(policy, 40, 0)).toBe(64_000);
  });

  it("clamps the last wait to the remaining budget", () => {
    expect(computeBackoffDelayMs(policy, 10, 172_799_500)).toBe(500);
  });

  it("returns null once the budget is spent", () => {
    expect(computeBackoffDelayMs(policy, 0, 172_800_000)).toBeNull();
    expect(computeBackoffDelayMs(policy, 0, 172_800_001)).toBeNull();
  });
});

describe("sleep", () => {
  it("resolves immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const startedAt = Date.now();
    await sleep(60_000, controller.signal);
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);
    await sleep(60_000, controller.signal);
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it("waits the requested time without a signal", async () => {
    const startedAt = Date.now();
    await sleep(20);
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(15);
  });
});
