import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { TimeoutExceeded } from "../../../core/errors.js";
import { JobSupervisor } from "../../../core/supervisor/job-supervisor.js";

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

function failAfter(ms: number, message: string): Promise<never> {
  return new Promise((_, reject) => setTimeout(() => reject(new Error(message)), ms));
}

describe("JobSupervisor", () => {
  let supervisor: JobSupervisor;

  beforeEach(() => {
    vi.useFakeTimers();
    supervisor = new JobSupervisor();
  });

  afterEach(() => {
    supervisor.dispose();
    vi.useRealTimers();
  });

  it("times out a 5s unit at a 1s deadline", async () => {
    const slow = supervisor.submit("slow", () => delay(5000, "late"));

    const pending = supervisor.awaitAll([slow], 1000);
    await vi.advanceTimersByTimeAsync(1000);
    const outcomes = await pending;

    expect(outcomes.get(slow.id)).toEqual({ state: "timed_out", durationMs: 1000 });
    expect(slow.state).toBe("timed_out");
    expect(slow.signal.aborted).toBe(true);
    expect(slow.signal.reason).toBeInstanceOf(TimeoutExceeded);
  });

  it("keeps the first outcome when a timed-out unit finishes later", async () => {
    const slow = supervisor.submit("slow", () => delay(5000, "late"));

    const pending = supervisor.awaitAll([slow], 1000);
    await vi.advanceTimersByTimeAsync(1000);
    await pending;
    await vi.advanceTimersByTimeAsync(4000);

    expect(slow.outcome).toEqual({ state: "timed_out", durationMs: 1000 });
  });

  it("starts every unit on submit", () => {
    const started: string[] = [];
    supervisor.submit("a", () => {
      started.push("a");
      return delay(10, 1);
    });
    supervisor.submit("b", () => {
      started.push("b");
      return delay(10, 2);
    });

    expect(started).toEqual(["a", "b"]);
  });

  it("keeps waiting for other units after one fails quickly", async () => {
    const fast = supervisor.submit("fast", () => failAfter(100, "scanner crashed"));
    const slow = supervisor.submit("slow", () => delay(300, "findings"));

    const pending = supervisor.awaitAll([fast, slow], 1000);
    await vi.advanceTimersByTimeAsync(300);
    const outcomes = await pending;

    const failed = outcomes.get(fast.id);
    expect(failed?.state).toBe("failed");
    expect(failed?.durationMs).toBe(100);
    if (failed?.state === "failed") {
      expect(failed.error).toBeInstanceOf(Error);
    }
    expect(outcomes.get(slow.id)).toEqual({ state: "completed", value: "findings", durationMs: 300 });
  });

  it("returns as soon as every unit settles and clears its deadline", async () => {
    const a = supervisor.submit("a", () => delay(50, "a"));
    const b = supervisor.submit("b", () => delay(80, "b"));

    const pending = supervisor.awaitAll([a, b], 60_000);
    await vi.advanceTimersByTimeAsync(80);
    const outcomes = await pending;

    expect([...outcomes.values()].map((o) => o.state)).toEqual(["completed", "completed"]);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("times out only the units still running at the deadline", async () => {
    const quick = supervisor.submit("quick", () => delay(200, "ok"));
    const stuck = supervisor.submit("stuck", () => delay(10_000, "never"));

    const pending = supervisor.awaitAll([quick, stuck], 500);
    await vi.advanceTimersByTimeAsync(500);
    const outcomes = await pending;

    expect(outcomes.get(quick.id)).toEqual({ state: "completed", value: "ok", durationMs: 200 });
    expect(outcomes.get(stuck.id)).toEqual({ state: "timed_out", durationMs: 500 });
    expect(quick.signal.aborted).toBe(false);
  });

  it("rejects a non-positive or non-finite timeout", async () => {
    await expect(supervisor.awaitAll([], 0)).rejects.toThrow(RangeError);
    await expect(supervisor.awaitAll([], Number.POSITIVE_INFINITY)).rejects.toThrow(RangeError);
  });

  it("rejects handles it did not create", async () => {
    const other = new JobSupervisor();
    const foreign = other.submit("foreign", () => delay(10, 1));

    await expect(supervisor.awaitAll([foreign], 100)).rejects.toThrow("Unknown work handle: foreign");
    other.dispose();
  });

  it("aborts running units on dispose", () => {
    const handle = supervisor.submit("long", () => delay(10_000, 1));

    supervisor.dispose(new Error("shutting down"));

    expect(handle.signal.aborted).toBe(true);
    expect(handle.state).toBe("running");
  });
});
