import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SyncScheduler } from "./sync-scheduler";
import type { SyncCycleSummary } from "../value-objects/cycle-summary";
import { cycleSummary, flushMicrotasks } from "../testing/fakes";

type Run = { signal: AbortSignal; finish: () => void; fail: (err: Error) => void };

/** A runCycle whose cycles stay open until the test finishes them; an abort ends them as cancelled. */
function controlledCycles() {
  const runs: Run[] = [];
  const runCycle = (signal: AbortSignal) =>
    new Promise<SyncCycleSummary>((resolve, reject) => {
      signal.addEventListener("abort", () => resolve(cycleSummary("cancelled")), { once: true });
      runs.push({ signal, finish: () => resolve(cycleSummary("synced")), fail: reject });
    });
  return { runs, runCycle };
}

describe("SyncScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("collapses triggers inside the quiet period into one cycle", () => {
    const { runs, runCycle } = controlledCycles();
    const scheduler = new SyncScheduler({ runCycle, debounceMs: 1000 });

    scheduler.trigger("filesystem");
    vi.advanceTimersByTime(600);
    scheduler.trigger("filesystem");
    vi.advanceTimersByTime(600);
    expect(runs).toHaveLength(0);
    expect(scheduler.state).toBe("debouncing");

    vi.advanceTimersByTime(400);
    expect(runs).toHaveLength(1);
    expect(scheduler.state).toBe("running");
  });

  it("queues one rerun for any number of triggers while running", async () => {
    const { runs, runCycle } = controlledCycles();
    const seen: string[] = [];
    const scheduler = new SyncScheduler({ runCycle, debounceMs: 100, onCycle: (s) => seen.push(s.status) });

    scheduler.trigger("startup");
    vi.advanceTimersByTime(100);
    scheduler.trigger("filesystem");
    scheduler.trigger("timer");
    scheduler.trigger("manual");
    expect(scheduler.hasPendingRerun).toBe(true);

    runs[0]?.finish();
    await flushMicrotasks();
    expect(runs).toHaveLength(2);
    expect(scheduler.state).toBe("running");
    expect(scheduler.hasPendingRerun).toBe(false);

    runs[1]?.finish();
    await flushMicrotasks();
    expect(runs).toHaveLength(2);
    expect(scheduler.state).toBe("idle");
    expect(scheduler.completedCycles).toBe(2);
    expect(seen).toEqual(["synced", "synced"]);
  });

  it("returns to idle after a cycle that throws", async () => {
    const { runs, runCycle } = controlledCycles();
    const scheduler = new SyncScheduler({ runCycle, debounceMs: 10 });

    scheduler.trigger("manual");
    vi.advanceTimersByTime(10);
    runs[0]?.fail(new Error("boom"));
    await flushMicrotasks();

    expect(scheduler.state).toBe("idle");
    expect(scheduler.completedCycles).toBe(0);

    scheduler.trigger("manual");
    vi.advanceTimersByTime(10);
    expect(runs).toHaveLength(2);
  });

  it("stop cancels the running cycle and ignores later triggers", async () => {
    const { runs, runCycle } = controlledCycles();
    const seen: string[] = [];
    const scheduler = new SyncScheduler({ runCycle, debounceMs: 10, onCycle: (s) => seen.push(s.status) });

    scheduler.trigger("manual");
    vi.advanceTimersByTime(10);
    scheduler.trigger("filesystem");

    await scheduler.stop();

    expect(runs[0]?.signal.aborted).toBe(true);
    expect(seen).toEqual(["cancelled"]);
    expect(scheduler.state).toBe("stopped");

    scheduler.trigger("manual");
    vi.advanceTimersByTime(1000);
    expect(runs).toHaveLength(1);
  });

  it("stop while debouncing never starts the cycle", async () => {
    const { runs, runCycle } = controlledCycles();
    const scheduler = new SyncScheduler({ runCycle, debounceMs: 10 });

    scheduler.trigger("filesystem");
    await scheduler.stop();
    vi.advanceTimersByTime(100);

    expect(runs).toHaveLength(0);
  });
});
