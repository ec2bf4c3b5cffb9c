import type { Logger } from "../ports/logger";
import { systemClock, type Clock, type TimerHandle } from "../ports/clock";
import type { SyncCycleSummary } from "../value-objects/cycle-summary";
import { silentLogger } from "../adapters/console-logger";
import { describeError } from "../application/errors";

export type TriggerSource = "startup" | "filesystem" | "timer" | "manual";

export type SchedulerState = "idle" | "debouncing" | "running" | "stopped";

export type SyncSchedulerDeps = {
  runCycle: (signal: AbortSignal) => Promise<SyncCycleSummary>;
  /** Quiet period between the first trigger and the cycle start while idle. */
  debounceMs: number;
  clock?: Clock;
  logger?: Logger;
  onCycle?: (summary: SyncCycleSummary) => void;
};

/**
 * At most one cycle in flight per project.
 *
 *   idle --trigger--> debouncing --timer--> running
 *   running --trigger--> running (pending)
 *   running --done, pending--> running
 *   running --done--> idle
 *
 * Triggers inside the debounce window restart the window and collapse into
 * one cycle; triggers while running collapse into one pending rerun.
 */
export class SyncScheduler {
  private current: SchedulerState = "idle";
  private pending = false;
  private timer: TimerHandle | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private cycles = 0;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: SyncSchedulerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get hasPendingRerun(): boolean {
    return this.pending;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  trigger(source: TriggerSource): void {
    switch (this.current) {
      case "stopped":
        return;
      case "running":
        if (!this.pending) this.logger.debug("trigger while running; rerun queued", { source });
        this.pending = true;
        return;
      case "debouncing":
      case "idle":
        this.arm(source);
        return;
    }
  }

  /** Aborts the running cycle, drops any pending rerun and waits for the cycle to settle. */
  async stop(): Promise<void> {
    this.current = "stopped";
    this.pending = false;
    if (this.timer !== null) {
      this.clock.clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    await this.inFlight;
  }

  private arm(source: TriggerSource): void {
    if (this.timer !== null) this.clock.clearTimeout(this.timer);
    this.current = "debouncing";
    this.logger.debug("trigger", { source, debounceMs: this.deps.debounceMs });
    this.timer = this.clock.setTimeout(() => {
      this.timer = null;
      this.start();
    }, this.deps.debounceMs);
  }

  private start(): void {
    if (this.current === "stopped") return;
    this.current = "running";
    this.pending = false;

    const controller = new AbortController();
    this.controller = controller;

    this.inFlight = this.deps
      .runCycle(controller.signal)
      .then((summary) => {
        this.cycles += 1;
        this.deps.onCycle?.(summary);
      })
      .catch((err: unknown) => {
        this.logger.error("sync cycle threw", { error: describeError(err) });
      })
      .finally(() => {
        this.controller = null;
        this.inFlight = null;
        this.settle();
      });
  }

  private settle(): void {
    if (this.current === "stopped") return;
    if (this.pending) {
      this.start();
      return;
    }
    this.current = "idle";
  }
}
