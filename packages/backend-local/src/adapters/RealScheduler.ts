/* eslint-disable functional/immutable-data */
import type { Logger, ScheduledTask, Scheduler, TimePoint, TimerHandle } from "../core.js";

export interface RealSchedulerOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: () => TimePoint;
}

export class RealScheduler implements Scheduler {
  readonly #timers = new Map<TimerHandle, ReturnType<typeof setTimeout>>();
  readonly #logger: Logger | undefined;
  readonly #clock: () => TimePoint;
  #nextHandle = 1;

  constructor(options: RealSchedulerOptions = {}) {
    this.#logger = options.logger;
    this.#clock = options.clock ?? Date.now;
  }

  now(): TimePoint {
    return this.#clock();
  }

  get pendingCount(): number {
    return this.#timers.size;
  }

  scheduleTimeout(delayMs: number, task: ScheduledTask): TimerHandle {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const handle = this.#nextHandle++;
    const timer = setTimeout(async () => {
      this.#timers.delete(handle);
      try {
        await task();
      } catch (error) {
        this.#logger?.error?.("Scheduled task failed", { handle, delayMs, error });
      }
    }, delayMs);

    this.#timers.set(handle, timer);
    this.#logger?.debug?.("Timeout scheduled", { handle, delayMs });
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timer = this.#timers.get(handle);
    if (timer === undefined) {
      return;
    }
    clearTimeout(timer);
    this.#timers.delete(handle);
  }

  /** Cancels every pending timeout, e.g. on shutdown. */
  dispose(): void {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
