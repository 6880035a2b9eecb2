/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { ScheduledTask, Scheduler, TimerHandle } from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used by tests and simulations.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued tasks and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). Tasks due at the same
 * time run in the order they were scheduled, and each task is awaited before the next one starts.
 */
interface QueuedTask {
  readonly handle: TimerHandle;
  readonly at: TimePoint;
  readonly task: ScheduledTask;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly QueuedTask[];
}

export class InMemoryScheduler implements Scheduler {
  #state: SchedulerState;
  #nextHandle = 1;

  constructor(startAt: TimePoint = 0) {
    this.#state = { now: startAt, queue: [] };
  }

  now(): TimePoint {
    return this.#state.now;
  }

  get pendingCount(): number {
    return this.#state.queue.length;
  }

  scheduleTimeout(delayMs: number, task: ScheduledTask): TimerHandle {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const entry: QueuedTask = {
      handle: this.#nextHandle++,
      at: this.#state.now + delayMs,
      task,
    };
    const insertAt = this.#state.queue.findIndex((existing) => existing.at > entry.at);
    const queue =
      insertAt === -1
        ? [...this.#state.queue, entry]
        : [
            ...this.#state.queue.slice(0, insertAt),
            entry,
            ...this.#state.queue.slice(insertAt),
          ];

    this.#state = { ...this.#state, queue };
    return entry.handle;
  }

  cancel(handle: TimerHandle): void {
    this.#state = {
      ...this.#state,
      queue: this.#state.queue.filter((entry) => entry.handle !== handle),
    };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;

    while (this.#state.queue.length > 0) {
      const [next, ...remaining] = this.#state.queue;
      if (!next) {
        break;
      }
      if (next.at > targetTime) {
        break;
      }

      this.#state = { now: next.at, queue: remaining };
      await next.task();
    }

    this.#state = { ...this.#state, now: targetTime };
  }
}
