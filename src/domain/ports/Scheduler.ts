import type { TimePoint } from "../typedefs.js";

export type ScheduledTask = () => Promise<void> | void;

/** Opaque handle of a pending timeout */
export type TimerHandle = number;

/**
 * Infrastructure abstraction responsible for driving every periodic activity of a match.
 *
 * Implementations may rely on real timers or a virtual clock. A task runs at most once; a task
 * that wants to repeat schedules its successor itself, so iterations of one activity never
 * overlap. Tasks are expected to contain their own failures.
 */
export interface Scheduler {
  now(): TimePoint;
  scheduleTimeout(delayMs: number, task: ScheduledTask): TimerHandle;
  cancel(handle: TimerHandle): void;
}
