/* eslint-disable functional/immutable-data */
import type { Logger } from "../ports/Logger.js";
import type { Scheduler, TimerHandle } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

export interface Ticker {
  readonly running: boolean;
  stop(): void;
}

export interface TickerOptions {
  readonly name: string;
  readonly intervalMs: number;
  readonly initialDelayMs?: number;
  readonly logger?: Logger | undefined;
}

export type TickFn = (now: TimePoint) => Promise<void> | void;

/**
 * Runs `tick` every `intervalMs`. The next iteration is scheduled only after the
 * current one settles, and a failing iteration is logged without ending the loop.
 */
export function startTicker(
  scheduler: Scheduler,
  options: TickerOptions,
  tick: TickFn,
): Ticker {
  return new ScheduledTicker(scheduler, options, tick);
}

class ScheduledTicker implements Ticker {
  readonly #scheduler: Scheduler;
  readonly #options: TickerOptions;
  readonly #tick: TickFn;
  #handle: TimerHandle | undefined;
  #running = true;

  constructor(scheduler: Scheduler, options: TickerOptions, tick: TickFn) {
    this.#scheduler = scheduler;
    this.#options = options;
    this.#tick = tick;
    this.#schedule(options.initialDelayMs ?? options.intervalMs);
  }

  get running(): boolean {
    return this.#running;
  }

  stop(): void {
    this.#running = false;
    if (this.#handle !== undefined) {
      this.#scheduler.cancel(this.#handle);
      this.#handle = undefined;
    }
  }

  #schedule(delayMs: number): void {
    this.#handle = this.#scheduler.scheduleTimeout(delayMs, () => this.#run());
  }

  async #run(): Promise<void> {
    this.#handle = undefined;
    if (!this.#running) {
      return;
    }

    try {
      await this.#tick(this.#scheduler.now());
    } catch (error) {
      this.#options.logger?.error?.("Tick failed; retrying on next tick", {
        ticker: this.#options.name,
        error,
      });
    }

    if (this.#running) {
      this.#schedule(this.#options.intervalMs);
    }
  }
}
