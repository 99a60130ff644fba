import type { Clock, ScheduledTimer, Scheduler } from "../types.js";

interface PendingTimer {
  readonly due: number;
  readonly sequence: number;
  readonly callback: () => void;
  cancelled: boolean;
}

/**
 * Virtual clock and timer source. Nothing fires until `advance` moves time past a deadline.
 */
export class ManualScheduler implements Scheduler, Clock {
  private current: number;
  private sequence = 0;
  private timers: PendingTimer[] = [];

  constructor(start: Date = new Date("2026-01-01T00:00:00.000Z")) {
    this.current = start.getTime();
  }

  get pending(): number {
    return this.timers.filter((timer) => !timer.cancelled).length;
  }

  now(): Date {
    return new Date(this.current);
  }

  schedule(delayMs: number, callback: () => void): ScheduledTimer {
    const timer: PendingTimer = {
      due: this.current + Math.max(0, delayMs),
      sequence: this.sequence++,
      callback,
      cancelled: false,
    };
    this.timers.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  /**
   * Moves the clock forward, firing due timers in deadline order.
   */
  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) {
        break;
      }
      this.timers = this.timers.filter((timer) => timer !== next);
      this.current = next.due;
      next.callback();
    }
    this.current = target;
    this.timers = this.timers.filter((timer) => !timer.cancelled);
  }

  private nextDue(limit: number): PendingTimer | undefined {
    let candidate: PendingTimer | undefined;
    for (const timer of this.timers) {
      if (timer.cancelled || timer.due > limit) {
        continue;
      }
      if (!candidate || timer.due < candidate.due || (timer.due === candidate.due && timer.sequence < candidate.sequence)) {
        candidate = timer;
      }
    }
    return candidate;
  }
}
