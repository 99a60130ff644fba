import type { SensorgateLogger } from "@sensorgate/telemetry";

import type { SerialWorkQueue } from "./serial-queue.js";
import type { CoordinatorTelemetryContext } from "./telemetry.js";
import { defaultClock, type Clock, type ScheduledTimer } from "./types.js";

export type FailureOutcome = "lockout_entered" | "still_open";

export interface LockoutSnapshot {
  readonly failedAttempts: number;
  readonly locked: boolean;
  readonly lockedUntil?: string;
}

export interface LockoutPolicyOptions {
  readonly queue: SerialWorkQueue;
  readonly telemetry: CoordinatorTelemetryContext;
  readonly maxFailedAttempts?: number;
  readonly lockoutDurationMs?: number;
  readonly clock?: Clock;
}

export const DEFAULT_MAX_FAILED_ATTEMPTS = 5;
export const DEFAULT_LOCKOUT_DURATION_MS = 30_000;

/**
 * Counts consecutive failed matches. Going past `maxFailedAttempts` locks authentication until a
 * reset timer fires; every further failure re-arms that timer.
 */
export class LockoutPolicy {
  private failedAttempts = 0;
  private lockedUntil: Date | undefined;
  private resetTimer: ScheduledTimer | undefined;
  private readonly maxFailedAttempts: number;
  private readonly lockoutDurationMs: number;
  private readonly clock: Clock;
  private readonly logger: SensorgateLogger;

  constructor(private readonly options: LockoutPolicyOptions) {
    this.maxFailedAttempts = options.maxFailedAttempts ?? DEFAULT_MAX_FAILED_ATTEMPTS;
    this.lockoutDurationMs = options.lockoutDurationMs ?? DEFAULT_LOCKOUT_DURATION_MS;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.telemetry.logger.child({ component: "lockout-policy" });
  }

  isLocked(): boolean {
    return this.failedAttempts > this.maxFailedAttempts;
  }

  get unlockAt(): Date | undefined {
    return this.lockedUntil;
  }

  recordFailure(): FailureOutcome {
    this.failedAttempts += 1;
    if (!this.isLocked()) {
      this.logger.debug("lockout.failure_recorded", { failedAttempts: this.failedAttempts });
      return "still_open";
    }

    this.resetTimer?.cancel();
    this.lockedUntil = new Date(this.clock.now().getTime() + this.lockoutDurationMs);
    this.resetTimer = this.options.queue.schedule("lockout.reset", this.lockoutDurationMs, () => {
      this.resetTimer = undefined;
      this.reset("timer");
    });

    this.options.telemetry.metrics.lockouts.add(1);
    this.logger.warn("lockout.entered", {
      failedAttempts: this.failedAttempts,
      lockedUntil: this.lockedUntil.toISOString(),
    });
    return "lockout_entered";
  }

  /**
   * Clears the count immediately. A pending reset timer is left to fire as a no-op.
   */
  recordSuccess(): void {
    this.reset("success");
  }

  snapshot(): LockoutSnapshot {
    return {
      failedAttempts: this.failedAttempts,
      locked: this.isLocked(),
      lockedUntil: this.lockedUntil?.toISOString(),
    };
  }

  dispose(): void {
    this.resetTimer?.cancel();
    this.resetTimer = undefined;
  }

  private reset(trigger: "timer" | "success"): void {
    if (this.isLocked()) {
      this.logger.info("lockout.reset", { trigger, failedAttempts: this.failedAttempts });
    }
    this.failedAttempts = 0;
    this.lockedUntil = undefined;
  }
}
