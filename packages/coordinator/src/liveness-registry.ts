import type { CallerHandle } from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import { describeError } from "./errors.js";
import type { SerialWorkQueue } from "./serial-queue.js";

export interface LivenessTarget {
  readonly caller: CallerHandle;
}

/**
 * Registration table of caller death watches. A death signal is posted onto the queue and only
 * reaches `onGone` while the target is still registered, so a late signal after teardown is inert.
 */
export class LivenessRegistry<TTarget extends LivenessTarget> {
  private readonly registrations = new Map<TTarget, () => void>();

  constructor(
    private readonly queue: SerialWorkQueue,
    private readonly logger: SensorgateLogger,
  ) {}

  get size(): number {
    return this.registrations.size;
  }

  isRegistered(target: TTarget): boolean {
    return this.registrations.has(target);
  }

  register(target: TTarget, onGone: (target: TTarget) => void | Promise<void>): void {
    if (this.registrations.has(target)) {
      return;
    }

    const signal = () => {
      this.queue.dispatch("caller.gone", async () => {
        if (!this.registrations.has(target)) {
          return;
        }
        await onGone(target);
      });
    };

    try {
      const unsubscribe = target.caller.onGone(signal);
      this.registrations.set(target, unsubscribe);
    } catch (error) {
      // The caller died before we could watch it; treat it as an immediate death signal.
      this.logger.warn("liveness.watch_failed", { callerId: target.caller.id, error: describeError(error) });
      this.registrations.set(target, () => undefined);
      signal();
    }
  }

  /**
   * Drops the registration. Returns false when the target was not (or no longer) registered.
   */
  release(target: TTarget): boolean {
    const unsubscribe = this.registrations.get(target);
    if (!unsubscribe) {
      return false;
    }

    this.registrations.delete(target);
    try {
      unsubscribe();
    } catch (error) {
      this.logger.warn("liveness.unwatch_failed", { callerId: target.caller.id, error: describeError(error) });
    }
    return true;
  }
}
