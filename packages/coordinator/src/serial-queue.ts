import { err, type Result, type SensorgateError } from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import { createError, createQueueClosedError, describeError } from "./errors.js";
import type { CoordinatorTelemetryContext } from "./telemetry.js";
import { defaultScheduler, type ScheduledTimer, type Scheduler } from "./types.js";

export type QueueTask<T> = () => T | Promise<T>;

export interface SerialWorkQueueOptions {
  readonly telemetry: CoordinatorTelemetryContext;
  readonly scheduler?: Scheduler;
}

const settle = (): void => undefined;

/**
 * Single-consumer work queue. Every coordinator state change runs as a task here, one at a
 * time and in arrival order; a task that awaits keeps the queue until it finishes.
 */
export class SerialWorkQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;
  private readonly timers = new Set<ScheduledTimer>();
  private readonly scheduler: Scheduler;
  private readonly logger: SensorgateLogger;

  constructor(private readonly options: SerialWorkQueueOptions) {
    this.scheduler = options.scheduler ?? defaultScheduler;
    this.logger = options.telemetry.logger.child({ component: "serial-queue" });
  }

  get depth(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queues a task whose result the caller waits for. A thrown error becomes `sensor.task_failed`.
   */
  run<T>(
    label: string,
    task: QueueTask<Result<T, SensorgateError>>,
  ): Promise<Result<T, SensorgateError>> {
    if (this.closed) {
      this.logger.warn("queue.task_rejected", { task: label });
      return Promise.resolve(err(createQueueClosedError(label)));
    }

    return this.enqueue(label, task).catch((error: unknown) => {
      this.logger.error("queue.task_failed", { task: label, error: describeError(error) });
      return err(createError("sensor.task_failed", `Queued task ${label} failed.`, { task: label, cause: describeError(error) }));
    });
  }

  /**
   * Queues a task nobody waits for: driver events, death signals, timer firings.
   */
  dispatch(label: string, task: QueueTask<void>): void {
    if (this.closed) {
      this.logger.warn("queue.task_dropped", { task: label });
      return;
    }

    void this.enqueue(label, task).catch((error: unknown) => {
      this.logger.error("queue.task_failed", { task: label, error: describeError(error) });
    });
  }

  /**
   * Schedules a task that is dispatched onto the queue when the delay elapses.
   */
  schedule(label: string, delayMs: number, task: QueueTask<void>): ScheduledTimer {
    const handle: ScheduledTimer = {
      cancel: () => {
        timer.cancel();
        this.timers.delete(handle);
      },
    };
    const timer = this.scheduler.schedule(delayMs, () => {
      this.timers.delete(handle);
      this.dispatch(label, task);
    });
    this.timers.add(handle);
    return handle;
  }

  async whenIdle(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  /**
   * Stops accepting work and cancels pending timers. Tasks already queued still run.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const timer of Array.from(this.timers)) {
      timer.cancel();
    }
    this.logger.debug("queue.closed", { pending: this.pending });
  }

  private enqueue<T>(label: string, task: QueueTask<T>): Promise<T> {
    this.pending += 1;
    const execution = this.tail.then(() => this.execute(label, task));
    this.tail = execution.then(settle, settle);
    return execution;
  }

  private async execute<T>(label: string, task: QueueTask<T>): Promise<T> {
    const start = performance.now();
    let outcome: "ok" | "error" = "ok";
    try {
      return await task();
    } catch (error) {
      outcome = "error";
      throw error;
    } finally {
      this.pending -= 1;
      this.options.telemetry.metrics.taskDuration.record(performance.now() - start, { task: label, outcome });
    }
  }
}
