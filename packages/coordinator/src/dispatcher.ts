import { NO_TEMPLATE, SensorErrorCode, type SensorEvent } from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import type { SessionCoordinator, TeardownReason } from "./coordinator.js";
import type { SerialWorkQueue } from "./serial-queue.js";
import type { SensorSession } from "./session.js";
import type { CoordinatorTelemetryContext } from "./telemetry.js";

type EventOf<TType extends SensorEvent["type"]> = Extract<SensorEvent, { type: TType }>;

export interface EventDispatcherOptions {
  readonly queue: SerialWorkQueue;
  readonly coordinator: SessionCoordinator;
  readonly telemetry: CoordinatorTelemetryContext;
}

/**
 * Routes driver events to the active session of the matching kind. `handle` is the listener
 * handed to the driver; it only posts the event onto the queue.
 */
export class EventDispatcher {
  private readonly logger: SensorgateLogger;

  constructor(private readonly options: EventDispatcherOptions) {
    this.logger = options.telemetry.logger.child({ component: "event-dispatcher" });
  }

  readonly handle = (event: SensorEvent): void => {
    this.options.queue.dispatch(`event.${event.type}`, () => this.process(event));
  };

  async process(event: SensorEvent): Promise<void> {
    switch (event.type) {
      case "enroll_progress":
        return this.onEnrollProgress(event);
      case "acquired":
        return this.onAcquired(event);
      case "authenticated":
        return this.onAuthenticated(event);
      case "error":
        return this.onError(event);
      case "removed":
        return this.onRemoved(event);
      case "enumerate":
        return this.onEnumerate(event);
    }
  }

  private get coordinator(): SessionCoordinator {
    return this.options.coordinator;
  }

  private async onEnrollProgress(event: EventOf<"enroll_progress">): Promise<void> {
    const session = this.coordinator.active("enroll");
    if (!session) {
      this.ignore(event);
      return;
    }

    if (event.remaining === 0) {
      await this.coordinator.persistEnrolledTemplate(session.subjectId, event.templateId, event.deviceId);
    }
    const outcome = session.sendEnrollResult(event.templateId, event.subjectId, event.remaining);
    if (outcome === "done") {
      this.coordinator.teardown(session, "completed");
    }
  }

  private onAcquired(event: EventOf<"acquired">): void {
    const session = this.coordinator.active("enroll") ?? this.coordinator.active("authenticate");
    if (!session) {
      this.ignore(event);
      return;
    }

    const outcome = session.sendAcquired(event.acquiredInfo);
    if (outcome === "done") {
      this.coordinator.teardown(session, "completed");
    }
  }

  private async onAuthenticated(event: EventOf<"authenticated">): Promise<void> {
    const session = this.coordinator.active("authenticate");
    if (!session) {
      this.ignore(event);
      return;
    }

    const lockout = this.coordinator.lockout;
    if (event.templateId > NO_TEMPLATE) {
      lockout.recordSuccess();
      session.sendAuthenticated(event.templateId, event.subjectId);
    } else {
      session.sendAuthenticated(event.templateId, event.subjectId);
      if (lockout.recordFailure() === "lockout_entered") {
        session.sendError(SensorErrorCode.lockout);
      }
    }

    await this.finish(session, "completed");
  }

  private async onError(event: EventOf<"error">): Promise<void> {
    const session =
      this.coordinator.active("enroll") ??
      this.coordinator.active("authenticate") ??
      this.coordinator.active("remove");
    if (!session) {
      this.ignore(event);
      return;
    }

    session.sendError(event.code);
    if (session.kind === "remove") {
      this.coordinator.teardown(session, "driver_error");
      return;
    }
    await this.finish(session, "driver_error");
  }

  private async onRemoved(event: EventOf<"removed">): Promise<void> {
    if (event.templateId !== NO_TEMPLATE) {
      await this.coordinator.forgetRemovedTemplate(event.subjectId, event.templateId);
    }

    const session = this.coordinator.active("remove");
    if (!session) {
      this.ignore(event);
      return;
    }

    const outcome = session.sendRemoved(event.templateId, event.subjectId);
    if (outcome === "done") {
      this.coordinator.teardown(session, "completed");
    }
  }

  private onEnumerate(event: EventOf<"enumerate">): void {
    if (event.templateIds.length !== event.subjectIds.length) {
      this.logger.warn("event.enumerate_mismatched", {
        templateIds: event.templateIds.length,
        subjectIds: event.subjectIds.length,
      });
      return;
    }
    this.logger.debug("event.enumerate", { deviceId: event.deviceId, templates: event.templateIds.length });
  }

  /**
   * Stops the session through the driver without a `canceled` notification; falls back to a
   * plain teardown when the driver is gone.
   */
  private async finish(session: SensorSession, reason: TeardownReason): Promise<void> {
    const stopped = await this.coordinator.stop(session, { notify: false, reason });
    if (!stopped.ok) {
      this.coordinator.teardown(session, reason);
    }
  }

  private ignore(event: SensorEvent): void {
    this.logger.debug("event.no_session", { type: event.type, deviceId: event.deviceId });
  }
}
