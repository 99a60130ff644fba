import {
  NO_TEMPLATE,
  type CallerHandle,
  type SensorErrorCode,
  type SessionKind,
  type SessionResultSink,
  type SubjectId,
  type TemplateId,
} from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import { describeError } from "./errors.js";

/**
 * What a delivery means for the session: `done` asks the coordinator to tear it down.
 */
export type DeliveryOutcome = "done" | "continuing";

export interface SensorSessionInit {
  readonly kind: SessionKind;
  readonly caller: CallerHandle;
  readonly sink?: SessionResultSink;
  readonly subjectId: SubjectId;
  readonly deviceId: bigint;
  readonly logger: SensorgateLogger;
  /**
   * Called when a sink's returned promise rejects after the send already returned.
   */
  readonly onDeliveryFailed?: (session: SensorSession) => void;
}

let nextSessionSequence = 1;

export class SensorSession {
  readonly id: number;
  readonly kind: SessionKind;
  readonly caller: CallerHandle;
  readonly subjectId: SubjectId;
  readonly deviceId: bigint;
  private sink: SessionResultSink | undefined;
  private readonly logger: SensorgateLogger;
  private readonly onDeliveryFailed: ((session: SensorSession) => void) | undefined;

  constructor(init: SensorSessionInit) {
    this.id = nextSessionSequence++;
    this.kind = init.kind;
    this.caller = init.caller;
    this.subjectId = init.subjectId;
    this.deviceId = init.deviceId;
    this.sink = init.sink;
    this.logger = init.logger;
    this.onDeliveryFailed = init.onDeliveryFailed;
  }

  get attached(): boolean {
    return this.sink !== undefined;
  }

  /**
   * Drops the result sink; every later send resolves `done` without a delivery.
   */
  detach(): void {
    this.sink = undefined;
  }

  sendEnrollResult(templateId: TemplateId, subjectId: SubjectId, remaining: number): DeliveryOutcome {
    return this.deliver(
      "enroll_result",
      (sink) => sink.onEnrollResult(this.deviceId, templateId, subjectId, remaining),
      remaining === 0 ? "done" : "continuing",
    );
  }

  sendAcquired(acquiredInfo: number): DeliveryOutcome {
    return this.deliver("acquired", (sink) => sink.onAcquired(this.deviceId, acquiredInfo), "continuing");
  }

  sendAuthenticated(templateId: TemplateId, subjectId: SubjectId): DeliveryOutcome {
    return this.deliver("authenticated", (sink) => sink.onAuthenticated(this.deviceId, templateId, subjectId), "done");
  }

  sendError(code: SensorErrorCode): DeliveryOutcome {
    return this.deliver("error", (sink) => sink.onError(this.deviceId, code), "done");
  }

  sendRemoved(templateId: TemplateId, subjectId: SubjectId): DeliveryOutcome {
    return this.deliver(
      "removed",
      (sink) => sink.onRemoved(this.deviceId, templateId, subjectId),
      templateId === NO_TEMPLATE ? "done" : "continuing",
    );
  }

  describe(): Record<string, unknown> {
    return {
      sessionId: this.id,
      kind: this.kind,
      subjectId: this.subjectId,
      callerId: this.caller.id,
    };
  }

  /**
   * Hands the notification to the sink without waiting for it. A synchronous throw means `done`;
   * a later rejection is logged and reported through `onDeliveryFailed`.
   */
  private deliver(
    notification: string,
    call: (sink: SessionResultSink) => void | Promise<void>,
    outcome: DeliveryOutcome,
  ): DeliveryOutcome {
    const sink = this.sink;
    if (!sink) {
      return "done";
    }

    let pending: unknown;
    try {
      pending = call(sink);
    } catch (error) {
      this.reportFailure(notification, error);
      return "done";
    }

    if (pending instanceof Promise) {
      void pending.catch((error: unknown) => {
        this.reportFailure(notification, error);
        this.onDeliveryFailed?.(this);
      });
    }
    return outcome;
  }

  private reportFailure(notification: string, error: unknown): void {
    this.logger.warn("session.delivery_failed", {
      ...this.describe(),
      notification,
      error: describeError(error),
    });
  }
}
