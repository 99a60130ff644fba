import {
  err,
  ok,
  SensorErrorCode,
  type CallerHandle,
  type Result,
  type SensorgateError,
  type SessionKind,
  type SubjectId,
  type TemplateId,
  type TemplateStorePort,
} from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import type { DriverConnection } from "./driver-connection.js";
import { createDriverUnavailableError, createLockoutError } from "./errors.js";
import { LivenessRegistry } from "./liveness-registry.js";
import type { LockoutPolicy } from "./lockout-policy.js";
import type { SerialWorkQueue } from "./serial-queue.js";
import { SensorSession } from "./session.js";
import type { CoordinatorTelemetryContext } from "./telemetry.js";
import type { AuthenticateRequest, EnrollRequest, RemoveRequest } from "./types.js";

export const DEFAULT_ENROLL_TIMEOUT_MS = 60_000;

export type TeardownReason =
  | "completed"
  | "canceled"
  | "superseded"
  | "replaced"
  | "caller_gone"
  | "driver_error"
  | "driver_rejected"
  | "delivery_failed"
  | "shutdown";

export interface StopOptions {
  readonly notify: boolean;
  readonly reason: TeardownReason;
}

export interface SessionCoordinatorOptions {
  readonly queue: SerialWorkQueue;
  readonly telemetry: CoordinatorTelemetryContext;
  readonly driver: DriverConnection;
  readonly lockout: LockoutPolicy;
  readonly templates: TemplateStorePort;
  readonly enrollTimeoutMs?: number;
  /**
   * Tear a freshly installed session down when the driver refuses to start it.
   * Off by default: the session stays registered until its caller cancels.
   */
  readonly teardownOnDriverRejection?: boolean;
}

export interface ActiveSessionView {
  readonly sessionId: number;
  readonly subjectId: SubjectId;
  readonly callerId: string;
}

export type CoordinatorSnapshot = Record<SessionKind, ActiveSessionView | null>;

/**
 * Owns the three session slots. Every method expects to run as a task on the serial queue.
 */
export class SessionCoordinator {
  private readonly slots: Record<SessionKind, SensorSession | undefined> = {
    enroll: undefined,
    authenticate: undefined,
    remove: undefined,
  };
  private readonly liveness: LivenessRegistry<SensorSession>;
  private readonly logger: SensorgateLogger;
  private readonly enrollTimeoutMs: number;
  private readonly teardownOnDriverRejection: boolean;

  constructor(private readonly options: SessionCoordinatorOptions) {
    this.logger = options.telemetry.logger.child({ component: "session-coordinator" });
    this.liveness = new LivenessRegistry(options.queue, this.logger);
    this.enrollTimeoutMs = options.enrollTimeoutMs ?? DEFAULT_ENROLL_TIMEOUT_MS;
    this.teardownOnDriverRejection = options.teardownOnDriverRejection ?? false;
  }

  active(kind: SessionKind): SensorSession | undefined {
    return this.slots[kind];
  }

  get lockout(): LockoutPolicy {
    return this.options.lockout;
  }

  async startEnroll(request: EnrollRequest): Promise<Result<number, SensorgateError>> {
    if (!(await this.options.driver.getDriver())) {
      return err(createDriverUnavailableError("enroll"));
    }

    await this.stopPending();
    const session = this.install("enroll", request);
    const timeoutSeconds = Math.floor(this.enrollTimeoutMs / 1000);
    const started = await this.options.driver.beginEnroll(request.token, request.subjectId, timeoutSeconds);
    return this.settleStart(session, started);
  }

  async startAuthenticate(request: AuthenticateRequest): Promise<Result<number, SensorgateError>> {
    if (!(await this.options.driver.getDriver())) {
      return err(createDriverUnavailableError("authenticate"));
    }

    await this.stopPending();

    if (this.options.lockout.isLocked()) {
      const rejected = this.createSession("authenticate", request);
      rejected.sendError(SensorErrorCode.lockout);
      rejected.detach();
      this.logger.info("session.rejected_locked_out", rejected.describe());
      return err(createLockoutError(this.options.lockout.unlockAt));
    }

    const session = this.install("authenticate", request);
    const started = await this.options.driver.beginAuthenticate(request.operationId, request.subjectId);
    return this.settleStart(session, started);
  }

  async startRemove(request: RemoveRequest): Promise<Result<number, SensorgateError>> {
    if (!(await this.options.driver.getDriver())) {
      return err(createDriverUnavailableError("remove"));
    }

    const previous = this.slots.remove;
    if (previous) {
      await this.stop(previous, { notify: true, reason: "replaced" });
    }

    const session = this.install("remove", request);
    const started = await this.options.driver.remove(request.templateId, request.subjectId);
    return this.settleStart(session, started);
  }

  /**
   * Cancels the active enroll and authenticate sessions, each with a `canceled` notification.
   * Remove sessions are left alone.
   */
  async stopPending(): Promise<void> {
    for (const kind of ["enroll", "authenticate"] as const) {
      const session = this.slots[kind];
      if (session) {
        await this.stop(session, { notify: true, reason: "superseded" });
      }
    }
  }

  /**
   * Resolves `false` without touching anything when `caller` does not own the active session.
   */
  async cancel(
    kind: SessionKind,
    caller: CallerHandle,
    options: { readonly notify?: boolean } = {},
  ): Promise<Result<boolean, SensorgateError>> {
    const session = this.slots[kind];
    if (!session || session.caller !== caller) {
      this.logger.debug("session.cancel_ignored", { kind, callerId: caller.id });
      return ok(false);
    }

    const stopped = await this.stop(session, { notify: options.notify ?? true, reason: "canceled" });
    return stopped.ok ? ok(true) : stopped;
  }

  /**
   * Disarms the sensor for the session, optionally notifies `canceled`, then tears it down.
   * An unavailable driver leaves the session as it is.
   */
  async stop(session: SensorSession, options: StopOptions): Promise<Result<void, SensorgateError>> {
    const cancelled = await this.cancelOnDriver(session.kind);
    if (!cancelled.ok && cancelled.error.code === "sensor.driver_unavailable") {
      return cancelled;
    }

    if (options.notify) {
      session.sendError(SensorErrorCode.canceled);
    }
    this.teardown(session, options.reason);
    return ok(undefined);
  }

  /**
   * Clears the slot if it still holds `session`, releases the death watch and detaches the sink.
   * Calling it again for the same session does nothing.
   */
  teardown(session: SensorSession, reason: TeardownReason): boolean {
    const held = this.slots[session.kind] === session;
    if (held) {
      this.slots[session.kind] = undefined;
    }
    const released = this.liveness.release(session);
    session.detach();

    if (!held && !released) {
      return false;
    }

    this.options.telemetry.metrics.sessionsClosed.add(1, { kind: session.kind, reason });
    this.logger.info("session.closed", { ...session.describe(), reason });
    return true;
  }

  async persistEnrolledTemplate(subjectId: SubjectId, templateId: TemplateId, deviceId: bigint): Promise<void> {
    const added = await this.options.templates.addTemplate(subjectId, templateId, { deviceId });
    if (!added.ok) {
      this.logger.error("template.persist_failed", { subjectId, templateId, error: added.error });
      return;
    }
    this.logger.info("template.enrolled", { subjectId, templateId, label: added.value.label });
  }

  async forgetRemovedTemplate(subjectId: SubjectId, templateId: TemplateId): Promise<void> {
    const removed = await this.options.templates.removeTemplate(subjectId, templateId);
    if (!removed.ok) {
      this.logger.error("template.forget_failed", { subjectId, templateId, error: removed.error });
      return;
    }
    this.logger.info("template.removed", { subjectId, templateId });
  }

  snapshot(): CoordinatorSnapshot {
    const view = (session: SensorSession | undefined): ActiveSessionView | null =>
      session ? { sessionId: session.id, subjectId: session.subjectId, callerId: session.caller.id } : null;
    return {
      enroll: view(this.slots.enroll),
      authenticate: view(this.slots.authenticate),
      remove: view(this.slots.remove),
    };
  }

  /**
   * Drops every session without notifying or calling the driver.
   */
  closeAll(): void {
    for (const session of Object.values(this.slots)) {
      if (session) {
        this.teardown(session, "shutdown");
      }
    }
  }

  private createSession(kind: SessionKind, request: EnrollRequest | AuthenticateRequest | RemoveRequest): SensorSession {
    return new SensorSession({
      kind,
      caller: request.caller,
      sink: request.sink,
      subjectId: request.subjectId,
      deviceId: this.options.driver.deviceId,
      logger: this.logger,
      onDeliveryFailed: (failed) =>
        this.options.queue.dispatch("session.delivery_failed", () => {
          this.teardown(failed, "delivery_failed");
        }),
    });
  }

  private install(kind: SessionKind, request: EnrollRequest | AuthenticateRequest | RemoveRequest): SensorSession {
    const existing = this.slots[kind];
    if (existing) {
      this.teardown(existing, "replaced");
    }

    const session = this.createSession(kind, request);
    this.slots[kind] = session;
    this.liveness.register(session, (gone) => this.handleCallerGone(gone));
    this.options.telemetry.metrics.sessionsStarted.add(1, { kind });
    this.logger.info("session.started", session.describe());
    return session;
  }

  private settleStart(session: SensorSession, started: Result<void, SensorgateError>): Result<number, SensorgateError> {
    if (started.ok) {
      return ok(session.id);
    }

    this.logger.warn("session.start_refused", { ...session.describe(), error: started.error });
    // TODO: make teardownOnDriverRejection the default once callers no longer cancel after a refused start.
    if (!this.teardownOnDriverRejection) {
      return started;
    }

    session.sendError(SensorErrorCode.hwUnavailable);
    this.teardown(session, "driver_rejected");
    return started;
  }

  private async handleCallerGone(session: SensorSession): Promise<void> {
    if (!this.teardown(session, "caller_gone")) {
      return;
    }
    if (session.kind === "remove") {
      return;
    }
    const disarmed = await this.cancelOnDriver(session.kind);
    if (!disarmed.ok) {
      this.logger.warn("session.disarm_failed", { ...session.describe(), error: disarmed.error });
    }
  }

  private cancelOnDriver(kind: SessionKind): Promise<Result<void, SensorgateError>> {
    switch (kind) {
      case "enroll":
        return this.options.driver.cancelEnroll();
      case "authenticate":
        return this.options.driver.cancelAuthenticate();
      case "remove":
        return Promise.resolve(ok(undefined));
    }
  }
}
