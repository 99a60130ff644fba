import {
  err,
  ok,
  type CallerHandle,
  type CallerPrincipal,
  type CapabilityCheckPort,
  type Result,
  type SensorCapability,
  type SensorDriverRegistryPort,
  type SensorgateError,
  type SubjectId,
  type SubjectStoragePort,
  type SubjectSwitchSourcePort,
  type TemplateId,
  type TemplateRecord,
  type TemplateStorePort,
} from "@sensorgate/contracts";
import { createSensorgateLogger, runWithSpan, type SensorgateLogger } from "@sensorgate/telemetry";

import { DEFAULT_SENSORGATE_CONFIG, type SensorgateConfig } from "./config.js";
import { SessionCoordinator, type CoordinatorSnapshot } from "./coordinator.js";
import { EventDispatcher } from "./dispatcher.js";
import { DriverConnection } from "./driver-connection.js";
import { createCapabilityDeniedError } from "./errors.js";
import { LockoutPolicy, type LockoutSnapshot } from "./lockout-policy.js";
import { SerialWorkQueue } from "./serial-queue.js";
import { createCoordinatorTelemetry, type CoordinatorTelemetryContext } from "./telemetry.js";
import type { AuthenticateRequest, Clock, EnrollRequest, RemoveRequest, Scheduler } from "./types.js";

export interface SensorServiceDependencies {
  readonly registry: SensorDriverRegistryPort;
  readonly templates: TemplateStorePort;
  readonly capabilities: CapabilityCheckPort;
  readonly subjectStorage: SubjectStoragePort;
  readonly subjectSwitches?: SubjectSwitchSourcePort;
}

export interface SensorServiceOptions {
  readonly config?: Partial<SensorgateConfig>;
  readonly telemetry?: CoordinatorTelemetryContext;
  readonly scheduler?: Scheduler;
  readonly clock?: Clock;
}

export interface SensorServiceDump {
  readonly deviceId: string;
  readonly activeSubject: SubjectId | null;
  readonly sessions: CoordinatorSnapshot;
  readonly lockout: LockoutSnapshot;
}

/**
 * Caller-facing surface of the coordinator. Checks the caller's capability, then runs the
 * operation on the serial queue; template reads go straight to the store.
 */
export class SensorService {
  readonly config: SensorgateConfig;
  readonly queue: SerialWorkQueue;
  readonly driver: DriverConnection;
  readonly lockout: LockoutPolicy;
  readonly coordinator: SessionCoordinator;
  readonly dispatcher: EventDispatcher;
  private readonly telemetry: CoordinatorTelemetryContext;
  private readonly logger: SensorgateLogger;
  private activeSubject: SubjectId | undefined;
  private unsubscribeSwitches: (() => void) | undefined;

  constructor(
    private readonly dependencies: SensorServiceDependencies,
    options: SensorServiceOptions = {},
  ) {
    this.config = { ...DEFAULT_SENSORGATE_CONFIG, ...options.config };
    this.telemetry =
      options.telemetry ??
      createCoordinatorTelemetry({
        logger: createSensorgateLogger({ name: "sensor-coordinator", level: this.config.logLevel }),
      });
    this.logger = this.telemetry.logger.child({ component: "sensor-service" });

    this.queue = new SerialWorkQueue({ telemetry: this.telemetry, scheduler: options.scheduler });
    this.driver = new DriverConnection({
      registry: dependencies.registry,
      queue: this.queue,
      telemetry: this.telemetry,
    });
    this.lockout = new LockoutPolicy({
      queue: this.queue,
      telemetry: this.telemetry,
      maxFailedAttempts: this.config.maxFailedAttempts,
      lockoutDurationMs: this.config.lockoutDurationMs,
      clock: options.clock,
    });
    this.coordinator = new SessionCoordinator({
      queue: this.queue,
      telemetry: this.telemetry,
      driver: this.driver,
      lockout: this.lockout,
      templates: dependencies.templates,
      enrollTimeoutMs: this.config.enrollTimeoutMs,
      teardownOnDriverRejection: this.config.teardownOnDriverRejection,
    });
    this.dispatcher = new EventDispatcher({
      queue: this.queue,
      coordinator: this.coordinator,
      telemetry: this.telemetry,
    });
  }

  /**
   * Opens the driver with the dispatcher as its event listener and makes `initialSubject` active.
   */
  start(initialSubject: SubjectId): Promise<Result<bigint, SensorgateError>> {
    return runWithSpan(this.telemetry.tracer, "sensor.start", async () => {
      const started = await this.queue.run("start", async (): Promise<Result<bigint, SensorgateError>> => {
        const opened = await this.driver.open(this.dispatcher.handle);
        if (!opened.ok) {
          return opened;
        }
        const switched = await this.applyActiveSubject(initialSubject);
        return switched.ok ? ok(opened.value) : switched;
      });

      if (started.ok && this.dependencies.subjectSwitches && !this.unsubscribeSwitches) {
        this.unsubscribeSwitches = this.dependencies.subjectSwitches.onSubjectSwitching((subjectId) => {
          this.queue.dispatch("subject.switch", async () => {
            const switched = await this.applyActiveSubject(subjectId);
            if (!switched.ok) {
              this.logger.error("subject.switch_failed", { subjectId, error: switched.error });
            }
          });
        });
      }
      return started;
    });
  }

  switchActiveSubject(subjectId: SubjectId): Promise<Result<string, SensorgateError>> {
    return runWithSpan(
      this.telemetry.tracer,
      "sensor.switch_active_subject",
      () => this.queue.run("switch_subject", () => this.applyActiveSubject(subjectId)),
      { attributes: { "sensor.subject_id": subjectId } },
    );
  }

  preEnroll(principal: CallerPrincipal): Promise<Result<bigint, SensorgateError>> {
    return this.execute("pre_enroll", "manage_templates", principal, () =>
      this.queue.run("pre_enroll", () => this.driver.preEnroll()),
    );
  }

  enroll(principal: CallerPrincipal, request: EnrollRequest): Promise<Result<number, SensorgateError>> {
    return this.execute("enroll", "manage_templates", principal, () =>
      this.queue.run("enroll", () => this.coordinator.startEnroll(request)),
    );
  }

  cancelEnrollment(principal: CallerPrincipal, caller: CallerHandle): Promise<Result<boolean, SensorgateError>> {
    return this.execute("cancel_enrollment", "manage_templates", principal, () =>
      this.queue.run("cancel_enrollment", () => this.coordinator.cancel("enroll", caller)),
    );
  }

  authenticate(principal: CallerPrincipal, request: AuthenticateRequest): Promise<Result<number, SensorgateError>> {
    return this.execute("authenticate", "use_sensor", principal, () =>
      this.queue.run("authenticate", () => this.coordinator.startAuthenticate(request)),
    );
  }

  cancelAuthentication(principal: CallerPrincipal, caller: CallerHandle): Promise<Result<boolean, SensorgateError>> {
    return this.execute("cancel_authentication", "use_sensor", principal, () =>
      this.queue.run("cancel_authentication", () => this.coordinator.cancel("authenticate", caller)),
    );
  }

  remove(principal: CallerPrincipal, request: RemoveRequest): Promise<Result<number, SensorgateError>> {
    return this.execute("remove", "manage_templates", principal, () =>
      this.queue.run("remove", () => this.coordinator.startRemove(request)),
    );
  }

  renameTemplate(
    principal: CallerPrincipal,
    subjectId: SubjectId,
    templateId: TemplateId,
    label: string,
  ): Promise<Result<TemplateRecord, SensorgateError>> {
    return this.execute("rename_template", "manage_templates", principal, () =>
      this.dependencies.templates.renameTemplate(subjectId, templateId, label),
    );
  }

  listEnrolledTemplates(
    principal: CallerPrincipal,
    subjectId: SubjectId,
  ): Promise<Result<ReadonlyArray<TemplateRecord>, SensorgateError>> {
    return this.execute("list_enrolled_templates", "use_sensor", principal, () =>
      this.dependencies.templates.listTemplates(subjectId),
    );
  }

  hasEnrolledTemplates(principal: CallerPrincipal, subjectId: SubjectId): Promise<Result<boolean, SensorgateError>> {
    const hasAny = async (): Promise<Result<boolean, SensorgateError>> => {
      const listed = await this.dependencies.templates.listTemplates(subjectId);
      return listed.ok ? ok(listed.value.length > 0) : listed;
    };
    return this.execute("has_enrolled_templates", "use_sensor", principal, hasAny);
  }

  getAuthenticatorId(principal: CallerPrincipal): Promise<Result<bigint, SensorgateError>> {
    return this.execute("get_authenticator_id", "use_sensor", principal, () =>
      this.queue.run("get_authenticator_id", () => this.driver.getAuthenticatorId()),
    );
  }

  isHardwareDetected(principal: CallerPrincipal): Promise<Result<boolean, SensorgateError>> {
    return this.execute("is_hardware_detected", "use_sensor", principal, () =>
      this.queue.run("is_hardware_detected", async () => {
        await this.driver.getDriver();
        return ok(this.driver.deviceId !== 0n);
      }),
    );
  }

  dump(): Promise<Result<SensorServiceDump, SensorgateError>> {
    return this.queue.run("dump", () =>
      ok({
        deviceId: this.driver.deviceId.toString(),
        activeSubject: this.activeSubject ?? null,
        sessions: this.coordinator.snapshot(),
        lockout: this.lockout.snapshot(),
      }),
    );
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  /**
   * Drops every session, stops the lockout timer and closes the queue. Queued work still drains.
   */
  async shutdown(): Promise<void> {
    this.unsubscribeSwitches?.();
    this.unsubscribeSwitches = undefined;

    const stopped = await this.queue.run("shutdown", () => {
      this.coordinator.closeAll();
      this.lockout.dispose();
      this.driver.release();
      return ok(undefined);
    });
    if (!stopped.ok) {
      this.logger.warn("service.shutdown_skipped", { error: stopped.error });
    }

    this.queue.close();
    await this.queue.whenIdle();
    this.logger.info("service.stopped");
  }

  private async applyActiveSubject(subjectId: SubjectId): Promise<Result<string, SensorgateError>> {
    const prepared = await this.dependencies.subjectStorage.prepare(subjectId);
    if (!prepared.ok) {
      return prepared;
    }

    const applied = await this.driver.setActiveSubject(subjectId, prepared.value);
    if (!applied.ok) {
      return applied;
    }

    this.activeSubject = subjectId;
    this.logger.info("subject.activated", { subjectId, storagePath: prepared.value });
    return ok(prepared.value);
  }

  private execute<T>(
    operation: string,
    capability: SensorCapability,
    principal: CallerPrincipal,
    task: () => Promise<Result<T, SensorgateError>>,
  ): Promise<Result<T, SensorgateError>> {
    return runWithSpan(
      this.telemetry.tracer,
      `sensor.${operation}`,
      async (span) => {
        const authorized = await this.authorize(principal, capability, operation);
        if (!authorized.ok) {
          span.setAttribute("sensor.error_code", authorized.error.code);
          return authorized;
        }

        const result = await task();
        if (!result.ok) {
          span.setAttribute("sensor.error_code", result.error.code);
        }
        return result;
      },
      { attributes: { "sensor.operation": operation, "sensor.caller": principal.id } },
    );
  }

  private async authorize(
    principal: CallerPrincipal,
    capability: SensorCapability,
    operation: string,
  ): Promise<Result<void, SensorgateError>> {
    const checked = await this.dependencies.capabilities.check({ principal, capability, operation });
    if (!checked.ok) {
      this.logger.error("capability.check_failed", { operation, callerId: principal.id, error: checked.error });
      return checked;
    }
    if (!checked.value.allow) {
      this.logger.warn("capability.denied", {
        operation,
        capability,
        callerId: principal.id,
        reason: checked.value.reason,
      });
      return err(createCapabilityDeniedError(operation, checked.value.reason));
    }
    return ok(undefined);
  }
}

export const createSensorService = (
  dependencies: SensorServiceDependencies,
  options?: SensorServiceOptions,
): SensorService => new SensorService(dependencies, options);
