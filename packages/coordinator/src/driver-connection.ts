import {
  err,
  ok,
  type DriverStatus,
  type Result,
  type SensorDriverPort,
  type SensorDriverRegistryPort,
  type SensorEventListener,
  type SensorgateError,
  type SubjectId,
  type TemplateId,
} from "@sensorgate/contracts";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import {
  createDriverCallFailedError,
  createDriverRejectedError,
  createDriverUnavailableError,
  describeError,
} from "./errors.js";
import type { SerialWorkQueue } from "./serial-queue.js";
import type { CoordinatorTelemetryContext } from "./telemetry.js";

export interface DriverConnectionOptions {
  readonly registry: SensorDriverRegistryPort;
  readonly queue: SerialWorkQueue;
  readonly telemetry: CoordinatorTelemetryContext;
}

type DriverCallOutcome = "ok" | "rejected" | "error" | "unavailable";

/**
 * Lazily acquired handle to the sensor driver. The handle and the device id it reported are
 * dropped when the driver dies; the next call looks the driver up again and, if it had been
 * opened before, re-opens it with the same event listener.
 */
export class DriverConnection {
  private driver: SensorDriverPort | undefined;
  private unlinkDeath: (() => void) | undefined;
  private listener: SensorEventListener | undefined;
  private openedDeviceId = 0n;
  private readonly logger: SensorgateLogger;

  constructor(private readonly options: DriverConnectionOptions) {
    this.logger = options.telemetry.logger.child({ component: "driver-connection" });
  }

  get deviceId(): bigint {
    return this.openedDeviceId;
  }

  get connected(): boolean {
    return this.driver !== undefined;
  }

  async getDriver(): Promise<SensorDriverPort | undefined> {
    if (this.driver) {
      return this.driver;
    }

    const candidate = this.options.registry.lookup();
    if (!candidate) {
      this.logger.warn("driver.unavailable");
      return undefined;
    }

    try {
      this.unlinkDeath = candidate.onDeath(() => {
        this.options.queue.dispatch("driver.death", () => this.handleDeath(candidate));
      });
    } catch (error) {
      this.logger.warn("driver.link_to_death_failed", { error: describeError(error) });
      return undefined;
    }

    this.driver = candidate;
    this.logger.info("driver.acquired");

    if (this.listener) {
      try {
        this.openedDeviceId = await candidate.open(this.listener);
        this.logger.info("driver.reopened", { deviceId: this.openedDeviceId });
      } catch (error) {
        this.logger.error("driver.reopen_failed", { error: describeError(error) });
        this.release();
        return undefined;
      }
    }

    return candidate;
  }

  /**
   * Registers the event listener with the driver and records the hardware device id.
   */
  async open(listener: SensorEventListener): Promise<Result<bigint, SensorgateError>> {
    if (this.driver && this.listener === listener) {
      return ok(this.openedDeviceId);
    }

    const result = await this.invoke("open", (driver) => driver.open(listener));
    if (result.ok) {
      this.listener = listener;
      this.openedDeviceId = result.value;
      this.logger.info("driver.opened", { deviceId: result.value });
    }
    return result;
  }

  preEnroll(): Promise<Result<bigint, SensorgateError>> {
    return this.invoke("pre_enroll", (driver) => driver.preEnroll());
  }

  beginEnroll(token: Uint8Array, subjectId: SubjectId, timeoutSeconds: number): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("enroll", (driver) => driver.enroll(token, subjectId, timeoutSeconds));
  }

  cancelEnroll(): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("cancel_enroll", (driver) => driver.cancelEnrollment());
  }

  beginAuthenticate(operationId: bigint, subjectId: SubjectId): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("authenticate", (driver) => driver.authenticate(operationId, subjectId));
  }

  cancelAuthenticate(): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("cancel_authenticate", (driver) => driver.cancelAuthentication());
  }

  remove(templateId: TemplateId, subjectId: SubjectId): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("remove", (driver) => driver.remove(templateId, subjectId));
  }

  setActiveSubject(subjectId: SubjectId, storagePath: string): Promise<Result<void, SensorgateError>> {
    return this.invokeStatus("set_active_subject", (driver) => driver.setActiveSubject(subjectId, storagePath));
  }

  getAuthenticatorId(): Promise<Result<bigint, SensorgateError>> {
    return this.invoke("get_authenticator_id", (driver) => driver.getAuthenticatorId());
  }

  /**
   * Stops watching the driver. Used on shutdown.
   */
  release(): void {
    const unlink = this.unlinkDeath;
    this.forget();
    if (unlink) {
      try {
        unlink();
      } catch (error) {
        this.logger.warn("driver.unlink_failed", { error: describeError(error) });
      }
    }
  }

  private handleDeath(driver: SensorDriverPort): void {
    if (this.driver !== driver) {
      return;
    }
    this.forget();
    this.logger.warn("driver.died");
  }

  private forget(): void {
    this.driver = undefined;
    this.unlinkDeath = undefined;
    this.openedDeviceId = 0n;
  }

  private async invoke<T>(
    operation: string,
    call: (driver: SensorDriverPort) => Promise<T>,
    completedOutcome: DriverCallOutcome | undefined = "ok",
  ): Promise<Result<T, SensorgateError>> {
    const driver = await this.getDriver();
    if (!driver) {
      this.logger.warn("driver.call_skipped", { operation });
      this.recordCall(operation, "unavailable");
      return err(createDriverUnavailableError(operation));
    }

    try {
      const value = await call(driver);
      if (completedOutcome) {
        this.recordCall(operation, completedOutcome);
      }
      return ok(value);
    } catch (error) {
      this.logger.error("driver.call_failed", { operation, error: describeError(error) });
      this.recordCall(operation, "error");
      return err(createDriverCallFailedError(operation, error));
    }
  }

  private async invokeStatus(
    operation: string,
    call: (driver: SensorDriverPort) => Promise<DriverStatus>,
  ): Promise<Result<void, SensorgateError>> {
    const result = await this.invoke(operation, call, undefined);
    if (!result.ok) {
      return result;
    }

    if (result.value !== 0) {
      this.logger.warn("driver.call_rejected", { operation, status: result.value });
      this.recordCall(operation, "rejected");
      return err(createDriverRejectedError(operation, result.value));
    }

    this.recordCall(operation, "ok");
    return ok(undefined);
  }

  private recordCall(operation: string, outcome: DriverCallOutcome): void {
    this.options.telemetry.metrics.driverCalls.add(1, { operation, outcome });
  }
}
