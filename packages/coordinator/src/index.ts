export type {
  AuthenticateRequest,
  Clock,
  EnrollRequest,
  RemoveRequest,
  ScheduledTimer,
  Scheduler,
} from "./types.js";
export { defaultClock, defaultScheduler } from "./types.js";

export {
  createCapabilityDeniedError,
  createDriverCallFailedError,
  createDriverRejectedError,
  createDriverUnavailableError,
  createError,
  createLockoutError,
  createQueueClosedError,
  describeError,
} from "./errors.js";

export type { CoordinatorTelemetryContext, CoordinatorTelemetryMetrics, CoordinatorTelemetryOptions } from "./telemetry.js";
export { createCoordinatorTelemetry } from "./telemetry.js";

export type { QueueTask, SerialWorkQueueOptions } from "./serial-queue.js";
export { SerialWorkQueue } from "./serial-queue.js";

export type { LivenessTarget } from "./liveness-registry.js";
export { LivenessRegistry } from "./liveness-registry.js";

export type { DeliveryOutcome, SensorSessionInit } from "./session.js";
export { SensorSession } from "./session.js";

export type { FailureOutcome, LockoutPolicyOptions, LockoutSnapshot } from "./lockout-policy.js";
export { DEFAULT_LOCKOUT_DURATION_MS, DEFAULT_MAX_FAILED_ATTEMPTS, LockoutPolicy } from "./lockout-policy.js";

export type { DriverConnectionOptions } from "./driver-connection.js";
export { DriverConnection } from "./driver-connection.js";

export type {
  ActiveSessionView,
  CoordinatorSnapshot,
  SessionCoordinatorOptions,
  StopOptions,
  TeardownReason,
} from "./coordinator.js";
export { DEFAULT_ENROLL_TIMEOUT_MS, SessionCoordinator } from "./coordinator.js";

export type { EventDispatcherOptions } from "./dispatcher.js";
export { EventDispatcher } from "./dispatcher.js";

export type { SensorServiceDependencies, SensorServiceDump, SensorServiceOptions } from "./sensor-service.js";
export { SensorService, createSensorService } from "./sensor-service.js";

export type { ResolveConfigOptions, SensorgateConfig, SensorgateConfigInput } from "./config.js";
export {
  DEFAULT_SENSORGATE_CONFIG,
  createConfigInvalidError,
  parseSensorgateConfig,
  readConfigFile,
  readConfigFromEnv,
  resolveSensorgateConfig,
  sensorgateConfigSchema,
} from "./config.js";

export type { DirectorySubjectStorageOptions } from "./subject-storage.js";
export { createDirectorySubjectStorage, subjectStoragePath } from "./subject-storage.js";
