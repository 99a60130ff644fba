import type { InfraError, SensorgateError } from "@sensorgate/contracts";

export const createError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): SensorgateError => ({
  code,
  message,
  details,
});

export const createDriverUnavailableError = (operation: string): InfraError => ({
  code: "sensor.driver_unavailable",
  message: "The sensor driver is not available.",
  details: { operation },
  retryable: true,
});

export const createDriverRejectedError = (operation: string, status: number): SensorgateError =>
  createError("sensor.driver_rejected", `The sensor driver rejected ${operation}.`, { operation, status });

export const createDriverCallFailedError = (operation: string, error: unknown): InfraError => ({
  code: "sensor.driver_call_failed",
  message: `The sensor driver call ${operation} failed.`,
  details: { operation, cause: describeError(error) },
  retryable: true,
});

export const createLockoutError = (lockedUntil: Date | undefined): SensorgateError =>
  createError("sensor.lockout", "Authentication is locked out after repeated failed attempts.", {
    lockedUntil: lockedUntil?.toISOString(),
  });

export const createCapabilityDeniedError = (operation: string, reason?: string): SensorgateError =>
  createError("sensor.capability_denied", `The caller may not perform ${operation}.`, { operation, reason });

export const createQueueClosedError = (label: string): SensorgateError =>
  createError("sensor.queue_closed", "The coordinator is shut down.", { task: label });

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
};
