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

export const createStoreFailedError = (
  message: string,
  error: unknown,
  details?: Record<string, unknown>,
): InfraError => ({
  code: "template.store_failed",
  message,
  details: { ...(details ?? {}), cause: normalizeError(error) },
  retryable: true,
});

export const normalizeError = (error: unknown): Record<string, unknown> => {
  if (!error || typeof error !== "object") {
    return { message: String(error) };
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (value !== undefined) {
      normalized[key] = value;
    }
  }

  if (error instanceof Error) {
    normalized.message = error.message;
  }

  if (Object.keys(normalized).length === 0) {
    normalized.message = String(error);
  }

  return normalized;
};
