import type { SensorErrorCode, SubjectId, TemplateId } from "../../types/biometric.js";

/**
 * Liveness token of a caller. Sessions compare handles by reference.
 */
export interface CallerHandle {
  readonly id: string;
  /**
   * Throws when the caller is already gone.
   */
  onGone(listener: () => void): () => void;
}

/**
 * Result channel back to a caller. Calls are one-way: a returned promise is not awaited. A thrown
 * error or rejected promise counts as an unreachable caller.
 */
export interface SessionResultSink {
  onEnrollResult(deviceId: bigint, templateId: TemplateId, subjectId: SubjectId, remaining: number): void | Promise<void>;
  onAcquired(deviceId: bigint, acquiredInfo: number): void | Promise<void>;
  onAuthenticated(deviceId: bigint, templateId: TemplateId, subjectId: SubjectId): void | Promise<void>;
  onError(deviceId: bigint, code: SensorErrorCode): void | Promise<void>;
  onRemoved(deviceId: bigint, templateId: TemplateId, subjectId: SubjectId): void | Promise<void>;
}
