import type { SensorEventListener, SubjectId, TemplateId } from "../../types/biometric.js";

/**
 * Driver status code. `0` means the driver accepted the request.
 */
export type DriverStatus = number;

export interface SensorDriverPort {
  /**
   * Registers the event listener and opens the sensor, returning its hardware device id
   * (`0n` when no hardware is present).
   */
  open(listener: SensorEventListener): Promise<bigint>;
  preEnroll(): Promise<bigint>;
  enroll(token: Uint8Array, subjectId: SubjectId, timeoutSeconds: number): Promise<DriverStatus>;
  cancelEnrollment(): Promise<DriverStatus>;
  authenticate(operationId: bigint, subjectId: SubjectId): Promise<DriverStatus>;
  cancelAuthentication(): Promise<DriverStatus>;
  remove(templateId: TemplateId, subjectId: SubjectId): Promise<DriverStatus>;
  setActiveSubject(subjectId: SubjectId, storagePath: string): Promise<DriverStatus>;
  getAuthenticatorId(): Promise<bigint>;
  /**
   * Throws when the driver process is already gone.
   */
  onDeath(listener: () => void): () => void;
}

export interface SensorDriverRegistryPort {
  lookup(): SensorDriverPort | undefined;
}
