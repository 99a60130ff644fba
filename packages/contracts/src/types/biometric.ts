/**
 * User or group scope whose templates an operation reads or writes.
 */
export type SubjectId = number;

/**
 * Identifier the sensor driver assigns to an enrolled template. `0` is reserved:
 * in `authenticated` it means "no match", in `removed` it means "all removed".
 */
export type TemplateId = number;

export type SessionKind = "enroll" | "authenticate" | "remove";

export const SESSION_KINDS: ReadonlyArray<SessionKind> = ["enroll", "authenticate", "remove"];

export const NO_TEMPLATE: TemplateId = 0;

/**
 * Error codes delivered to result sinks. Values match the driver's wire constants.
 */
export const SensorErrorCode = {
  hwUnavailable: 1,
  unableToProcess: 2,
  timeout: 3,
  noSpace: 4,
  canceled: 5,
  unableToRemove: 6,
  lockout: 7,
  vendorBase: 1000,
} as const;

export type SensorErrorCode = number;

export const AcquiredInfo = {
  good: 0,
  partial: 1,
  insufficient: 2,
  imagerDirty: 3,
  tooSlow: 4,
  tooFast: 5,
  vendorBase: 1000,
} as const;

export interface TemplateRecord {
  readonly subjectId: SubjectId;
  readonly templateId: TemplateId;
  readonly label: string;
  readonly deviceId: string;
}

export type SensorEvent =
  | {
      readonly type: "enroll_progress";
      readonly deviceId: bigint;
      readonly templateId: TemplateId;
      readonly subjectId: SubjectId;
      readonly remaining: number;
    }
  | { readonly type: "acquired"; readonly deviceId: bigint; readonly acquiredInfo: number }
  | {
      readonly type: "authenticated";
      readonly deviceId: bigint;
      readonly templateId: TemplateId;
      readonly subjectId: SubjectId;
    }
  | { readonly type: "error"; readonly deviceId: bigint; readonly code: SensorErrorCode }
  | {
      readonly type: "removed";
      readonly deviceId: bigint;
      readonly templateId: TemplateId;
      readonly subjectId: SubjectId;
    }
  | {
      readonly type: "enumerate";
      readonly deviceId: bigint;
      readonly templateIds: ReadonlyArray<TemplateId>;
      readonly subjectIds: ReadonlyArray<SubjectId>;
    };

export type SensorEventType = SensorEvent["type"];

export type SensorEventListener = (event: SensorEvent) => void;

const DEFAULT_LABEL_PATTERN = /^Fingerprint (\d+)$/;

/**
 * Picks the first `Fingerprint N` label not already taken by one of the subject's templates.
 */
export const createDefaultTemplateLabel = (existing: ReadonlyArray<Pick<TemplateRecord, "label">>): string => {
  const taken = new Set<number>();
  for (const record of existing) {
    const match = DEFAULT_LABEL_PATTERN.exec(record.label);
    if (match) {
      taken.add(Number(match[1]));
    }
  }
  let candidate = 1;
  while (taken.has(candidate)) {
    candidate += 1;
  }
  return `Fingerprint ${candidate}`;
};
