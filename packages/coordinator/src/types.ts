import type {
  CallerHandle,
  SessionResultSink,
  SubjectId,
  TemplateId,
} from "@sensorgate/contracts";

export interface Clock {
  now(): Date;
}

export interface ScheduledTimer {
  cancel(): void;
}

/**
 * Source of one-shot timers. Real timers by default; tests and simulations drive a manual one.
 */
export interface Scheduler {
  schedule(delayMs: number, callback: () => void): ScheduledTimer;
}

export const defaultClock: Clock = {
  now: () => new Date(),
};

export const defaultScheduler: Scheduler = {
  schedule(delayMs, callback) {
    const handle = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(handle),
    };
  },
};

interface SessionRequestBase {
  readonly caller: CallerHandle;
  readonly sink?: SessionResultSink;
  readonly subjectId: SubjectId;
}

export interface EnrollRequest extends SessionRequestBase {
  /** Hardware auth token obtained after `preEnroll`. */
  readonly token: Uint8Array;
}

export interface AuthenticateRequest extends SessionRequestBase {
  readonly operationId: bigint;
}

export interface RemoveRequest extends SessionRequestBase {
  /** `0` removes every template of the subject. */
  readonly templateId: TemplateId;
}
