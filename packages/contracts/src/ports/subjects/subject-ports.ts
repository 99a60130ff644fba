import type { SensorgateError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { SubjectId } from "../../types/biometric.js";

/**
 * Resolves (and prepares) the directory the driver keeps a subject's template data in.
 */
export interface SubjectStoragePort {
  prepare(subjectId: SubjectId): Promise<Result<string, SensorgateError>>;
}

export interface SubjectSwitchSourcePort {
  onSubjectSwitching(listener: (subjectId: SubjectId) => void): () => void;
}
