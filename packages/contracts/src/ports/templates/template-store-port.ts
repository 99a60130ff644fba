import type { SensorgateError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";
import type { SubjectId, TemplateId, TemplateRecord } from "../../types/biometric.js";

export interface AddTemplateOptions {
  readonly deviceId?: bigint;
  readonly label?: string;
}

export interface TemplateStorePort {
  /**
   * Adding an id the subject already owns returns the stored record unchanged.
   */
  addTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    options?: AddTemplateOptions,
  ): Promise<Result<TemplateRecord, SensorgateError>>;
  removeTemplate(subjectId: SubjectId, templateId: TemplateId): Promise<Result<void, SensorgateError>>;
  listTemplates(subjectId: SubjectId): Promise<Result<ReadonlyArray<TemplateRecord>, SensorgateError>>;
  renameTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    label: string,
  ): Promise<Result<TemplateRecord, SensorgateError>>;
}
