import {
  createDefaultTemplateLabel,
  err,
  ok,
  type AddTemplateOptions,
  type Result,
  type SensorgateError,
  type SubjectId,
  type TemplateId,
  type TemplateRecord,
  type TemplateStorePort,
} from "@sensorgate/contracts";

export interface MemoryTemplateStoreOptions {
  readonly initialTemplates?: ReadonlyArray<TemplateRecord>;
}

interface StoredTemplate {
  templateId: TemplateId;
  label: string;
  deviceId: string;
}

const createError = (code: string, message: string, details?: Record<string, unknown>): SensorgateError => ({
  code,
  message,
  details,
});

const toRecord = (subjectId: SubjectId, stored: StoredTemplate): TemplateRecord => ({
  subjectId,
  templateId: stored.templateId,
  label: stored.label,
  deviceId: stored.deviceId,
});

/**
 * Templates per subject, in enrollment order.
 */
export class MemoryTemplateStore implements TemplateStorePort {
  private readonly subjects = new Map<SubjectId, Map<TemplateId, StoredTemplate>>();

  constructor(options: MemoryTemplateStoreOptions = {}) {
    for (const record of options.initialTemplates ?? []) {
      this.templatesOf(record.subjectId).set(record.templateId, {
        templateId: record.templateId,
        label: record.label,
        deviceId: record.deviceId,
      });
    }
  }

  async addTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    options: AddTemplateOptions = {},
  ): Promise<Result<TemplateRecord, SensorgateError>> {
    const templates = this.templatesOf(subjectId);
    const existing = templates.get(templateId);
    if (existing) {
      return ok(toRecord(subjectId, existing));
    }

    const stored: StoredTemplate = {
      templateId,
      label: options.label ?? createDefaultTemplateLabel(Array.from(templates.values())),
      deviceId: (options.deviceId ?? 0n).toString(),
    };
    templates.set(templateId, stored);
    return ok(toRecord(subjectId, stored));
  }

  async removeTemplate(subjectId: SubjectId, templateId: TemplateId): Promise<Result<void, SensorgateError>> {
    const templates = this.subjects.get(subjectId);
    templates?.delete(templateId);
    if (templates && templates.size === 0) {
      this.subjects.delete(subjectId);
    }
    return ok(undefined);
  }

  async listTemplates(subjectId: SubjectId): Promise<Result<ReadonlyArray<TemplateRecord>, SensorgateError>> {
    const templates = this.subjects.get(subjectId);
    if (!templates) {
      return ok([]);
    }
    return ok(Array.from(templates.values(), (stored) => toRecord(subjectId, stored)));
  }

  async renameTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    label: string,
  ): Promise<Result<TemplateRecord, SensorgateError>> {
    const stored = this.subjects.get(subjectId)?.get(templateId);
    if (!stored) {
      return err(
        createError("template.not_found", "No template with this id is enrolled for the subject.", {
          subjectId,
          templateId,
        }),
      );
    }
    stored.label = label;
    return ok(toRecord(subjectId, stored));
  }

  /**
   * Every stored template across subjects, ordered by subject then enrollment.
   */
  snapshot(): ReadonlyArray<TemplateRecord> {
    const subjects = Array.from(this.subjects.keys()).sort((left, right) => left - right);
    return subjects.flatMap((subjectId) =>
      Array.from(this.templatesOf(subjectId).values(), (stored) => toRecord(subjectId, stored)),
    );
  }

  private templatesOf(subjectId: SubjectId): Map<TemplateId, StoredTemplate> {
    let templates = this.subjects.get(subjectId);
    if (!templates) {
      templates = new Map();
      this.subjects.set(subjectId, templates);
    }
    return templates;
  }
}

export const createMemoryTemplateStore = (options?: MemoryTemplateStoreOptions): MemoryTemplateStore =>
  new MemoryTemplateStore(options);
