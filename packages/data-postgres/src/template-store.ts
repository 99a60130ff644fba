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

import { createError, createStoreFailedError } from "./errors.js";
import type { QueryExecutor } from "./executors/query-executor.js";
import { DEFAULT_TEMPLATE_TABLE, validateTableName } from "./table-name.js";

export interface PostgresTemplateStoreOptions {
  readonly executor: QueryExecutor;
  readonly tableName?: string;
}

type TemplateRow = {
  readonly subjectId: number;
  readonly templateId: number;
  readonly label: string;
  readonly deviceId: string;
};

const selectColumns = `
  subject_id AS "subjectId",
  template_id AS "templateId",
  label,
  device_id AS "deviceId"
`;

const toRecord = (row: TemplateRow): TemplateRecord => ({
  subjectId: Number(row.subjectId),
  templateId: Number(row.templateId),
  label: row.label,
  deviceId: row.deviceId,
});

/**
 * Template store backed by a single Postgres table. Listing follows insertion order through the
 * table's serial `seq` column.
 */
export class PostgresTemplateStore implements TemplateStorePort {
  private readonly executor: QueryExecutor;
  private readonly tableName: string;

  constructor(options: PostgresTemplateStoreOptions) {
    this.executor = options.executor;
    this.tableName = validateTableName(options.tableName ?? DEFAULT_TEMPLATE_TABLE);
  }

  async addTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    options: AddTemplateOptions = {},
  ): Promise<Result<TemplateRecord, SensorgateError>> {
    try {
      let label = options.label;
      if (label === undefined) {
        const labels = await this.executor.query<{ label: string }>(
          `SELECT label FROM ${this.tableName} WHERE subject_id = $1`,
          [subjectId],
          { operation: "list_labels", subjectId },
        );
        label = createDefaultTemplateLabel(labels.rows);
      }

      const inserted = await this.executor.query<TemplateRow>(
        `INSERT INTO ${this.tableName} (subject_id, template_id, label, device_id)
          VALUES ($1, $2, $3, $4)
          ON CONFLICT (subject_id, template_id) DO NOTHING
          RETURNING${selectColumns}`,
        [subjectId, templateId, label, (options.deviceId ?? 0n).toString()],
        { operation: "add_template", subjectId },
      );
      const row = inserted.rows[0];
      if (row) {
        return ok(toRecord(row));
      }

      // Already enrolled: keep the stored record.
      const existing = await this.executor.query<TemplateRow>(
        `SELECT${selectColumns} FROM ${this.tableName} WHERE subject_id = $1 AND template_id = $2 LIMIT 1`,
        [subjectId, templateId],
        { operation: "find_template", subjectId },
      );
      const found = existing.rows[0];
      if (!found) {
        return err(
          createStoreFailedError(
            "Postgres returned neither an inserted nor a stored template row.",
            new Error("missing row"),
            { subjectId, templateId },
          ),
        );
      }
      return ok(toRecord(found));
    } catch (error) {
      return err(
        createStoreFailedError("Failed to add template in Postgres.", error, { subjectId, templateId }),
      );
    }
  }

  async removeTemplate(subjectId: SubjectId, templateId: TemplateId): Promise<Result<void, SensorgateError>> {
    try {
      await this.executor.query(
        `DELETE FROM ${this.tableName} WHERE subject_id = $1 AND template_id = $2`,
        [subjectId, templateId],
        { operation: "remove_template", subjectId },
      );
      return ok(undefined);
    } catch (error) {
      return err(
        createStoreFailedError("Failed to remove template from Postgres.", error, { subjectId, templateId }),
      );
    }
  }

  async listTemplates(subjectId: SubjectId): Promise<Result<ReadonlyArray<TemplateRecord>, SensorgateError>> {
    try {
      const { rows } = await this.executor.query<TemplateRow>(
        `SELECT${selectColumns} FROM ${this.tableName} WHERE subject_id = $1 ORDER BY seq ASC`,
        [subjectId],
        { operation: "list_templates", subjectId },
      );
      return ok(rows.map(toRecord));
    } catch (error) {
      return err(createStoreFailedError("Failed to list templates from Postgres.", error, { subjectId }));
    }
  }

  async renameTemplate(
    subjectId: SubjectId,
    templateId: TemplateId,
    label: string,
  ): Promise<Result<TemplateRecord, SensorgateError>> {
    try {
      const { rows } = await this.executor.query<TemplateRow>(
        `UPDATE ${this.tableName} SET label = $3
          WHERE subject_id = $1 AND template_id = $2
          RETURNING${selectColumns}`,
        [subjectId, templateId, label],
        { operation: "rename_template", subjectId },
      );
      const row = rows[0];
      if (!row) {
        return err(
          createError("template.not_found", "No template with this id is enrolled for the subject.", {
            subjectId,
            templateId,
          }),
        );
      }
      return ok(toRecord(row));
    } catch (error) {
      return err(
        createStoreFailedError("Failed to rename template in Postgres.", error, { subjectId, templateId }),
      );
    }
  }
}

export const createPostgresTemplateStore = (options: PostgresTemplateStoreOptions): PostgresTemplateStore =>
  new PostgresTemplateStore(options);
