import type { QueryResultRow } from "pg";

import type { SubjectId } from "@sensorgate/contracts";

export interface QueryResult<Row> {
  readonly rows: ReadonlyArray<Row>;
}

export type TemplateQueryOperation =
  | "add_template"
  | "find_template"
  | "list_labels"
  | "remove_template"
  | "list_templates"
  | "rename_template"
  | "migrate";

/**
 * What a statement does for the template store. Executors use it to name spans and label metrics.
 */
export interface QueryContext {
  readonly operation: TemplateQueryOperation;
  readonly subjectId?: SubjectId;
}

export interface QueryExecutor {
  query<Row extends QueryResultRow = Record<string, unknown>>(
    sql: string,
    params: ReadonlyArray<unknown>,
    context: QueryContext,
  ): Promise<QueryResult<Row>>;
}
