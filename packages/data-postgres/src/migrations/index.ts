import { readFile } from "node:fs/promises";

import type { QueryExecutor } from "../executors/query-executor.js";
import { DEFAULT_TEMPLATE_TABLE, validateTableName } from "../table-name.js";

export interface PostgresMigration {
  readonly id: string;
  readonly filename: string;
  readonly description: string;
}

export const postgresMigrations: ReadonlyArray<PostgresMigration> = [
  {
    id: "0001_templates",
    filename: "0001_templates.sql",
    description: "Enrolled templates per subject with their labels and device ids",
  },
];

export const MIGRATIONS_TABLE = "sensorgate_migrations";

export interface RunPostgresMigrationsOptions {
  /**
   * Template table the migrations create; `{{table}}` in each file is replaced with it.
   */
  readonly tableName?: string;
}

export const readMigrationSql = async (
  migration: PostgresMigration,
  tableName = DEFAULT_TEMPLATE_TABLE,
): Promise<string> => {
  const sql = await readFile(new URL(`./${migration.filename}`, import.meta.url), "utf8");
  return sql.replaceAll("{{table}}", validateTableName(tableName));
};

const migrate = { operation: "migrate" } as const;

/**
 * Applies every migration not yet recorded for the template table, in order. Migrations are
 * tracked per table, so stores on different tables each get their own schema. Returns the ids applied.
 */
export const runPostgresMigrations = async (
  executor: QueryExecutor,
  options: RunPostgresMigrationsOptions = {},
): Promise<ReadonlyArray<string>> => {
  const tableName = validateTableName(options.tableName ?? DEFAULT_TEMPLATE_TABLE);
  await executor.query(
    `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT NOT NULL,
      table_name TEXT NOT NULL,
      description TEXT NOT NULL,
      PRIMARY KEY (id, table_name)
    )`,
    [],
    migrate,
  );

  const { rows } = await executor.query<{ id: string }>(
    `SELECT id FROM ${MIGRATIONS_TABLE} WHERE table_name = $1`,
    [tableName],
    migrate,
  );
  const applied = new Set(rows.map((row) => row.id));

  const appliedNow: string[] = [];
  for (const migration of postgresMigrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    await executor.query(await readMigrationSql(migration, tableName), [], migrate);
    await executor.query(
      `INSERT INTO ${MIGRATIONS_TABLE} (id, table_name, description) VALUES ($1, $2, $3)`,
      [migration.id, tableName, migration.description],
      migrate,
    );
    appliedNow.push(migration.id);
  }
  return appliedNow;
};
