import type { Pool } from "pg";

import { createPgQueryExecutor } from "./executors/pg-query-executor.js";
import { runPostgresMigrations } from "./migrations/index.js";
import { DEFAULT_TEMPLATE_TABLE } from "./table-name.js";
import { createPostgresTelemetry, type PostgresTelemetryContext } from "./telemetry.js";
import { PostgresTemplateStore } from "./template-store.js";

export interface TemplateStoreFromPoolOptions {
  readonly telemetry?: PostgresTelemetryContext;
  /**
   * Table the store reads and writes. Migrations create it under this name.
   */
  readonly tableName?: string;
  /**
   * Applies pending migrations before returning. Off when the schema is managed elsewhere.
   */
  readonly migrate?: boolean;
}

export const createTemplateStoreFromPool = async (
  pool: Pool,
  options: TemplateStoreFromPoolOptions = {},
): Promise<PostgresTemplateStore> => {
  const telemetry = options.telemetry ?? createPostgresTelemetry();
  const tableName = options.tableName ?? DEFAULT_TEMPLATE_TABLE;
  const executor = createPgQueryExecutor(pool, { telemetry });
  const store = new PostgresTemplateStore({ executor, tableName });

  if (options.migrate ?? true) {
    const applied = await runPostgresMigrations(executor, { tableName });
    if (applied.length > 0) {
      telemetry.metrics.migrationsApplied.add(applied.length, { table: tableName });
      telemetry.logger.info("postgres.migrations.applied", { table: tableName, migrations: applied });
    }
  }
  return store;
};
