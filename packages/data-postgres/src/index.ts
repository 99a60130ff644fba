export type { QueryContext, QueryExecutor, QueryResult, TemplateQueryOperation } from "./executors/query-executor.js";
export type { CreatePgQueryExecutorOptions, PgQueryable } from "./executors/pg-query-executor.js";
export { createPgQueryExecutor } from "./executors/pg-query-executor.js";

export type { PostgresMigration, RunPostgresMigrationsOptions } from "./migrations/index.js";
export { MIGRATIONS_TABLE, postgresMigrations, readMigrationSql, runPostgresMigrations } from "./migrations/index.js";

export type {
  PostgresTelemetryContext,
  PostgresTelemetryMetrics,
  PostgresTelemetryOptions,
} from "./telemetry.js";
export { createPostgresTelemetry } from "./telemetry.js";

export type { PostgresTemplateStoreOptions } from "./template-store.js";
export { PostgresTemplateStore, createPostgresTemplateStore } from "./template-store.js";
export { DEFAULT_TEMPLATE_TABLE, validateTableName } from "./table-name.js";

export type { TemplateStoreFromPoolOptions } from "./pool.js";
export { createTemplateStoreFromPool } from "./pool.js";
