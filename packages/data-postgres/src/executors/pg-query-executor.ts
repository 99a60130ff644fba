import type { Pool, QueryResultRow } from "pg";

import { runWithSpan } from "@sensorgate/telemetry";

import { normalizeError } from "../errors.js";
import type { PostgresTelemetryContext } from "../telemetry.js";
import type { QueryContext, QueryExecutor, QueryResult } from "./query-executor.js";

/**
 * Anything with pg's `query` signature: a `Pool`, a checked-out `PoolClient`, or pg-mem's adapter.
 */
export type PgQueryable = Pick<Pool, "query">;

export interface CreatePgQueryExecutorOptions {
  readonly telemetry?: PostgresTelemetryContext;
}

const STATEMENT_LOG_LIMIT = 200;

const abbreviate = (sql: string): string => {
  const flat = sql.replace(/\s+/g, " ").trim();
  return flat.length > STATEMENT_LOG_LIMIT ? `${flat.slice(0, STATEMENT_LOG_LIMIT)}…` : flat;
};

/**
 * Runs template store statements on a pg pool. With telemetry each statement gets a
 * `template_store.<operation>` span plus a count and a duration labelled by operation and outcome.
 */
export const createPgQueryExecutor = (
  queryable: PgQueryable,
  options: CreatePgQueryExecutorOptions = {},
): QueryExecutor => {
  const telemetry = options.telemetry;

  const send = async <Row extends QueryResultRow>(
    sql: string,
    params: ReadonlyArray<unknown>,
  ): Promise<ReadonlyArray<Row>> => (await queryable.query<Row>(sql, [...params])).rows;

  return {
    async query<Row extends QueryResultRow = Record<string, unknown>>(
      sql: string,
      params: ReadonlyArray<unknown>,
      context: QueryContext,
    ): Promise<QueryResult<Row>> {
      if (!telemetry) {
        return { rows: await send<Row>(sql, params) };
      }

      const { operation, subjectId } = context;
      const start = performance.now();
      const observe = (outcome: "ok" | "error"): number => {
        const durationMs = performance.now() - start;
        telemetry.metrics.queryCounter.add(1, { operation, outcome });
        telemetry.metrics.queryDuration.record(durationMs, { operation, outcome });
        return durationMs;
      };

      try {
        const rows = await runWithSpan(
          telemetry.tracer,
          `template_store.${operation}`,
          async (span) => {
            const found = await send<Row>(sql, params);
            span.setAttribute("db.rows_returned", found.length);
            return found;
          },
          {
            attributes: {
              "db.system": "postgresql",
              "db.statement": abbreviate(sql),
              "template.operation": operation,
              "template.subject_id": subjectId,
            },
          },
        );
        const durationMs = observe("ok");
        telemetry.logger.debug("template_store.query", { operation, subjectId, rows: rows.length, durationMs });
        return { rows };
      } catch (error) {
        observe("error");
        telemetry.logger.error("template_store.query_failed", {
          operation,
          subjectId,
          statement: abbreviate(sql),
          error: normalizeError(error),
        });
        throw error;
      }
    },
  };
};
