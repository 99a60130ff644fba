import {
  createSensorgateCounter,
  createSensorgateHistogram,
  createSensorgateLogger,
  getSensorgateTracer,
  type SensorgateInstrumentationOptions,
  type SensorgateLogger,
  type SensorgateTracer,
} from "@sensorgate/telemetry";

export interface PostgresTelemetryMetrics {
  /** Statements run for the template store, by `operation` and `outcome`. */
  readonly queryCounter: ReturnType<typeof createSensorgateCounter>;
  readonly queryDuration: ReturnType<typeof createSensorgateHistogram>;
  /** Migration files applied, by template `table`. */
  readonly migrationsApplied: ReturnType<typeof createSensorgateCounter>;
}

export interface PostgresTelemetryOptions {
  readonly instrumentation?: SensorgateInstrumentationOptions;
  readonly tracer?: SensorgateTracer;
  readonly logger?: SensorgateLogger;
  readonly metrics?: Partial<PostgresTelemetryMetrics>;
}

export interface PostgresTelemetryContext {
  readonly tracer: SensorgateTracer;
  readonly logger: SensorgateLogger;
  readonly metrics: PostgresTelemetryMetrics;
}

const INSTRUMENTATION_NAME = "sensorgate-template-postgres";

export const createPostgresTelemetry = (options: PostgresTelemetryOptions = {}): PostgresTelemetryContext => {
  const instrumentation = { name: INSTRUMENTATION_NAME, ...options.instrumentation };
  const metrics = options.metrics ?? {};

  return {
    tracer: options.tracer ?? getSensorgateTracer(instrumentation),
    logger: options.logger ?? createSensorgateLogger({ name: instrumentation.name }),
    metrics: {
      queryCounter:
        metrics.queryCounter ??
        createSensorgateCounter("template_store_queries_total", {
          description: "Template store statements executed against Postgres.",
          instrumentation,
        }),
      queryDuration:
        metrics.queryDuration ??
        createSensorgateHistogram("template_store_query_duration_ms", {
          description: "Duration of template store statements.",
          unit: "ms",
          instrumentation,
        }),
      migrationsApplied:
        metrics.migrationsApplied ??
        createSensorgateCounter("template_store_migrations_applied_total", {
          description: "Template store migration files applied.",
          instrumentation,
        }),
    },
  };
};
