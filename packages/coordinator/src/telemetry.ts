import {
  createSensorgateCounter,
  createSensorgateHistogram,
  createSensorgateLogger,
  getSensorgateTracer,
  type SensorgateInstrumentationOptions,
  type SensorgateLogger,
  type SensorgateTracer,
} from "@sensorgate/telemetry";

export interface CoordinatorTelemetryMetrics {
  readonly sessionsStarted: ReturnType<typeof createSensorgateCounter>;
  readonly sessionsClosed: ReturnType<typeof createSensorgateCounter>;
  readonly driverCalls: ReturnType<typeof createSensorgateCounter>;
  readonly lockouts: ReturnType<typeof createSensorgateCounter>;
  readonly taskDuration: ReturnType<typeof createSensorgateHistogram>;
}

export interface CoordinatorTelemetryOptions {
  readonly instrumentation?: SensorgateInstrumentationOptions;
  readonly tracer?: SensorgateTracer;
  readonly logger?: SensorgateLogger;
  readonly metrics?: Partial<CoordinatorTelemetryMetrics>;
}

export interface CoordinatorTelemetryContext {
  readonly tracer: SensorgateTracer;
  readonly logger: SensorgateLogger;
  readonly metrics: CoordinatorTelemetryMetrics;
  readonly instrumentation: SensorgateInstrumentationOptions;
}

const DEFAULT_INSTRUMENTATION: SensorgateInstrumentationOptions = { name: "sensor-coordinator" };

export const createCoordinatorTelemetry = (
  options: CoordinatorTelemetryOptions = {},
): CoordinatorTelemetryContext => {
  const instrumentation: SensorgateInstrumentationOptions = {
    ...DEFAULT_INSTRUMENTATION,
    ...options.instrumentation,
  };

  const tracer = options.tracer ?? getSensorgateTracer(instrumentation);
  const logger = options.logger ?? createSensorgateLogger({ name: instrumentation.name ?? "sensor-coordinator" });
  const metrics: CoordinatorTelemetryMetrics = {
    sessionsStarted:
      options.metrics?.sessionsStarted ??
      createSensorgateCounter("sensor_sessions_started_total", {
        description: "Count of sensor sessions installed, by kind.",
        instrumentation,
      }),
    sessionsClosed:
      options.metrics?.sessionsClosed ??
      createSensorgateCounter("sensor_sessions_closed_total", {
        description: "Count of sensor sessions torn down, by kind and reason.",
        instrumentation,
      }),
    driverCalls:
      options.metrics?.driverCalls ??
      createSensorgateCounter("sensor_driver_calls_total", {
        description: "Count of sensor driver calls, by operation and outcome.",
        instrumentation,
      }),
    lockouts:
      options.metrics?.lockouts ??
      createSensorgateCounter("sensor_lockouts_total", {
        description: "Count of failed attempts that entered or extended a lockout.",
        instrumentation,
      }),
    taskDuration:
      options.metrics?.taskDuration ??
      createSensorgateHistogram("sensor_queue_task_duration_ms", {
        description: "Duration of tasks run on the coordinator queue.",
        unit: "ms",
        instrumentation,
      }),
  };

  return { tracer, logger, metrics, instrumentation } satisfies CoordinatorTelemetryContext;
};
