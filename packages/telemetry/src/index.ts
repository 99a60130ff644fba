export type {
  SensorgateInstrumentationOptions,
  SensorgateCounterOptions,
  SensorgateHistogramOptions,
} from "./metrics.js";
export { getSensorgateMeter, createSensorgateCounter, createSensorgateHistogram } from "./metrics.js";

export type { LogWriter, SensorgateLogger, SensorgateLoggerOptions, SensorgateLogLevel } from "./logging.js";
export { LOG_LEVELS, createSensorgateLogger, createSilentLogger, isLogLevel } from "./logging.js";

export type { SensorgateTracer, RunWithSpanOptions } from "./tracing.js";
export { getSensorgateTracer, runWithSpan, SpanStatusCode } from "./tracing.js";
