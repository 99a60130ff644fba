import { metrics, type Counter, type Histogram, type Meter } from "@opentelemetry/api";

export interface SensorgateInstrumentationOptions {
  readonly name?: string;
  readonly version?: string;
  readonly schemaUrl?: string;
}

const DEFAULT_INSTRUMENTATION_NAME = "sensorgate";

/**
 * Returns a meter from the globally registered provider; without an SDK this is the
 * OpenTelemetry no-op meter.
 */
export const getSensorgateMeter = (options: SensorgateInstrumentationOptions = {}): Meter => {
  return metrics.getMeter(options.name ?? DEFAULT_INSTRUMENTATION_NAME, options.version, {
    schemaUrl: options.schemaUrl,
  });
};

export interface SensorgateCounterOptions {
  readonly description?: string;
  readonly unit?: string;
  readonly instrumentation?: SensorgateInstrumentationOptions;
}

export const createSensorgateCounter = (name: string, options: SensorgateCounterOptions = {}): Counter => {
  const { instrumentation, ...counterOptions } = options;
  return getSensorgateMeter(instrumentation).createCounter(name, counterOptions);
};

export interface SensorgateHistogramOptions {
  readonly description?: string;
  readonly unit?: string;
  readonly instrumentation?: SensorgateInstrumentationOptions;
}

export const createSensorgateHistogram = (name: string, options: SensorgateHistogramOptions = {}): Histogram => {
  const { instrumentation, ...histogramOptions } = options;
  return getSensorgateMeter(instrumentation).createHistogram(name, histogramOptions);
};
