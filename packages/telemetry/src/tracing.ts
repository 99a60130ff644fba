import {
  SpanStatusCode,
  trace,
  type Context,
  type Span,
  type SpanAttributes,
  type SpanOptions,
  type Tracer,
} from "@opentelemetry/api";

import type { SensorgateInstrumentationOptions } from "./metrics.js";

export type SensorgateTracer = Tracer;

export interface RunWithSpanOptions {
  readonly spanOptions?: SpanOptions;
  readonly attributes?: SpanAttributes;
  readonly context?: Context;
  readonly onError?: (error: unknown, span: Span) => void;
}

export const getSensorgateTracer = (options: SensorgateInstrumentationOptions = {}): Tracer =>
  trace.getTracerProvider().getTracer(options.name ?? "sensorgate", options.version, { schemaUrl: options.schemaUrl });

const toException = (error: unknown): Error | string =>
  error instanceof Error ? error : String(error);

export const runWithSpan = async <T>(
  tracer: Tracer,
  name: string,
  callback: (span: Span) => Promise<T> | T,
  options: RunWithSpanOptions = {},
): Promise<T> => {
  const attributes = options.attributes ?? {};
  const spanOptions = options.spanOptions ?? {};
  const context = options.context;

  const executor = async (span: Span): Promise<T> => {
    for (const [key, value] of Object.entries(attributes)) {
      if (value !== undefined) {
        span.setAttribute(key, value);
      }
    }

    try {
      const result = await callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.recordException(toException(error));
      options.onError?.(error, span);
      throw error;
    } finally {
      span.end();
    }
  };

  if (context) {
    return tracer.startActiveSpan(name, spanOptions, context, executor);
  }

  return tracer.startActiveSpan(name, spanOptions, executor);
};

export { SpanStatusCode };
