export type SensorgateLogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: ReadonlyArray<SensorgateLogLevel> = ["debug", "info", "warn", "error"];

/**
 * Receives one serialized log line. Defaults to the console stream matching the level.
 */
export type LogWriter = (level: SensorgateLogLevel, line: string) => void;

export interface SensorgateLoggerOptions {
  readonly name?: string;
  readonly level?: SensorgateLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly writer?: LogWriter;
  readonly clock?: () => Date;
}

export interface SensorgateLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): SensorgateLogger;
}

const LOG_LEVEL_PRIORITY: Record<SensorgateLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Driver ids are 64-bit; JSON.stringify throws on bigint.
const replaceValue = (_key: string, value: unknown): unknown => {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
};

export const isLogLevel = (value: string): value is SensorgateLogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const createSensorgateLogger = (options: SensorgateLoggerOptions = {}): SensorgateLogger => {
  const name = options.name ?? "sensorgate";
  const level = options.level ?? "info";
  const writer = options.writer ?? consoleWriter;
  const clock = options.clock ?? (() => new Date());
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const threshold = LOG_LEVEL_PRIORITY[level];

  const createInstance = (contextFields: Record<string, unknown>): SensorgateLogger => {
    const serialize = (levelName: SensorgateLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[levelName] < threshold) {
        return;
      }

      const payload = {
        timestamp: clock().toISOString(),
        level: levelName,
        message,
        ...contextFields,
        ...context,
      } satisfies Record<string, unknown>;

      writer(levelName, JSON.stringify(payload, replaceValue));
    };

    return {
      debug(message, context) {
        serialize("debug", message, context);
      },
      info(message, context) {
        serialize("info", message, context);
      },
      warn(message, context) {
        serialize("warn", message, context);
      },
      error(message, context) {
        serialize("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies SensorgateLogger;
  };

  return createInstance(baseFields);
};

/**
 * Logger that drops every line. Used where a component is built without telemetry.
 */
export const createSilentLogger = (): SensorgateLogger =>
  createSensorgateLogger({ level: "error", writer: () => undefined });
