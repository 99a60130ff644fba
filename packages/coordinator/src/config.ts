import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { err, ok, type Result, type SensorgateError } from "@sensorgate/contracts";
import { parse as parseYaml } from "yaml";
import { z, type ZodIssue } from "zod";

import { createError, describeError } from "./errors.js";

export const sensorgateConfigSchema = z
  .object({
    maxFailedAttempts: z.number().int().min(1).default(5),
    lockoutDurationMs: z.number().int().positive().default(30_000),
    enrollTimeoutMs: z.number().int().min(1_000).default(60_000),
    templateDataRoot: z.string().min(1).default("/data/system"),
    templateDirName: z
      .string()
      .min(1)
      .regex(/^[^/\\]+$/, "must be a single path segment")
      .default("fpdata"),
    teardownOnDriverRejection: z.boolean().default(false),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .strict();

export type SensorgateConfig = z.infer<typeof sensorgateConfigSchema>;
export type SensorgateConfigInput = z.input<typeof sensorgateConfigSchema>;

type ConfigKey = keyof SensorgateConfig;

const ENV_KEYS: Record<ConfigKey, string> = {
  maxFailedAttempts: "SENSORGATE_MAX_FAILED_ATTEMPTS",
  lockoutDurationMs: "SENSORGATE_LOCKOUT_DURATION_MS",
  enrollTimeoutMs: "SENSORGATE_ENROLL_TIMEOUT_MS",
  templateDataRoot: "SENSORGATE_TEMPLATE_DATA_ROOT",
  templateDirName: "SENSORGATE_TEMPLATE_DIR_NAME",
  teardownOnDriverRejection: "SENSORGATE_TEARDOWN_ON_DRIVER_REJECTION",
  logLevel: "SENSORGATE_LOG_LEVEL",
};

const NUMERIC_KEYS: ReadonlySet<ConfigKey> = new Set(["maxFailedAttempts", "lockoutDurationMs", "enrollTimeoutMs"]);
const BOOLEAN_KEYS: ReadonlySet<ConfigKey> = new Set(["teardownOnDriverRejection"]);

export const createConfigInvalidError = (issues: ReadonlyArray<string>, source?: string): SensorgateError =>
  createError("config.invalid", `Invalid sensorgate configuration${source ? ` in ${source}` : ""}.`, {
    issues,
    source,
  });

const formatIssue = (issue: ZodIssue): string => {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

export const parseSensorgateConfig = (
  input: unknown,
  source?: string,
): Result<SensorgateConfig, SensorgateError> => {
  const parsed = sensorgateConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return err(createConfigInvalidError(parsed.error.issues.map(formatIssue), source));
  }
  return ok(parsed.data);
};

const coerceEnvValue = (key: ConfigKey, raw: string): unknown => {
  const value = raw.trim();
  if (NUMERIC_KEYS.has(key)) {
    const numeric = Number(value);
    return value.length > 0 && Number.isFinite(numeric) ? numeric : value;
  }
  if (BOOLEAN_KEYS.has(key)) {
    const normalized = value.toLowerCase();
    if (normalized === "true" || normalized === "1") {
      return true;
    }
    if (normalized === "false" || normalized === "0") {
      return false;
    }
  }
  return value;
};

/**
 * Collects the `SENSORGATE_*` variables that are set. Values stay unvalidated.
 */
export const readConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): Record<string, unknown> => {
  const values: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined) {
      continue;
    }
    if (isConfigKey(key)) {
      values[key] = coerceEnvValue(key, raw);
    }
  }
  return values;
};

const isConfigKey = (key: string): key is ConfigKey => key in ENV_KEYS;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseDocument = (contents: string, filePath: string): unknown => {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".json") {
    return JSON.parse(contents);
  }
  return parseYaml(contents);
};

/**
 * Reads a YAML or JSON configuration file without applying defaults.
 */
export const readConfigFile = async (filePath: string): Promise<Result<Record<string, unknown>, SensorgateError>> => {
  let document: unknown;
  try {
    const contents = await readFile(filePath, "utf8");
    document = parseDocument(contents, filePath);
  } catch (error) {
    return err(createConfigInvalidError([describeError(error)], filePath));
  }

  if (document === null || document === undefined) {
    return ok({});
  }
  if (!isRecord(document)) {
    return err(createConfigInvalidError(["expected a mapping at the top level"], filePath));
  }
  return ok(document);
};

export interface ResolveConfigOptions {
  readonly filePath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: SensorgateConfigInput;
}

/**
 * Defaults, then the file, then `SENSORGATE_*` variables, then explicit overrides.
 */
export const resolveSensorgateConfig = async (
  options: ResolveConfigOptions = {},
): Promise<Result<SensorgateConfig, SensorgateError>> => {
  let fromFile: Record<string, unknown> = {};
  if (options.filePath) {
    const file = await readConfigFile(options.filePath);
    if (!file.ok) {
      return file;
    }
    fromFile = file.value;
  }

  const merged = {
    ...fromFile,
    ...readConfigFromEnv(options.env ?? process.env),
    ...options.overrides,
  };
  return parseSensorgateConfig(merged, options.filePath);
};

export const DEFAULT_SENSORGATE_CONFIG: SensorgateConfig = sensorgateConfigSchema.parse({});
