import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_SENSORGATE_CONFIG,
  parseSensorgateConfig,
  readConfigFromEnv,
  resolveSensorgateConfig,
} from "./config.js";

describe("sensorgate configuration", () => {
  let directory = "";

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "sensorgate-config-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("fills in defaults", () => {
    expect(parseSensorgateConfig({})).toEqual({
      ok: true,
      value: {
        maxFailedAttempts: 5,
        lockoutDurationMs: 30_000,
        enrollTimeoutMs: 60_000,
        templateDataRoot: "/data/system",
        templateDirName: "fpdata",
        teardownOnDriverRejection: false,
        logLevel: "info",
      },
    });
    expect(DEFAULT_SENSORGATE_CONFIG.maxFailedAttempts).toBe(5);
  });

  it("lists every problem with invalid input", () => {
    const result = parseSensorgateConfig({ maxFailedAttempts: 0, templateDirName: "a/b", extra: true });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("config.invalid");
      expect(result.error.details).toEqual({
        issues: expect.arrayContaining([
          expect.stringMatching(/^maxFailedAttempts: /),
          "templateDirName: must be a single path segment",
          expect.stringContaining("extra"),
        ]),
        source: undefined,
      });
    }
  });

  it("reads SENSORGATE_* variables", () => {
    const values = readConfigFromEnv({
      SENSORGATE_MAX_FAILED_ATTEMPTS: "3",
      SENSORGATE_TEARDOWN_ON_DRIVER_REJECTION: "true",
      SENSORGATE_LOG_LEVEL: "debug",
      UNRELATED: "ignored",
    });

    expect(values).toEqual({ maxFailedAttempts: 3, teardownOnDriverRejection: true, logLevel: "debug" });
  });

  it("rejects variables that are not numbers where numbers are expected", async () => {
    const result = await resolveSensorgateConfig({ env: { SENSORGATE_LOCKOUT_DURATION_MS: "soon" } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toMatchObject({
        issues: [expect.stringMatching(/^lockoutDurationMs: /)],
      });
    }
  });

  it("layers the file, the environment and overrides", async () => {
    const filePath = join(directory, "sensorgate.yaml");
    await writeFile(filePath, "maxFailedAttempts: 2\nlockoutDurationMs: 9000\ntemplateDirName: prints\n", "utf8");

    const result = await resolveSensorgateConfig({
      filePath,
      env: { SENSORGATE_LOCKOUT_DURATION_MS: "1000" },
      overrides: { enrollTimeoutMs: 5_000 },
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({
        maxFailedAttempts: 2,
        lockoutDurationMs: 1_000,
        enrollTimeoutMs: 5_000,
        templateDirName: "prints",
      });
    }
  });

  it("reads JSON files", async () => {
    const filePath = join(directory, "sensorgate.json");
    await writeFile(filePath, JSON.stringify({ logLevel: "warn" }), "utf8");

    const result = await resolveSensorgateConfig({ filePath, env: {} });

    expect(result.ok && result.value.logLevel).toBe("warn");
  });

  it("reports unreadable files as invalid configuration", async () => {
    const broken = join(directory, "broken.json");
    await writeFile(broken, "{ not json", "utf8");

    const unparsable = await resolveSensorgateConfig({ filePath: broken, env: {} });
    const missing = await resolveSensorgateConfig({ filePath: join(directory, "absent.yaml"), env: {} });

    expect(!unparsable.ok && unparsable.error.code).toBe("config.invalid");
    expect(!missing.ok && missing.error.code).toBe("config.invalid");
  });

  it("requires a mapping at the top of the file", async () => {
    const filePath = join(directory, "list.yaml");
    await writeFile(filePath, "- 1\n- 2\n", "utf8");

    const result = await resolveSensorgateConfig({ filePath, env: {} });

    expect(!result.ok && result.error.details).toEqual({
      issues: ["expected a mapping at the top level"],
      source: filePath,
    });
  });
});
