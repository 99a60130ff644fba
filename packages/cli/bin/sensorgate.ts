#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import type { SensorgateError } from "@sensorgate/contracts";
import { resolveSensorgateConfig } from "@sensorgate/coordinator";
import { createSensorgateLogger, isLogLevel, type SensorgateLogLevel } from "@sensorgate/telemetry";

import { ensureFormat, formatOutput, type OutputFormat } from "../src/output.js";
import { loadScenario } from "../src/scenario.js";
import { runScenario } from "../src/scenario-runner.js";

const program = new Command();

const parseLogLevel = (value: string): SensorgateLogLevel => {
  if (isLogLevel(value)) {
    return value;
  }
  throw new InvalidArgumentError("Expected one of: debug, info, warn, error.");
};

const parseFormat = (value: string): OutputFormat => {
  try {
    return ensureFormat(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
};

class CommandFailedError extends Error {
  constructor(readonly failure: SensorgateError) {
    super(failure.message);
  }
}

const fail = (failure: SensorgateError): never => {
  throw new CommandFailedError(failure);
};

program
  .name("sensorgate")
  .description("Inspect sensorgate configuration and replay sensor scenarios on a simulated driver");

program
  .command("simulate")
  .argument("<scenario>", "Path to the scenario file (JSON or YAML)")
  .option("--format <format>", "Output format (json|yaml)", parseFormat, "yaml")
  .option("--log-level <level>", "Coordinator log level written to stderr", parseLogLevel, "warn")
  .action(async (scenarioPath: string, options: { format: OutputFormat; logLevel: SensorgateLogLevel }) => {
    const scenario = await loadScenario(scenarioPath);
    if (!scenario.ok) {
      return fail(scenario.error);
    }

    const logger = createSensorgateLogger({
      name: "sensorgate-simulate",
      level: options.logLevel,
      writer: (_level, line) => {
        process.stderr.write(`${line}\n`);
      },
    });
    const report = await runScenario(scenario.value, { logger });
    if (!report.ok) {
      return fail(report.error);
    }
    process.stdout.write(formatOutput(report.value, options.format));
  });

program
  .command("config")
  .description("Print the configuration resolved from defaults, a file and SENSORGATE_* variables")
  .option("--config <path>", "YAML or JSON configuration file", process.env.SENSORGATE_CONFIG)
  .option("--format <format>", "Output format (json|yaml)", parseFormat, "yaml")
  .action(async (options: { config?: string; format: OutputFormat }) => {
    const config = await resolveSensorgateConfig({ filePath: options.config, env: process.env });
    if (!config.ok) {
      return fail(config.error);
    }
    process.stdout.write(formatOutput(config.value, options.format));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommandFailedError) {
    console.error(formatOutput({ error: error.failure }, "yaml").trimEnd());
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
