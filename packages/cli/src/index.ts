export type { OutputFormat } from "./output.js";
export { OUTPUT_FORMATS, ensureFormat, formatOutput } from "./output.js";

export type { Scenario, ScenarioDriverEvent, ScenarioStep } from "./scenario.js";
export { loadScenario, parseScenario, scenarioSchema } from "./scenario.js";

export type { RunScenarioOptions, ScenarioReport, StepOutcome, StepReport } from "./scenario-runner.js";
export { runScenario } from "./scenario-runner.js";
