import {
  ok,
  type CallerPrincipal,
  type CapabilityCheckInput,
  type CapabilityCheckPort,
  type CapabilityDecision,
  type SubjectId,
  type SubjectStoragePort,
  type SubjectSwitchSourcePort,
  type TemplateStorePort,
} from "@sensorgate/contracts";
import { createSilentLogger, type SensorgateLogger } from "@sensorgate/telemetry";

import type { SensorgateConfig } from "../config.js";
import { SensorService } from "../sensor-service.js";
import { subjectStoragePath } from "../subject-storage.js";
import { createCoordinatorTelemetry } from "../telemetry.js";
import type { AuthenticateRequest, EnrollRequest, RemoveRequest } from "../types.js";
import { ManualScheduler } from "./manual-scheduler.js";
import { RecordingSink } from "./recording-sink.js";
import { SimulatedDriverRegistry, SimulatedSensorDriver } from "./simulated-driver.js";
import { TestCallerHandle } from "./test-caller.js";

export type CapabilityRule = CapabilityDecision | ((input: CapabilityCheckInput) => CapabilityDecision);

/**
 * Capability check answering every request with the same decision (or the rule's answer).
 */
export const createStaticCapabilityCheck = (
  rule: CapabilityRule = { allow: true },
): CapabilityCheckPort & { readonly checks: ReadonlyArray<CapabilityCheckInput> } => {
  const checks: CapabilityCheckInput[] = [];
  return {
    checks,
    async check(input) {
      checks.push(input);
      return ok(typeof rule === "function" ? rule(input) : rule);
    },
  };
};

/**
 * Subject storage that computes paths without touching the filesystem.
 */
export const createVirtualSubjectStorage = (
  root = "/virtual/system",
  directoryName = "fpdata",
): SubjectStoragePort => ({
  async prepare(subjectId: SubjectId) {
    return ok(subjectStoragePath({ root, directoryName }, subjectId));
  },
});

export class ManualSubjectSwitchSource implements SubjectSwitchSourcePort {
  private readonly listeners = new Set<(subjectId: SubjectId) => void>();

  get subscribers(): number {
    return this.listeners.size;
  }

  onSubjectSwitching(listener: (subjectId: SubjectId) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  switchTo(subjectId: SubjectId): void {
    for (const listener of Array.from(this.listeners)) {
      listener(subjectId);
    }
  }
}

export interface SensorHarnessOptions {
  readonly templates: TemplateStorePort;
  readonly config?: Partial<SensorgateConfig>;
  readonly driver?: SimulatedSensorDriver;
  readonly capabilities?: CapabilityCheckPort;
  readonly logger?: SensorgateLogger;
  readonly start?: Date;
}

export interface SensorHarness {
  readonly service: SensorService;
  readonly driver: SimulatedSensorDriver;
  readonly registry: SimulatedDriverRegistry;
  readonly scheduler: ManualScheduler;
  readonly switches: ManualSubjectSwitchSource;
  readonly templates: TemplateStorePort;
  readonly principal: CallerPrincipal;
}

/**
 * Wires a service to a simulated driver on virtual time. The service is not started.
 */
export const createSensorHarness = (options: SensorHarnessOptions): SensorHarness => {
  const driver = options.driver ?? new SimulatedSensorDriver();
  const registry = new SimulatedDriverRegistry(driver);
  const scheduler = new ManualScheduler(options.start);
  const switches = new ManualSubjectSwitchSource();
  const service = new SensorService(
    {
      registry,
      templates: options.templates,
      capabilities: options.capabilities ?? createStaticCapabilityCheck(),
      subjectStorage: createVirtualSubjectStorage(),
      subjectSwitches: switches,
    },
    {
      config: options.config,
      scheduler,
      clock: scheduler,
      telemetry: createCoordinatorTelemetry({ logger: options.logger ?? createSilentLogger() }),
    },
  );

  return {
    service,
    driver,
    registry,
    scheduler,
    switches,
    templates: options.templates,
    principal: { id: "system-ui", packageName: "com.example.settings" },
  };
};

/**
 * A caller and the sink its results land in.
 */
export interface TestParty {
  readonly caller: TestCallerHandle;
  readonly sink: RecordingSink;
}

export const createTestParty = (id: string): TestParty => ({
  caller: new TestCallerHandle(id),
  sink: new RecordingSink(),
});

export const enrollRequestFor = (party: TestParty, subjectId: SubjectId = 0): EnrollRequest => ({
  caller: party.caller,
  sink: party.sink,
  subjectId,
  token: new Uint8Array([1, 2, 3]),
});

export const authenticateRequestFor = (
  party: TestParty,
  subjectId: SubjectId = 0,
  operationId = 77n,
): AuthenticateRequest => ({
  caller: party.caller,
  sink: party.sink,
  subjectId,
  operationId,
});

export const removeRequestFor = (party: TestParty, templateId = 0, subjectId: SubjectId = 0): RemoveRequest => ({
  caller: party.caller,
  sink: party.sink,
  subjectId,
  templateId,
});
