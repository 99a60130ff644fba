import {
  ok,
  type CallerPrincipal,
  type Result,
  type SensorEvent,
  type SensorgateError,
  type TemplateRecord,
} from "@sensorgate/contracts";
import { parseSensorgateConfig, type SensorServiceDump } from "@sensorgate/coordinator";
import {
  SimulatedSensorDriver,
  authenticateRequestFor,
  createSensorHarness,
  createStaticCapabilityCheck,
  createTestParty,
  enrollRequestFor,
  removeRequestFor,
  type DriverMethod,
  type SensorHarness,
  type SinkNotification,
  type TestParty,
} from "@sensorgate/coordinator/testing";
import { createBasicCapabilityPolicy } from "@sensorgate/policy-basic";
import { createMemoryTemplateStore } from "@sensorgate/template-memory";
import type { SensorgateLogger } from "@sensorgate/telemetry";

import type { Scenario, ScenarioDriverEvent, ScenarioStep } from "./scenario.js";

export type StepOutcome =
  | { readonly status: "ok"; readonly value?: unknown }
  | { readonly status: "error"; readonly code: string; readonly message: string };

export interface StepReport {
  readonly index: number;
  readonly action: string;
  readonly outcome: StepOutcome;
}

export interface ScenarioReport {
  readonly name: string;
  readonly steps: ReadonlyArray<StepReport>;
  readonly transcript: Readonly<Record<string, ReadonlyArray<SinkNotification>>>;
  readonly driverCalls: ReadonlyArray<DriverMethod>;
  readonly templates: ReadonlyArray<TemplateRecord>;
  readonly dump: SensorServiceDump;
}

export interface RunScenarioOptions {
  readonly logger?: SensorgateLogger;
}

const fromResult = <T>(result: Result<T, SensorgateError>): StepOutcome =>
  result.ok
    ? { status: "ok", value: result.value }
    : { status: "error", code: result.error.code, message: result.error.message };

const DONE: StepOutcome = { status: "ok" };

const toSensorEvent = (event: ScenarioDriverEvent, deviceId: bigint): SensorEvent => ({ ...event, deviceId });

const actionOf = (step: ScenarioStep): string => Object.keys(step)[0] ?? "unknown";

/**
 * Plays a scenario against the simulated driver on virtual time. Every step is followed by a
 * drain of the coordinator queue, so each step observes the effects of the previous ones.
 */
class ScenarioSession {
  private readonly parties = new Map<string, TestParty>();
  private driver: SimulatedSensorDriver;
  private readonly retired: SimulatedSensorDriver[] = [];

  constructor(
    private readonly harness: SensorHarness,
    private readonly principal: CallerPrincipal,
  ) {
    this.driver = harness.driver;
  }

  async run(step: ScenarioStep): Promise<StepOutcome> {
    const { service } = this.harness;
    const principal = this.principal;

    if ("enroll" in step) {
      const party = this.party(step.enroll.caller);
      return fromResult(await service.enroll(principal, enrollRequestFor(party, step.enroll.subject)));
    }
    if ("authenticate" in step) {
      const { caller, subject, operationId } = step.authenticate;
      const request = authenticateRequestFor(this.party(caller), subject, BigInt(operationId));
      return fromResult(await service.authenticate(principal, request));
    }
    if ("remove" in step) {
      const { caller, subject, templateId } = step.remove;
      return fromResult(await service.remove(principal, removeRequestFor(this.party(caller), templateId, subject)));
    }
    if ("cancel" in step) {
      const party = this.party(step.cancel.caller);
      const canceled =
        step.cancel.kind === "enroll"
          ? await service.cancelEnrollment(principal, party.caller)
          : await service.cancelAuthentication(principal, party.caller);
      return fromResult(canceled);
    }
    if ("callerGone" in step) {
      this.party(step.callerGone.caller).caller.die();
      return DONE;
    }
    if ("driverEvent" in step) {
      return this.emit(step.driverEvent);
    }
    if ("driverDeath" in step) {
      this.driver.kill();
      if (step.driverDeath.replace) {
        this.retired.push(this.driver);
        this.driver = new SimulatedSensorDriver({ deviceId: this.driver.deviceId });
        this.harness.registry.install(this.driver);
      }
      return DONE;
    }
    if ("switchSubject" in step) {
      this.harness.switches.switchTo(step.switchSubject.subject);
      return DONE;
    }
    this.harness.scheduler.advance(step.advance.ms);
    return DONE;
  }

  transcript(): Record<string, ReadonlyArray<SinkNotification>> {
    return Object.fromEntries(
      Array.from(this.parties.entries(), ([id, party]) => [id, [...party.sink.notifications]]),
    );
  }

  calls(): ReadonlyArray<DriverMethod> {
    return [...this.retired, this.driver].flatMap((driver) => driver.calls.map((call) => call.method));
  }

  private emit(event: ScenarioDriverEvent): StepOutcome {
    try {
      this.driver.emit(toSensorEvent(event, this.driver.deviceId));
      return DONE;
    } catch (error) {
      return {
        status: "error",
        code: "scenario.driver_not_open",
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private party(id: string): TestParty {
    let party = this.parties.get(id);
    if (!party) {
      party = createTestParty(id);
      this.parties.set(id, party);
    }
    return party;
  }
}

export const runScenario = async (
  scenario: Scenario,
  options: RunScenarioOptions = {},
): Promise<Result<ScenarioReport, SensorgateError>> => {
  const config = parseSensorgateConfig(scenario.config, "scenario config");
  if (!config.ok) {
    return config;
  }

  const store = createMemoryTemplateStore({ initialTemplates: scenario.templates });
  const capabilities = scenario.policy
    ? createBasicCapabilityPolicy({ rules: scenario.policy })
    : createStaticCapabilityCheck();
  const harness = createSensorHarness({
    templates: store,
    config: config.value,
    capabilities,
    logger: options.logger,
  });
  const { service } = harness;

  const started = await service.start(scenario.subject);
  if (!started.ok) {
    await service.shutdown();
    return started;
  }

  const session = new ScenarioSession(harness, scenario.principal ?? harness.principal);
  const steps: StepReport[] = [];
  for (const [index, step] of scenario.steps.entries()) {
    const outcome = await session.run(step);
    await service.whenIdle();
    steps.push({ index, action: actionOf(step), outcome });
  }

  const dump = await service.dump();
  const calls = session.calls();
  await service.shutdown();
  if (!dump.ok) {
    return dump;
  }

  return ok({
    name: scenario.name,
    steps,
    transcript: session.transcript(),
    driverCalls: calls,
    templates: store.snapshot(),
    dump: dump.value,
  });
};
