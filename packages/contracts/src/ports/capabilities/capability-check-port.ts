import type { SensorgateError } from "../../types/domain-error.js";
import type { Result } from "../../types/result.js";

export type SensorCapability = "manage_templates" | "use_sensor";

export interface CallerPrincipal {
  readonly id: string;
  readonly packageName?: string;
  readonly labels?: Record<string, string | number | boolean>;
}

export interface CapabilityCheckInput {
  readonly principal: CallerPrincipal;
  readonly capability: SensorCapability;
  readonly operation: string;
}

export interface CapabilityDecision {
  readonly allow: boolean;
  readonly reason?: string;
}

export interface CapabilityCheckPort {
  check(input: CapabilityCheckInput): Promise<Result<CapabilityDecision, SensorgateError>>;
}
