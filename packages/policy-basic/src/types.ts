import type { CapabilityDecision, CallerPrincipal } from "@sensorgate/contracts";

export type CapabilityRuleEffect = "allow" | "deny";

export type PatternList = string | ReadonlyArray<string>;

export interface CapabilityRule {
  readonly id?: string;
  readonly effect: CapabilityRuleEffect;
  /**
   * Capability patterns such as `use_sensor` or `*`.
   */
  readonly capability: PatternList;
  /**
   * Matched against the principal id and, when present, its package name.
   */
  readonly principal?: PatternList;
  readonly operation?: PatternList;
  readonly requireLabels?: CallerPrincipal["labels"];
  readonly reason?: string;
}

export interface BasicCapabilityPolicyOptions {
  readonly rules: ReadonlyArray<CapabilityRule>;
  readonly defaultDecision?: CapabilityDecision;
}
