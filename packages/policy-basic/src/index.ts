export { BasicCapabilityPolicy, createBasicCapabilityPolicy } from "./basic-capability-policy.js";
export { capabilityRuleSchema, capabilityRulesSchema, parseCapabilityRules } from "./rules-schema.js";
export type {
  BasicCapabilityPolicyOptions,
  CapabilityRule,
  CapabilityRuleEffect,
  PatternList,
} from "./types.js";
