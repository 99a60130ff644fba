import {
  ok,
  type CallerPrincipal,
  type CapabilityCheckInput,
  type CapabilityCheckPort,
  type CapabilityDecision,
  type Result,
  type SensorgateError,
} from "@sensorgate/contracts";

import type { BasicCapabilityPolicyOptions, CapabilityRule, CapabilityRuleEffect, PatternList } from "./types.js";

const dedupeStrings = (values: ReadonlyArray<string>): ReadonlyArray<string> => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (seen.has(value)) {
      continue;
    }
    seen.add(value);
    result.push(value);
  }
  return result;
};

const normalizePatterns = (values: PatternList | undefined): ReadonlyArray<string> => {
  const list = typeof values === "string" ? [values] : values ?? [];
  return dedupeStrings(list.map((value) => value.trim()).filter((value) => value.length > 0));
};

const escapeForRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

interface StringMatcher {
  readonly pattern: string;
  readonly test: (candidate: string) => boolean;
}

const createMatcher = (pattern: string): StringMatcher => {
  if (pattern === "*") {
    return { pattern, test: () => true };
  }
  const expression = new RegExp(`^${escapeForRegExp(pattern).replace(/\\\*/g, ".*")}$`);
  return { pattern, test: (candidate: string) => expression.test(candidate) };
};

const matchesAny = (matchers: ReadonlyArray<StringMatcher>, candidate: string): boolean =>
  matchers.some((matcher) => matcher.test(candidate));

const labelsContainAll = (
  actual: CallerPrincipal["labels"],
  required: CallerPrincipal["labels"],
): boolean => {
  if (!required) {
    return true;
  }
  if (!actual) {
    return false;
  }
  for (const [key, value] of Object.entries(required)) {
    if (!(key in actual) || actual[key] !== value) {
      return false;
    }
  }
  return true;
};

interface NormalizedRule {
  readonly id?: string;
  readonly effect: CapabilityRuleEffect;
  readonly capabilityMatchers: ReadonlyArray<StringMatcher>;
  readonly principalMatchers?: ReadonlyArray<StringMatcher>;
  readonly operationMatchers?: ReadonlyArray<StringMatcher>;
  readonly requireLabels?: CallerPrincipal["labels"];
  readonly reason?: string;
}

const optionalMatchers = (values: PatternList | undefined): ReadonlyArray<StringMatcher> | undefined => {
  const patterns = normalizePatterns(values);
  return patterns.length > 0 ? patterns.map(createMatcher) : undefined;
};

const normalizeRule = (rule: CapabilityRule): NormalizedRule => {
  const capabilities = normalizePatterns(rule.capability);
  if (capabilities.length === 0) {
    throw new Error(`Capability rule${rule.id ? ` ${rule.id}` : ""} must define at least one capability pattern.`);
  }

  return {
    id: rule.id,
    effect: rule.effect,
    capabilityMatchers: capabilities.map(createMatcher),
    principalMatchers: optionalMatchers(rule.principal),
    operationMatchers: optionalMatchers(rule.operation),
    requireLabels: rule.requireLabels ? { ...rule.requireLabels } : undefined,
    reason: rule.reason ?? (rule.id ? `policy.rule.${rule.id}.${rule.effect}` : undefined),
  };
};

const matchesPrincipal = (rule: NormalizedRule, principal: CallerPrincipal): boolean => {
  if (rule.principalMatchers) {
    const names = principal.packageName ? [principal.id, principal.packageName] : [principal.id];
    const matchers = rule.principalMatchers;
    if (!names.some((name) => matchesAny(matchers, name))) {
      return false;
    }
  }
  return labelsContainAll(principal.labels, rule.requireLabels);
};

const matchesRule = (rule: NormalizedRule, input: CapabilityCheckInput): boolean => {
  if (!matchesAny(rule.capabilityMatchers, input.capability)) {
    return false;
  }
  if (rule.operationMatchers && !matchesAny(rule.operationMatchers, input.operation)) {
    return false;
  }
  return matchesPrincipal(rule, input.principal);
};

const DEFAULT_DENY_DECISION: CapabilityDecision = {
  allow: false,
  reason: "policy.default.deny",
};

/**
 * Ordered allow/deny rules. Any matching deny wins; otherwise the first matching allow decides.
 */
export class BasicCapabilityPolicy implements CapabilityCheckPort {
  private readonly rules: ReadonlyArray<NormalizedRule>;
  private readonly defaultDecision: CapabilityDecision;

  constructor(options: BasicCapabilityPolicyOptions) {
    this.rules = options.rules.map(normalizeRule);
    this.defaultDecision = { ...(options.defaultDecision ?? DEFAULT_DENY_DECISION) };
  }

  async check(input: CapabilityCheckInput): Promise<Result<CapabilityDecision, SensorgateError>> {
    let matchedAllowRule: NormalizedRule | undefined;

    for (const rule of this.rules) {
      if (!matchesRule(rule, input)) {
        continue;
      }

      if (rule.effect === "deny") {
        return ok(this.buildDecision(rule));
      }

      if (!matchedAllowRule) {
        matchedAllowRule = rule;
      }
    }

    if (matchedAllowRule) {
      return ok(this.buildDecision(matchedAllowRule));
    }

    return ok({ ...this.defaultDecision });
  }

  private buildDecision(rule: NormalizedRule): CapabilityDecision {
    return { allow: rule.effect === "allow", reason: rule.reason };
  }
}

export const createBasicCapabilityPolicy = (options: BasicCapabilityPolicyOptions): BasicCapabilityPolicy =>
  new BasicCapabilityPolicy(options);
