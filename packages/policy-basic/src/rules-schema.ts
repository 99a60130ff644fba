import { err, ok, type Result, type SensorgateError } from "@sensorgate/contracts";
import { z } from "zod";

import type { CapabilityRule } from "./types.js";

const patternList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const capabilityRuleSchema = z
  .object({
    id: z.string().min(1).optional(),
    effect: z.enum(["allow", "deny"]),
    capability: patternList,
    principal: patternList.optional(),
    operation: patternList.optional(),
    requireLabels: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
    reason: z.string().optional(),
  })
  .strict();

export const capabilityRulesSchema = z.array(capabilityRuleSchema);

/**
 * Validates rules read from configuration, e.g. a YAML `policy` section.
 */
export const parseCapabilityRules = (input: unknown): Result<ReadonlyArray<CapabilityRule>, SensorgateError> => {
  const parsed = capabilityRulesSchema.safeParse(input);
  if (!parsed.success) {
    return err({
      code: "policy.invalid_rules",
      message: "Capability rules are invalid.",
      details: {
        issues: parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        ),
      },
    });
  }
  return ok(parsed.data);
};
