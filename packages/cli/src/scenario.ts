import { readFile } from "node:fs/promises";
import { extname } from "node:path";

import { err, ok, type Result, type SensorgateError } from "@sensorgate/contracts";
import { capabilityRulesSchema } from "@sensorgate/policy-basic";
import { parse as parseYaml } from "yaml";
import { z, type ZodIssue } from "zod";

const subjectId = z.number().int().min(0);
const templateId = z.number().int();
const callerId = z.string().min(1);

const driverEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("enroll_progress"), templateId, subjectId, remaining: z.number().int().min(0) }).strict(),
  z.object({ type: z.literal("acquired"), acquiredInfo: z.number().int() }).strict(),
  z.object({ type: z.literal("authenticated"), templateId, subjectId }).strict(),
  z.object({ type: z.literal("error"), code: z.number().int() }).strict(),
  z.object({ type: z.literal("removed"), templateId, subjectId }).strict(),
  z.object({ type: z.literal("enumerate"), templateIds: z.array(templateId), subjectIds: z.array(subjectId) }).strict(),
]);

const stepSchema = z.union([
  z.object({ enroll: z.object({ caller: callerId, subject: subjectId.default(0) }).strict() }).strict(),
  z
    .object({
      authenticate: z
        .object({ caller: callerId, subject: subjectId.default(0), operationId: z.number().int().min(0).default(0) })
        .strict(),
    })
    .strict(),
  z
    .object({
      remove: z.object({ caller: callerId, subject: subjectId.default(0), templateId: templateId.default(0) }).strict(),
    })
    .strict(),
  z.object({ cancel: z.object({ caller: callerId, kind: z.enum(["enroll", "authenticate"]) }).strict() }).strict(),
  z.object({ callerGone: z.object({ caller: callerId }).strict() }).strict(),
  z.object({ driverEvent: driverEventSchema }).strict(),
  z.object({ driverDeath: z.object({ replace: z.boolean().default(false) }).strict() }).strict(),
  z.object({ switchSubject: z.object({ subject: subjectId }).strict() }).strict(),
  z.object({ advance: z.object({ ms: z.number().int().min(0) }).strict() }).strict(),
]);

export const scenarioSchema = z
  .object({
    name: z.string().min(1).default("scenario"),
    subject: subjectId.default(0),
    config: z.record(z.unknown()).default({}),
    principal: z
      .object({
        id: z.string().min(1),
        packageName: z.string().optional(),
        labels: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
      })
      .strict()
      .optional(),
    policy: capabilityRulesSchema.optional(),
    templates: z
      .array(
        z
          .object({ subjectId, templateId, label: z.string().min(1), deviceId: z.string().default("0") })
          .strict(),
      )
      .default([]),
    steps: z.array(stepSchema).min(1),
  })
  .strict();

export type Scenario = z.infer<typeof scenarioSchema>;
export type ScenarioStep = Scenario["steps"][number];
export type ScenarioDriverEvent = z.infer<typeof driverEventSchema>;

const formatIssue = (issue: ZodIssue): string => {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
};

const createScenarioInvalidError = (issues: ReadonlyArray<string>, source?: string): SensorgateError => ({
  code: "scenario.invalid",
  message: `Invalid scenario${source ? ` in ${source}` : ""}.`,
  details: { issues, source },
});

export const parseScenario = (input: unknown, source?: string): Result<Scenario, SensorgateError> => {
  const parsed = scenarioSchema.safeParse(input);
  if (!parsed.success) {
    return err(createScenarioInvalidError(parsed.error.issues.map(formatIssue), source));
  }
  return ok(parsed.data);
};

const parseDocument = (contents: string, filePath: string): unknown => {
  const extension = extname(filePath).toLowerCase();
  if (extension === ".json") {
    return JSON.parse(contents);
  }
  return parseYaml(contents);
};

export const loadScenario = async (filePath: string): Promise<Result<Scenario, SensorgateError>> => {
  let document: unknown;
  try {
    document = parseDocument(await readFile(filePath, "utf8"), filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(createScenarioInvalidError([message], filePath));
  }
  return parseScenario(document, filePath);
};
