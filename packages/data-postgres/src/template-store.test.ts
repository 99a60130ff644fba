import type { Pool } from "pg";
import { afterEach, describe, expect, it } from "vitest";

import {
  createSensorHarness,
  createTestParty,
  enrollRequestFor,
} from "@sensorgate/coordinator/testing";
import { createSensorgateLogger, createSilentLogger } from "@sensorgate/telemetry";

import type { QueryExecutor } from "./executors/query-executor.js";
import { runPostgresMigrations } from "./migrations/index.js";
import { createTemplateStoreFromPool } from "./pool.js";
import { createPostgresTelemetry } from "./telemetry.js";
import { PostgresTemplateStore } from "./template-store.js";
import { createTestPostgresTemplateStore, type TestPostgresTemplateStore } from "./testing/index.js";

describe("PostgresTemplateStore", () => {
  let harness: TestPostgresTemplateStore | undefined;

  const setup = async (): Promise<TestPostgresTemplateStore> => {
    harness = await createTestPostgresTemplateStore();
    return harness;
  };

  afterEach(async () => {
    await harness?.dispose();
    harness = undefined;
  });

  it("labels new templates with the first free default label", async () => {
    const { store } = await setup();
    await store.addTemplate(10, 1, { label: "Fingerprint 2", deviceId: 7n });

    const first = await store.addTemplate(10, 2, { deviceId: 7n });
    const second = await store.addTemplate(10, 3);

    expect(first).toEqual({
      ok: true,
      value: { subjectId: 10, templateId: 2, label: "Fingerprint 1", deviceId: "7" },
    });
    expect(second.ok && second.value.label).toBe("Fingerprint 3");
    expect(second.ok && second.value.deviceId).toBe("0");
  });

  it("returns the stored record when a template id is added twice", async () => {
    const { store } = await setup();
    await store.addTemplate(0, 5, { label: "Left thumb" });

    const again = await store.addTemplate(0, 5, { label: "Other" });

    expect(again.ok && again.value.label).toBe("Left thumb");
    const listed = await store.listTemplates(0);
    expect(listed.ok && listed.value).toHaveLength(1);
  });

  it("returns one stored record when the same template is added concurrently", async () => {
    const { store } = await setup();

    const [first, second] = await Promise.all([
      store.addTemplate(0, 5, { label: "Left thumb" }),
      store.addTemplate(0, 5, { label: "Right thumb" }),
    ]);

    expect(first.ok).toBe(true);
    expect(second).toEqual(first);
    const listed = await store.listTemplates(0);
    expect(listed.ok && listed.value).toHaveLength(1);
  });

  it("falls back to the stored row when the insert hits an existing template", async () => {
    const operations: unknown[] = [];
    const telemetry = createPostgresTelemetry({
      logger: createSilentLogger(),
      metrics: {
        queryCounter: {
          add: (_value, attributes) => {
            operations.push(attributes?.operation);
          },
        },
      },
    });
    harness = await createTestPostgresTemplateStore({ telemetry });
    await harness.store.addTemplate(2, 4, { label: "Index", deviceId: 9n });
    operations.length = 0;

    const added = await harness.store.addTemplate(2, 4, { label: "Other" });

    expect(added).toEqual({ ok: true, value: { subjectId: 2, templateId: 4, label: "Index", deviceId: "9" } });
    expect(operations).toEqual(["add_template", "find_template"]);
  });

  it("lists templates in enrollment order per subject", async () => {
    const { store } = await setup();
    await store.addTemplate(0, 30);
    await store.addTemplate(11, 1);
    await store.addTemplate(0, 4);

    const listed = await store.listTemplates(0);

    expect(listed.ok && listed.value.map((record) => record.templateId)).toEqual([30, 4]);
  });

  it("removes templates and ignores unknown ids", async () => {
    const { store } = await setup();
    await store.addTemplate(0, 1);
    await store.addTemplate(0, 2);

    expect(await store.removeTemplate(0, 1)).toEqual({ ok: true, value: undefined });
    expect(await store.removeTemplate(0, 99)).toEqual({ ok: true, value: undefined });

    const listed = await store.listTemplates(0);
    expect(listed.ok && listed.value.map((record) => record.templateId)).toEqual([2]);
  });

  it("renames existing templates and rejects unknown ones", async () => {
    const { store } = await setup();
    await store.addTemplate(0, 8);

    const renamed = await store.renameTemplate(0, 8, "Right index");
    const missing = await store.renameTemplate(0, 9, "Nope");

    expect(renamed.ok && renamed.value.label).toBe("Right index");
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe("template.not_found");
      expect(missing.error.details).toEqual({ subjectId: 0, templateId: 9 });
    }
  });

  it("skips migrations that were already applied", async () => {
    const { executor } = await setup();

    const applied = await runPostgresMigrations(executor);

    expect(applied).toEqual([]);
  });

  it("reports query failures as retryable store errors", async () => {
    const failing: QueryExecutor = {
      query: async () => {
        throw new Error("connection reset");
      },
    };
    const store = new PostgresTemplateStore({ executor: failing });

    const listed = await store.listTemplates(3);

    expect(listed).toEqual({
      ok: false,
      error: {
        code: "template.store_failed",
        message: "Failed to list templates from Postgres.",
        details: { subjectId: 3, cause: { message: "connection reset" } },
        retryable: true,
      },
    });
  });

  it("rejects table names that are not plain identifiers", () => {
    const executor: QueryExecutor = { query: async () => ({ rows: [] }) };

    expect(() => new PostgresTemplateStore({ executor, tableName: "templates; drop" })).toThrow(
      "Invalid Postgres table name 'templates; drop'.",
    );
  });

  it("persists templates completed through the coordinator", async () => {
    const { store } = await setup();
    const { service, driver, principal } = createSensorHarness({ templates: store });
    await service.start(0);
    const party = createTestParty("settings");

    await service.enroll(principal, enrollRequestFor(party));
    driver.enrollProgress(42, 0, 0);
    await service.whenIdle();

    const listed = await store.listTemplates(0);
    expect(listed).toEqual({
      ok: true,
      value: [{ subjectId: 0, templateId: 42, label: "Fingerprint 1", deviceId: "24144" }],
    });
    expect(party.sink.notifications).toEqual([
      { type: "enroll_result", templateId: 42, subjectId: 0, remaining: 0 },
    ]);
    await service.shutdown();
  });

  it("migrates a pool once and stores through the traced executor", async () => {
    const { newDb } = await import("pg-mem");
    const adapter = newDb().adapters.createPg();
    const pool: Pool = new adapter.Pool();
    const messages: string[] = [];
    const telemetry = createPostgresTelemetry({
      logger: createSensorgateLogger({
        writer: (_level, line) => {
          messages.push(String(JSON.parse(line).message));
        },
      }),
    });

    const store = await createTemplateStoreFromPool(pool, { telemetry });
    await createTemplateStoreFromPool(pool, { telemetry });
    const added = await store.addTemplate(2, 6);

    expect(added.ok && added.value).toEqual({ subjectId: 2, templateId: 6, label: "Fingerprint 1", deviceId: "0" });
    expect(messages).toEqual(["postgres.migrations.applied"]);
    await pool.end();
  });

  it("creates the configured table when migrating a pool", async () => {
    const { newDb } = await import("pg-mem");
    const adapter = newDb().adapters.createPg();
    const pool: Pool = new adapter.Pool();
    const applied: Array<Record<string, unknown>> = [];
    const telemetry = createPostgresTelemetry({
      logger: createSensorgateLogger({
        writer: (_level, line) => {
          const entry: Record<string, unknown> = JSON.parse(line);
          applied.push({ table: entry.table, migrations: entry.migrations });
        },
      }),
    });

    const custom = await createTemplateStoreFromPool(pool, { telemetry, tableName: "fp_templates" });
    const standard = await createTemplateStoreFromPool(pool, { telemetry });
    const added = await custom.addTemplate(1, 7);

    expect(added).toEqual({
      ok: true,
      value: { subjectId: 1, templateId: 7, label: "Fingerprint 1", deviceId: "0" },
    });
    expect(await standard.listTemplates(1)).toEqual({ ok: true, value: [] });
    expect(applied).toEqual([
      { table: "fp_templates", migrations: ["0001_templates"] },
      { table: "sensor_templates", migrations: ["0001_templates"] },
    ]);
    await pool.end();
  });

  it("labels query metrics with the template operation", async () => {
    const counted: Array<Record<string, unknown>> = [];
    const telemetry = createPostgresTelemetry({
      logger: createSilentLogger(),
      metrics: {
        queryCounter: {
          add: (_value, attributes) => {
            counted.push({ ...attributes });
          },
        },
      },
    });
    harness = await createTestPostgresTemplateStore({ telemetry });
    const migrated = counted.length;

    await harness.store.addTemplate(4, 1);
    await harness.store.listTemplates(4);

    expect(migrated).toBeGreaterThan(0);
    expect(counted.slice(0, migrated).every((labels) => labels.operation === "migrate")).toBe(true);
    expect(counted.slice(migrated)).toEqual([
      { operation: "list_labels", outcome: "ok" },
      { operation: "add_template", outcome: "ok" },
      { operation: "list_templates", outcome: "ok" },
    ]);
  });
});
