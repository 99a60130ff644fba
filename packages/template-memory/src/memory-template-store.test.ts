import { describe, expect, it } from "vitest";

import { createMemoryTemplateStore } from "./memory-template-store.js";

describe("MemoryTemplateStore", () => {
  it("labels new templates with the first free default label", async () => {
    const store = createMemoryTemplateStore({
      initialTemplates: [{ subjectId: 10, templateId: 1, label: "Fingerprint 2", deviceId: "7" }],
    });

    const first = await store.addTemplate(10, 2, { deviceId: 7n });
    const second = await store.addTemplate(10, 3);

    expect(first).toEqual({
      ok: true,
      value: { subjectId: 10, templateId: 2, label: "Fingerprint 1", deviceId: "7" },
    });
    expect(second.ok && second.value.label).toBe("Fingerprint 3");
  });

  it("returns the stored record when a template id is added twice", async () => {
    const store = createMemoryTemplateStore();
    await store.addTemplate(0, 5, { label: "Left thumb" });

    const again = await store.addTemplate(0, 5, { label: "Other" });

    expect(again.ok && again.value.label).toBe("Left thumb");
    const listed = await store.listTemplates(0);
    expect(listed.ok && listed.value).toHaveLength(1);
  });

  it("keeps subjects apart", async () => {
    const store = createMemoryTemplateStore();
    await store.addTemplate(0, 1);
    await store.addTemplate(11, 1);

    await store.removeTemplate(0, 1);

    expect(await store.listTemplates(0)).toEqual({ ok: true, value: [] });
    const other = await store.listTemplates(11);
    expect(other.ok && other.value.map((record) => record.subjectId)).toEqual([11]);
  });

  it("treats removing an unknown template as a no-op", async () => {
    const store = createMemoryTemplateStore();

    const removed = await store.removeTemplate(4, 99);

    expect(removed).toEqual({ ok: true, value: undefined });
  });

  it("renames existing templates and rejects unknown ones", async () => {
    const store = createMemoryTemplateStore();
    await store.addTemplate(0, 8);

    const renamed = await store.renameTemplate(0, 8, "Right index");
    const missing = await store.renameTemplate(0, 9, "Nope");

    expect(renamed.ok && renamed.value.label).toBe("Right index");
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe("template.not_found");
    }
  });

  it("lists every subject's templates in the snapshot", async () => {
    const store = createMemoryTemplateStore();
    await store.addTemplate(12, 3);
    await store.addTemplate(0, 4);

    expect(store.snapshot().map((record) => [record.subjectId, record.templateId])).toEqual([
      [0, 4],
      [12, 3],
    ]);
  });
});
