export type { MemoryTemplateStoreOptions } from "./memory-template-store.js";
export { MemoryTemplateStore, createMemoryTemplateStore } from "./memory-template-store.js";
