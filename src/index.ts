export * from "./errors.js";
export * from "./utils.js";
export * from "./geometry.js";
export * from "./Register.js";
export * from "./mmu.js";
export * from "./MemoryMap.js";
export * from "./TranslationTables.js";
export * from "./report.js";
export * from "./codegen.js";
export * from "./generate.js";
