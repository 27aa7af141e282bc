// Core
export { ChangeCollector, type ChangeCollectorOptions, createChangeCollector } from "./change-collector.js";
export { ChangeRecordStore } from "./change-record-store.js";
export * from "./paths.js";
export * from "./reporter.js";
export * from "./types.js";
// Collaborators
export * from "./interfaces/index.js";
export * from "./git/index.js";
// Configuration
export * from "./color/index.js";
// Errors
export * from "./errors/index.js";
export * from "./logger.js";
// Command line
export * from "./cli/index.js";
