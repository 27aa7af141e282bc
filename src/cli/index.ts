export * from "./cli.js";
export * from "./run-cli.js";
export * from "./run-status.js";
