export * from "./config-error.js";
export * from "./git-exec-error.js";
export * from "./status-error.js";
export * from "./usage-error.js";
