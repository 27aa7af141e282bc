export * from "./color-config.js";
export * from "./color-value.js";
