export * from "./diff-source.js";
export * from "./index-loader.js";
export * from "./reference-resolver.js";
