export * from "./git-config-reader.js";
export * from "./git-diff-source.js";
export * from "./git-index-loader.js";
export * from "./git-reference-resolver.js";
export * from "./git-runner.js";
export * from "./numstat-parser.js";
