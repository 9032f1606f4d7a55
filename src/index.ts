export * from "./builtins/index.js";
export * from "./engine/index.js";
export * from "./evaluator/index.js";
export * from "./loader/index.js";
export * from "./report/index.js";
