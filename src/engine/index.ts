export { Engine } from "./engine.js";
export type { EngineOptions } from "./engine.js";
export {
  BuiltinError,
  CompileError,
  EngineError,
  LoadError,
  QueryError,
} from "./errors.js";
export type { EngineStage } from "./errors.js";
export {
  classifyRule,
  createRule,
  isFailure,
  isWarning,
  removeRulePrefix,
  ruleKindOf,
  ruleUid,
} from "./rule-classifier.js";
export { discoverRules, indexModule, namespaceOf } from "./rule-discovery.js";
export { buildRuleQuery, executeRuleQuery } from "./query-executor.js";
