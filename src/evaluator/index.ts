export {
  BuiltinCache,
  canonicalKey,
  findBuiltin,
  invokeBuiltin,
} from "./builtin-host.js";
export {
  DEFAULT_OPA_URL,
  OpaServerEvaluator,
  REGO_EXTENSION,
  moduleFromAst,
} from "./opa-server.js";
export type { OpaProgram, OpaServerOptions } from "./opa-server.js";
export type {
  Annotation,
  AnnotationScope,
  Builtin,
  BuiltinContext,
  CompileOptions,
  EvaluateOptions,
  ModuleRule,
  Outcome,
  ResultSet,
  RuleEvaluator,
  RuleModule,
} from "./types.js";
