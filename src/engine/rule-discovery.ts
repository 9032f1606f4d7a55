import type { Annotation, RuleModule } from "../evaluator/types.js";
import type { ReportBuilder } from "../report/report-builder.js";
import { createRule } from "./rule-classifier.js";

const DATA_ROOT = "data.";

export interface IndexedModule {
  readonly module: RuleModule;
  readonly namespace: string;
  /** Rule-scoped annotations by target path; later annotations win. */
  readonly ruleAnnotations: ReadonlyMap<string, Annotation>;
}

export function namespaceOf(packagePath: string): string {
  return packagePath.startsWith(DATA_ROOT)
    ? packagePath.slice(DATA_ROOT.length)
    : packagePath;
}

export function indexModule(module: RuleModule): IndexedModule {
  const ruleAnnotations = new Map<string, Annotation>();
  for (const annotation of module.annotations) {
    if (annotation.scope === "rule") {
      ruleAnnotations.set(annotation.targetPath, annotation);
    }
  }
  return {
    module,
    namespace: namespaceOf(module.packagePath),
    ruleAnnotations,
  };
}

export function discoverRules(
  modules: Iterable<IndexedModule>,
  namespace: string,
  report: ReportBuilder,
): void {
  for (const indexed of modules) {
    if (indexed.namespace !== namespace) {
      continue;
    }

    for (const moduleRule of indexed.module.rules) {
      const annotation = indexed.ruleAnnotations.get(moduleRule.path);
      const rule = createRule(namespace, moduleRule.name, annotation);
      if (!rule) {
        continue;
      }
      report.addRule(rule);
    }
  }
}
