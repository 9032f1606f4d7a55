import type { Annotation } from "../evaluator/types.js";
import type { Rule, RuleKind, Severity } from "../report/types.js";

const WARNING_PATTERN = /^warn(_[a-zA-Z0-9]+)*$/;
const FAILURE_PATTERN = /^(deny|violation|fail)(_[a-zA-Z0-9]+)*$/;
const RULE_KINDS: readonly RuleKind[] = ["violation", "deny", "fail", "warn"];

export function isWarning(name: string): boolean {
  return WARNING_PATTERN.test(name);
}

export function isFailure(name: string): boolean {
  return FAILURE_PATTERN.test(name);
}

export function classifyRule(name: string): Severity | null {
  if (isWarning(name)) {
    return "warning";
  }
  if (isFailure(name)) {
    return "failure";
  }
  return null;
}

export function ruleKindOf(name: string): RuleKind | null {
  if (classifyRule(name) === null) {
    return null;
  }
  const kind = RULE_KINDS.find(
    (candidate) => name === candidate || name.startsWith(`${candidate}_`),
  );
  return kind ?? null;
}

export function removeRulePrefix(name: string): string {
  for (const kind of RULE_KINDS) {
    if (name === kind) {
      return "";
    }
    if (name.startsWith(`${kind}_`)) {
      return name.slice(kind.length + 1);
    }
  }
  return name;
}

export function ruleUid(
  namespace: string,
  kind: RuleKind,
  id: string,
): string {
  return id ? `${namespace}.${kind}_${id}` : `${namespace}.${kind}`;
}

/**
 * Builds a report rule from a declared rule name, or returns null when the
 * name is neither a warning nor a failure.
 */
export function createRule(
  namespace: string,
  name: string,
  annotation?: Annotation,
): Rule | null {
  const severity = classifyRule(name);
  const kind = ruleKindOf(name);
  if (!severity || !kind) {
    return null;
  }

  const id = removeRulePrefix(name);
  return {
    uid: ruleUid(namespace, kind, id),
    namespace,
    kind,
    id,
    severity,
    title: annotation?.title,
    description: annotation?.description,
    custom: annotation?.custom,
  };
}
