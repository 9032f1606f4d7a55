import type { EvaluateOptions, RuleEvaluator } from "../evaluator/types.js";
import type { Result, Rule } from "../report/types.js";
import { QueryError } from "./errors.js";

export function buildRuleQuery(rule: Rule): string {
  const name = rule.id ? `${rule.kind}_${rule.id}` : rule.kind;
  return `data.${rule.namespace}.${name}`;
}

/**
 * Evaluates the query of one rule. A rule passes when its query produces
 * no results.
 */
export async function executeRuleQuery<P>(
  evaluator: RuleEvaluator<P>,
  program: P,
  rule: Rule,
  input: unknown,
  options: EvaluateOptions = {},
): Promise<Result> {
  const query = buildRuleQuery(rule);
  try {
    const resultSet = await evaluator.evaluate(program, query, input, options);
    return { rule, query, passed: resultSet.length === 0 };
  } catch (error) {
    throw new QueryError(rule.uid, query, { cause: error });
  }
}
