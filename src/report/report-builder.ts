import type { Report, ReportSummary, Result, Rule } from "./types.js";

export class ReportBuilder {
  private readonly rules = new Map<string, Rule>();
  private readonly results = new Map<string, Result>();

  constructor(private readonly namespace: string) {}

  addRule(rule: Rule): void {
    this.rules.set(rule.uid, rule);
  }

  addResult(result: Result): void {
    this.results.set(result.rule.uid, result);
  }

  listRules(): Rule[] {
    return Array.from(this.rules.values());
  }

  build(): Report {
    return Object.freeze({
      namespace: this.namespace,
      rules: Object.freeze(Object.fromEntries(this.rules)),
      results: Object.freeze(Object.fromEntries(this.results)),
    });
  }
}

export function summarizeReports(reports: readonly Report[]): ReportSummary {
  const summary: ReportSummary = {
    rules: 0,
    passed: 0,
    warnings: 0,
    failures: 0,
  };

  for (const report of reports) {
    for (const result of Object.values(report.results)) {
      summary.rules += 1;
      if (result.passed) {
        summary.passed += 1;
        continue;
      }
      switch (result.rule.severity) {
        case "warning":
          summary.warnings += 1;
          break;
        case "failure":
          summary.failures += 1;
          break;
        default:
          break;
      }
    }
  }

  return summary;
}
