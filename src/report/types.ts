export type RuleKind = "warn" | "deny" | "violation" | "fail";

export type Severity = "warning" | "failure";

export interface Rule {
  readonly uid: string;
  readonly namespace: string;
  readonly kind: RuleKind;
  readonly id: string;
  readonly severity: Severity;
  readonly title?: string;
  readonly description?: string;
  readonly custom?: Readonly<Record<string, unknown>>;
}

export interface Result {
  readonly rule: Rule;
  readonly query: string;
  readonly passed: boolean;
}

export interface Report {
  readonly namespace: string;
  readonly rules: Readonly<Record<string, Rule>>;
  readonly results: Readonly<Record<string, Result>>;
}

export interface ReportSummary {
  rules: number;
  passed: number;
  warnings: number;
  failures: number;
}
