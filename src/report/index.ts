export { ReportBuilder, summarizeReports } from "./report-builder.js";
export type {
  Report,
  ReportSummary,
  Result,
  Rule,
  RuleKind,
  Severity,
} from "./types.js";
