// Errors
export {
  ReportError,
  NotFoundError,
  MalformedReportError,
  NoBaselineError,
  UnknownRunError,
  ConfigError,
  ExitCode,
  ErrorCode,
} from "./errors.js";
export type { ExitCodeValue, ErrorCodeValue, StructuredError } from "./errors.js";

// Repository
export { loadRunRepository, findRun, byRecency } from "./repository/loader.js";
export {
  deriveRunRecord,
  parseTimestamp,
  canonicalJson,
  hashWorkloadConfig,
  genModeLabel,
} from "./repository/derive.js";
export { FlatReportSchema, TxgenReportSchema, parseReportJson, describeIssues } from "./repository/schema.js";
export type { FlatReport, TxgenReport, ParsedReport } from "./repository/schema.js";
export { DEFAULT_REPORTS_DIR, DEFAULT_REPORT_PATTERN } from "./repository/types.js";
export type { RunRecord, RunRepository, LoadOptions } from "./repository/types.js";
export { compileWildcard } from "./pattern.js";

// Matching
export { matchRuns, adjustMatch, limitMatch } from "./match/matcher.js";
export type { MatchMode, MatchSet, MatchOptions, MatchAdjustment } from "./match/matcher.js";

// Diff
export { compareRuns, diffRun, deltaOf } from "./diff/engine.js";
export type { ComparisonReport, DeltaResult, MetricDelta, CompareOptions } from "./diff/engine.js";
export { resolveThreshold, exceedsThreshold, normalizeThreshold } from "./diff/thresholds.js";
export type { Threshold, ThresholdRule, ThresholdMap, ThresholdDirection } from "./diff/thresholds.js";
export { checkRegressions } from "./diff/regression.js";
export type { RegressionCheckResult } from "./diff/regression.js";

// Summaries
export { summarizeWorkloads, filterRuns } from "./summary/workloads.js";
export type { WorkloadSummary, RunFilter } from "./summary/workloads.js";
export {
  computeVersionStats,
  versionBounds,
  versionOrder,
  formatVersionLabel,
  selectWorkloads,
  compareVersions,
  median,
} from "./summary/versions.js";
export type {
  VersionStats,
  VersionBounds,
  WorkloadMedians,
  MedianDelta,
  VersionDeltaRow,
} from "./summary/versions.js";

// Session
export { ReportSession, openSession } from "./session.js";
export type { SessionOptions, CompareRequest, ComparisonSnapshot } from "./session.js";

// Formatting
export {
  formatDuration,
  formatPercent,
  formatDeltaPercent,
  formatDeltaPoints,
  formatRelative,
  formatSigned,
  formatNumber,
  formatTimestamp,
  runLabel,
  truncate,
} from "./format.js";

// Reporters
export { printOverview, printRunDetail, printDiagnostics } from "./report/terminal.js";
export { generateJsonComparison, summarizeRun } from "./report/json.js";
export type { JsonComparison, JsonRunSummary } from "./report/json.js";
export { generateHtmlComparison } from "./report/html.js";
