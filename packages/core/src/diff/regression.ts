import type { ComparisonReport } from "./engine.js";

export interface RegressionCheckResult {
  hasRegressions: boolean;
  flaggedMetrics: { candidateRunId: string; metric: string }[];
  regressionSummary: string;
  exitCode: number;
}

/** Summarize flagged deltas the way CI wants them: a line of text and an exit code. */
export function checkRegressions(report: ComparisonReport): RegressionCheckResult {
  const flaggedMetrics = report.results.flatMap((result) =>
    Object.entries(result.metrics)
      .filter(([, delta]) => delta.status === "compared" && delta.flagged)
      .map(([metric]) => ({ candidateRunId: result.candidateRunId, metric }))
  );

  const hasRegressions = flaggedMetrics.length > 0;
  const regressionSummary = hasRegressions
    ? `${flaggedMetrics.length} flagged metric(s) across ${report.flaggedCount} run(s) compared to ${report.baselineRunId}`
    : `No flagged metrics compared to ${report.baselineRunId}`;

  return {
    hasRegressions,
    flaggedMetrics,
    regressionSummary,
    exitCode: hasRegressions ? 1 : 0,
  };
}
