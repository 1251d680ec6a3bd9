import type { MatchMode, MatchSet } from "../match/matcher.js";
import type { RunRecord } from "../repository/types.js";
import { exceedsThreshold, resolveThreshold, type ThresholdMap } from "./thresholds.js";

export type MetricDelta =
  | {
      status: "compared";
      baseline: number;
      candidate: number;
      delta: number;
      /** `null` when the baseline is zero. */
      relativeDelta: number | null;
      flagged: boolean;
    }
  | { status: "missing"; side: "candidate"; baseline: number }
  | { status: "missing"; side: "baseline"; candidate: number };

export interface DeltaResult {
  candidateRunId: string;
  metrics: Record<string, MetricDelta>;
  /** True when any metric is flagged. */
  flagged: boolean;
}

export interface ComparisonReport {
  baselineRunId: string;
  mode: MatchMode;
  results: DeltaResult[];
  flaggedCount: number;
}

export interface CompareOptions {
  thresholds?: ThresholdMap;
}

/** One delta result per candidate, in match-set order. */
export function compareRuns(matchSet: MatchSet, options?: CompareOptions): ComparisonReport {
  const thresholds = options?.thresholds;
  const results = matchSet.candidates.map((candidate) =>
    diffRun(matchSet.baseline, candidate, thresholds)
  );

  return {
    baselineRunId: matchSet.baseline.runId,
    mode: matchSet.mode,
    results,
    flaggedCount: results.filter((r) => r.flagged).length,
  };
}

export function diffRun(
  baseline: RunRecord,
  candidate: RunRecord,
  thresholds?: ThresholdMap
): DeltaResult {
  const names = [...new Set([...Object.keys(baseline.metrics), ...Object.keys(candidate.metrics)])].sort();
  const metrics: Record<string, MetricDelta> = {};

  for (const name of names) {
    const before = Object.hasOwn(baseline.metrics, name) ? baseline.metrics[name] : undefined;
    const after = Object.hasOwn(candidate.metrics, name) ? candidate.metrics[name] : undefined;

    if (before !== undefined && after !== undefined) {
      const delta = after - before;
      metrics[name] = {
        status: "compared",
        baseline: before,
        candidate: after,
        delta,
        relativeDelta: before === 0 ? null : delta / before,
        flagged: exceedsThreshold(resolveThreshold(thresholds, name), before, after),
      };
    } else if (before !== undefined) {
      metrics[name] = { status: "missing", side: "candidate", baseline: before };
    } else if (after !== undefined) {
      metrics[name] = { status: "missing", side: "baseline", candidate: after };
    }
  }

  return {
    candidateRunId: candidate.runId,
    metrics,
    flagged: Object.values(metrics).some((m) => m.status === "compared" && m.flagged),
  };
}

export function deltaOf(
  report: ComparisonReport,
  candidateRunId: string,
  metric: string
): MetricDelta | undefined {
  const result = report.results.find((r) => r.candidateRunId === candidateRunId);
  return result && Object.hasOwn(result.metrics, metric) ? result.metrics[metric] : undefined;
}
