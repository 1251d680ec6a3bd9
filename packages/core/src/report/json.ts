import type { ComparisonReport, DeltaResult } from "../diff/engine.js";
import type { MatchMode, MatchSet } from "../match/matcher.js";
import type { RunRecord } from "../repository/types.js";

export interface JsonRunSummary {
  runId: string;
  file: string;
  workloadName: string;
  workloadConfigHash: string;
  clientVersion: string;
  genMode: string;
  timestamp: string | null;
}

export interface JsonComparison {
  txreportVersion: string;
  createdAt: string;
  mode: MatchMode;
  baseline: JsonRunSummary;
  candidates: JsonRunSummary[];
  summary: {
    candidates: number;
    flagged: number;
  };
  results: DeltaResult[];
}

export function summarizeRun(run: RunRecord): JsonRunSummary {
  return {
    runId: run.runId,
    file: run.file,
    workloadName: run.workloadName,
    workloadConfigHash: run.workloadConfigHash,
    clientVersion: run.clientVersion,
    genMode: run.genMode,
    timestamp: run.timestamp ? run.timestamp.toISOString() : null,
  };
}

export function generateJsonComparison(report: ComparisonReport, matchSet: MatchSet): string {
  const output: JsonComparison = {
    txreportVersion: "0.1.0",
    createdAt: new Date().toISOString(),
    mode: report.mode,
    baseline: summarizeRun(matchSet.baseline),
    candidates: matchSet.candidates.map(summarizeRun),
    summary: {
      candidates: report.results.length,
      flagged: report.flaggedCount,
    },
    results: report.results,
  };

  return JSON.stringify(output, null, 2);
}
