import { describe, expect, it } from "vitest";
import {
  checkRegressions,
  compareRuns,
  deltaOf,
  diffRun,
  matchRuns,
  resolveThreshold,
  type MetricDelta,
  type ThresholdMap,
} from "../src/index.js";
import { makeRun } from "./helpers.js";

function compared(delta: MetricDelta | undefined): Extract<MetricDelta, { status: "compared" }> {
  if (delta?.status !== "compared") {
    throw new Error(`expected a compared metric, got ${JSON.stringify(delta)}`);
  }
  return delta;
}

function flaggedAt(baseline: number, candidate: number, thresholds: ThresholdMap, metric = "latency"): boolean {
  const result = diffRun(
    makeRun({ runId: "base", metrics: { [metric]: baseline } }),
    makeRun({ runId: "cand", metrics: { [metric]: candidate } }),
    thresholds
  );
  return compared(result.metrics[metric]).flagged;
}

describe("compareRuns", () => {
  it("computes per-metric deltas for each candidate", () => {
    const runs = [
      makeRun({ runId: "wA-report-2", workloadName: "wA", metrics: { latency: 12 } }),
      makeRun({ runId: "wA-report-1", workloadName: "wA", metrics: { latency: 10 } }),
    ];

    const report = compareRuns(matchRuns(runs, "wA-report-1"));

    expect(report.baselineRunId).toBe("wA-report-1");
    expect(report.mode).toBe("by-name");
    expect(report.results).toHaveLength(1);
    expect(deltaOf(report, "wA-report-2", "latency")).toEqual({
      status: "compared",
      baseline: 10,
      candidate: 12,
      delta: 2,
      relativeDelta: 0.2,
      flagged: false,
    });
    expect(report.flaggedCount).toBe(0);
  });

  it("marks metrics present on one side only", () => {
    const result = diffRun(
      makeRun({ runId: "base", metrics: { latency: 10, errors: 1 } }),
      makeRun({ runId: "cand", metrics: { latency: 10, tps: 5 } })
    );

    expect(Object.keys(result.metrics)).toEqual(["errors", "latency", "tps"]);
    expect(result.metrics.errors).toEqual({ status: "missing", side: "candidate", baseline: 1 });
    expect(result.metrics.tps).toEqual({ status: "missing", side: "baseline", candidate: 5 });
    expect(compared(result.metrics.latency).delta).toBe(0);
  });

  it("treats metric names shared with Object.prototype like any other", () => {
    const result = diffRun(
      makeRun({ runId: "base", metrics: { constructor: 1, valueOf: 2 } }),
      makeRun({ runId: "cand", metrics: { toString: 3 } })
    );

    expect(result.metrics.constructor).toEqual({ status: "missing", side: "candidate", baseline: 1 });
    expect(result.metrics.valueOf).toEqual({ status: "missing", side: "candidate", baseline: 2 });
    expect(result.metrics.toString).toEqual({ status: "missing", side: "baseline", candidate: 3 });
    expect(Object.keys(result.metrics)).toEqual(["constructor", "toString", "valueOf"]);
  });

  it("finds no delta for an inherited property name", () => {
    const runs = [makeRun({ runId: "cand", metrics: { latency: 2 } }), makeRun({ runId: "base", metrics: { latency: 1 } })];

    const report = compareRuns(matchRuns(runs, "base"));

    expect(deltaOf(report, "cand", "hasOwnProperty")).toBeUndefined();
  });

  it("keeps match-set order", () => {
    const runs = [makeRun({ runId: "a" }), makeRun({ runId: "b" }), makeRun({ runId: "c" }), makeRun({ runId: "base" })];
    const set = matchRuns(runs, "base", { mode: "manual", candidates: ["c", "a", "b"] });

    expect(compareRuns(set).results.map((r) => r.candidateRunId)).toEqual(["c", "a", "b"]);
  });

  it("has antisymmetric deltas", () => {
    const a = makeRun({ runId: "a", metrics: { latency: 10.3, tps: 250.7 } });
    const b = makeRun({ runId: "b", metrics: { latency: 12.1, tps: 240.2 } });

    const ab = diffRun(a, b);
    const ba = diffRun(b, a);

    for (const metric of ["latency", "tps"]) {
      expect(compared(ab.metrics[metric]).delta).toBe(-compared(ba.metrics[metric]).delta);
    }
  });

  it("counts flagged candidates", () => {
    const runs = [
      makeRun({ runId: "slow", metrics: { latency: 20 } }),
      makeRun({ runId: "same", metrics: { latency: 10 } }),
      makeRun({ runId: "base", metrics: { latency: 10 } }),
    ];

    const report = compareRuns(matchRuns(runs, "base"), { thresholds: { latency: 0.1 } });

    expect(report.results.map((r) => r.flagged)).toEqual([true, false]);
    expect(report.flaggedCount).toBe(1);
  });
});

describe("thresholds", () => {
  it("does not flag a change exactly at the relative limit", () => {
    expect(flaggedAt(10, 11, { latency: 0.1 })).toBe(false);
    expect(flaggedAt(10, 11.5, { latency: 0.1 })).toBe(true);
    expect(flaggedAt(10, 8.5, { latency: 0.1 })).toBe(true);
  });

  it("does not flag a change exactly at the absolute limit", () => {
    expect(flaggedAt(10, 12, { latency: { absolute: 2 } })).toBe(false);
    expect(flaggedAt(10, 12.5, { latency: { absolute: 2 } })).toBe(true);
  });

  it("never flags a metric without a threshold", () => {
    expect(flaggedAt(10, 1000, {})).toBe(false);
    expect(flaggedAt(0, 5, { other: 0.1 })).toBe(false);
  });

  it("flags any change from a zero baseline under a relative limit", () => {
    const result = diffRun(
      makeRun({ runId: "base", metrics: { errors: 0 } }),
      makeRun({ runId: "cand", metrics: { errors: 3 } }),
      { errors: 0.5 }
    );

    const errors = compared(result.metrics.errors);
    expect(errors.relativeDelta).toBeNull();
    expect(errors.flagged).toBe(true);
    expect(flaggedAt(0, 0, { latency: 0.5 })).toBe(false);
  });

  it("respects the direction of a rule", () => {
    const rule: ThresholdMap = { achieved_tps: { relative: 0.1, direction: "decrease" } };

    expect(flaggedAt(100, 80, rule, "achieved_tps")).toBe(true);
    expect(flaggedAt(100, 120, rule, "achieved_tps")).toBe(false);
  });

  it("prefers an exact key over a matching pattern", () => {
    const thresholds: ThresholdMap = { "*.p90": 0.1, "latency.p90": 0.5 };

    expect(flaggedAt(10, 12, thresholds, "latency.p90")).toBe(false);
    expect(flaggedAt(10, 12, thresholds, "rpc.p90")).toBe(true);
    expect(resolveThreshold(thresholds, "rpc.p50")).toBeUndefined();
  });

  it("tries patterns in declaration order", () => {
    expect(resolveThreshold({ "lat*": 0.2, "*": 0.9 }, "latency")).toEqual({ relative: 0.2, direction: "either" });
  });
});

describe("checkRegressions", () => {
  const runs = [
    makeRun({ runId: "cand", metrics: { latency: 20, tps: 100 } }),
    makeRun({ runId: "base", metrics: { latency: 10, tps: 100 } }),
  ];

  it("exits non-zero and lists flagged metrics", () => {
    const report = compareRuns(matchRuns(runs, "base"), { thresholds: { "*": 0.1 } });

    const result = checkRegressions(report);

    expect(result.hasRegressions).toBe(true);
    expect(result.exitCode).toBe(1);
    expect(result.flaggedMetrics).toEqual([{ candidateRunId: "cand", metric: "latency" }]);
    expect(result.regressionSummary).toBe("1 flagged metric(s) across 1 run(s) compared to base");
  });

  it("exits zero without flags", () => {
    const result = checkRegressions(compareRuns(matchRuns(runs, "base")));

    expect(result.hasRegressions).toBe(false);
    expect(result.exitCode).toBe(0);
    expect(result.regressionSummary).toBe("No flagged metrics compared to base");
  });
});
