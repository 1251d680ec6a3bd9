import { NoBaselineError, UnknownRunError } from "../errors.js";
import type { RunRecord, RunRepository } from "../repository/types.js";

export type MatchMode = "by-name" | "by-hash" | "manual";

export interface MatchSet {
  readonly baseline: RunRecord;
  readonly candidates: readonly RunRecord[];
  readonly mode: MatchMode;
}

export type MatchOptions =
  | { mode?: "by-name" | "by-hash" }
  | { mode: "manual"; candidates: readonly string[] };

export interface MatchAdjustment {
  /** Runs forced into the set, appended after the existing candidates. */
  include?: readonly string[];
  /** Runs removed from the set. */
  exclude?: readonly string[];
}

type RunSource = RunRepository | readonly RunRecord[];

/**
 * Select the runs comparable to `baseline`.
 *
 * `by-name` and `by-hash` keep the source order; `manual` keeps the caller's
 * order. The baseline itself is never a candidate, and an empty result is
 * a valid match set. A baseline without a config hash matches by name in
 * either mode.
 */
export function matchRuns(
  source: RunSource,
  baseline: RunRecord | string | null | undefined,
  options: MatchOptions = {}
): MatchSet {
  const runs = runsOf(source);
  const base = resolveBaseline(runs, baseline);

  if (options.mode === "manual") {
    const candidates = lookupRuns(runs, options.candidates).filter((r) => r.runId !== base.runId);
    return freezeMatchSet(base, dedupe(candidates), "manual");
  }

  const mode = options.mode ?? "by-name";
  const candidates = runs.filter((r) => {
    if (r.runId === base.runId) return false;
    return mode === "by-hash" && base.workloadConfigHash !== ""
      ? r.workloadConfigHash === base.workloadConfigHash
      : r.workloadName === base.workloadName;
  });
  return freezeMatchSet(base, candidates, mode);
}

/**
 * Curate an existing match set by hand. The result is always `manual`:
 * membership no longer follows a predicate.
 */
export function adjustMatch(
  matchSet: MatchSet,
  source: RunSource,
  adjustment: MatchAdjustment
): MatchSet {
  const runs = runsOf(source);
  const excluded = new Set(lookupRuns(runs, adjustment.exclude ?? []).map((r) => r.runId));
  const included = lookupRuns(runs, adjustment.include ?? []);

  const candidates = [
    ...matchSet.candidates.filter((r) => !excluded.has(r.runId)),
    ...included,
  ].filter((r) => r.runId !== matchSet.baseline.runId);

  return freezeMatchSet(matchSet.baseline, dedupe(candidates), "manual");
}

/** Keep the first `limit` candidates. */
export function limitMatch(matchSet: MatchSet, limit: number): MatchSet {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Match limit must be a positive integer, got ${limit}`);
  }
  if (matchSet.candidates.length <= limit) return matchSet;
  return freezeMatchSet(matchSet.baseline, matchSet.candidates.slice(0, limit), matchSet.mode);
}

function runsOf(source: RunSource): readonly RunRecord[] {
  return "runs" in source ? source.runs : source;
}

function resolveBaseline(
  runs: readonly RunRecord[],
  baseline: RunRecord | string | null | undefined
): RunRecord {
  if (baseline === null || baseline === undefined || baseline === "") {
    throw new NoBaselineError();
  }
  if (typeof baseline !== "string") return baseline;

  const found = runs.find((r) => r.runId === baseline);
  if (!found) {
    throw new NoBaselineError(`Baseline run "${baseline}" not found.`);
  }
  return found;
}

function lookupRuns(runs: readonly RunRecord[], ids: readonly string[]): RunRecord[] {
  const byId = new Map(runs.map((r) => [r.runId, r]));
  const missing = ids.filter((id) => !byId.has(id));
  if (missing.length > 0) {
    throw new UnknownRunError(missing);
  }
  return ids.flatMap((id) => {
    const run = byId.get(id);
    return run ? [run] : [];
  });
}

function dedupe(runs: RunRecord[]): RunRecord[] {
  const seen = new Set<string>();
  return runs.filter((r) => {
    if (seen.has(r.runId)) return false;
    seen.add(r.runId);
    return true;
  });
}

function freezeMatchSet(baseline: RunRecord, candidates: readonly RunRecord[], mode: MatchMode): MatchSet {
  return Object.freeze({ baseline, candidates: Object.freeze([...candidates]), mode });
}
