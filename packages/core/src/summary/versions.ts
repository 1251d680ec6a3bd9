import type { RunRecord } from "../repository/types.js";

export interface WorkloadMedians {
  runs: number;
  medianTps: number | null;
  medianDropRate: number | null;
  medianDuration: number | null;
  latest: Date | null;
}

/** client version → workload name → medians */
export type VersionStats = Map<string, Map<string, WorkloadMedians>>;

export interface VersionBounds {
  earliest: Date;
  latest: Date;
}

export interface MedianDelta {
  /** reference − other */
  delta: number;
  /** delta / other; `null` when other is zero */
  relative: number | null;
}

export interface VersionDeltaRow {
  workload: string;
  reference: WorkloadMedians | null;
  other: WorkloadMedians | null;
  tpsDelta: MedianDelta | null;
  dropDelta: MedianDelta | null;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function computeVersionStats(runs: readonly RunRecord[]): VersionStats {
  const grouped = new Map<string, Map<string, RunRecord[]>>();
  for (const run of runs) {
    let workloads = grouped.get(run.clientVersion);
    if (!workloads) {
      workloads = new Map();
      grouped.set(run.clientVersion, workloads);
    }
    const list = workloads.get(run.workloadName) ?? [];
    list.push(run);
    workloads.set(run.workloadName, list);
  }

  const stats: VersionStats = new Map();
  for (const [version, workloads] of grouped) {
    const entries = new Map<string, WorkloadMedians>();
    for (const [workload, list] of workloads) {
      entries.set(workload, {
        runs: list.length,
        medianTps: median(metricValues(list, "achieved_tps")),
        medianDropRate: median(metricValues(list, "drop_rate")),
        medianDuration: median(metricValues(list, "duration_s")),
        latest: latestOf(list),
      });
    }
    stats.set(version, entries);
  }
  return stats;
}

/** Earliest and latest dated run per client version. */
export function versionBounds(runs: readonly RunRecord[]): Map<string, VersionBounds> {
  const bounds = new Map<string, VersionBounds>();
  for (const run of runs) {
    if (!run.timestamp) continue;
    const entry = bounds.get(run.clientVersion);
    if (!entry) {
      bounds.set(run.clientVersion, { earliest: run.timestamp, latest: run.timestamp });
      continue;
    }
    if (run.timestamp < entry.earliest) entry.earliest = run.timestamp;
    if (run.timestamp > entry.latest) entry.latest = run.timestamp;
  }
  return bounds;
}

/** Versions by their latest run, newest first; versions with no dated runs last. */
export function versionOrder(runs: readonly RunRecord[]): string[] {
  const bounds = versionBounds(runs);
  const versions = [...new Set(runs.map((r) => r.clientVersion))];
  return versions.sort((a, b) => {
    const ta = bounds.get(a)?.latest.getTime() ?? Number.NEGATIVE_INFINITY;
    const tb = bounds.get(b)?.latest.getTime() ?? Number.NEGATIVE_INFINITY;
    if (ta !== tb) return ta < tb ? 1 : -1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

export function formatVersionLabel(version: string, bounds: Map<string, VersionBounds>): string {
  const entry = bounds.get(version);
  if (!entry) return version;
  return `${version} (${entry.earliest.toISOString().slice(0, 10)})`;
}

/**
 * Workloads to show for a set of versions, most recently run first.
 * With `sharedOnly`, only workloads present in every version survive.
 */
export function selectWorkloads(
  stats: VersionStats,
  versions: readonly string[],
  options: { workloads?: readonly string[]; sharedOnly?: boolean } = {}
): string[] {
  const pool = new Set<string>();
  for (const version of versions) {
    for (const workload of stats.get(version)?.keys() ?? []) pool.add(workload);
  }

  let selected = options.workloads && options.workloads.length > 0
    ? options.workloads.filter((w) => pool.has(w))
    : [...pool];

  if (options.sharedOnly) {
    selected = selected.filter((w) => versions.every((v) => stats.get(v)?.has(w) ?? false));
  }

  const latest = (workload: string): number => {
    let best = Number.NEGATIVE_INFINITY;
    for (const version of versions) {
      const time = stats.get(version)?.get(workload)?.latest?.getTime();
      if (time !== undefined && time > best) best = time;
    }
    return best;
  };

  return selected
    .map((workload) => ({ workload, latest: latest(workload) }))
    .sort((a, b) => {
      if (a.latest !== b.latest) return a.latest < b.latest ? 1 : -1;
      return a.workload < b.workload ? -1 : a.workload > b.workload ? 1 : 0;
    })
    .map((entry) => entry.workload);
}

export function compareVersions(
  stats: VersionStats,
  reference: string,
  other: string,
  workloads: readonly string[]
): VersionDeltaRow[] {
  const referenceStats = stats.get(reference);
  const otherStats = stats.get(other);
  const rows: VersionDeltaRow[] = [];

  for (const workload of workloads) {
    const ref = referenceStats?.get(workload) ?? null;
    const oth = otherStats?.get(workload) ?? null;
    if (!ref && !oth) continue;

    rows.push({
      workload,
      reference: ref,
      other: oth,
      tpsDelta: medianDelta(ref?.medianTps ?? null, oth?.medianTps ?? null),
      dropDelta: medianDelta(ref?.medianDropRate ?? null, oth?.medianDropRate ?? null),
    });
  }
  return rows;
}

function medianDelta(reference: number | null, other: number | null): MedianDelta | null {
  if (reference === null || other === null) return null;
  const delta = reference - other;
  return { delta, relative: other === 0 ? null : delta / other };
}

function metricValues(runs: RunRecord[], metric: string): number[] {
  return runs.flatMap((r) => (Object.hasOwn(r.metrics, metric) ? [r.metrics[metric]] : []));
}

function latestOf(runs: RunRecord[]): Date | null {
  let latest: Date | null = null;
  for (const run of runs) {
    if (run.timestamp && (!latest || run.timestamp > latest)) latest = run.timestamp;
  }
  return latest;
}
