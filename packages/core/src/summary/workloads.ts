import type { RunRecord } from "../repository/types.js";

export interface WorkloadSummary {
  workloadName: string;
  runs: number;
  configHashes: number;
  latest: Date | null;
}

export interface RunFilter {
  workload?: string;
  hash?: string;
  clientVersion?: string;
}

export function filterRuns(runs: readonly RunRecord[], filter: RunFilter): RunRecord[] {
  return runs.filter(
    (r) =>
      (filter.workload === undefined || r.workloadName === filter.workload) &&
      (filter.hash === undefined || r.workloadConfigHash === filter.hash) &&
      (filter.clientVersion === undefined || r.clientVersion === filter.clientVersion)
  );
}

/** Per-workload counts, most recently run workload first. */
export function summarizeWorkloads(runs: readonly RunRecord[]): WorkloadSummary[] {
  const groups = new Map<string, { runs: number; hashes: Set<string>; latest: Date | null }>();

  for (const run of runs) {
    let group = groups.get(run.workloadName);
    if (!group) {
      group = { runs: 0, hashes: new Set(), latest: null };
      groups.set(run.workloadName, group);
    }
    group.runs++;
    group.hashes.add(run.workloadConfigHash);
    if (run.timestamp && (!group.latest || run.timestamp > group.latest)) {
      group.latest = run.timestamp;
    }
  }

  return [...groups.entries()]
    .map(([workloadName, g]) => ({
      workloadName,
      runs: g.runs,
      configHashes: g.hashes.size,
      latest: g.latest,
    }))
    .sort((a, b) => {
      const ta = a.latest?.getTime() ?? Number.NEGATIVE_INFINITY;
      const tb = b.latest?.getTime() ?? Number.NEGATIVE_INFINITY;
      if (ta !== tb) return ta < tb ? 1 : -1;
      return a.workloadName < b.workloadName ? -1 : a.workloadName > b.workloadName ? 1 : 0;
    });
}
