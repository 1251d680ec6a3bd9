import { describe, expect, it } from "vitest";
import {
  compareVersions,
  computeVersionStats,
  filterRuns,
  formatVersionLabel,
  median,
  selectWorkloads,
  summarizeWorkloads,
  versionBounds,
  versionOrder,
} from "../src/index.js";
import { makeRun } from "./helpers.js";

describe("summarizeWorkloads", () => {
  const runs = [
    makeRun({ runId: "wB-1", workloadName: "wB", hash: "h3", timestamp: "2024-01-03T00:00:00Z" }),
    makeRun({ runId: "wA-2", workloadName: "wA", hash: "h2", timestamp: "2024-01-02T00:00:00Z" }),
    makeRun({ runId: "wA-1", workloadName: "wA", hash: "h1", timestamp: "2024-01-01T00:00:00Z" }),
    makeRun({ runId: "wC-1", workloadName: "wC", hash: "h4" }),
  ];

  it("counts runs and distinct configs per workload, latest first", () => {
    expect(summarizeWorkloads(runs)).toEqual([
      { workloadName: "wB", runs: 1, configHashes: 1, latest: new Date("2024-01-03T00:00:00Z") },
      { workloadName: "wA", runs: 2, configHashes: 2, latest: new Date("2024-01-02T00:00:00Z") },
      { workloadName: "wC", runs: 1, configHashes: 1, latest: null },
    ]);
  });

  it("filters runs by any combination of fields", () => {
    expect(filterRuns(runs, { workload: "wA" }).map((r) => r.runId)).toEqual(["wA-2", "wA-1"]);
    expect(filterRuns(runs, { workload: "wA", hash: "h1" }).map((r) => r.runId)).toEqual(["wA-1"]);
    expect(filterRuns(runs, { clientVersion: "v9" })).toEqual([]);
    expect(filterRuns(runs, {})).toHaveLength(4);
  });
});

describe("median", () => {
  it("takes the middle value or the mean of the middle pair", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBeNull();
  });
});

describe("client version medians", () => {
  const run = (
    runId: string,
    clientVersion: string,
    workloadName: string,
    timestamp: string,
    metrics: Record<string, number>
  ) => makeRun({ runId, clientVersion, workloadName, timestamp, metrics });

  const runs = [
    run("v2-t1", "v2", "transfer", "2024-03-01T00:00:00Z", { achieved_tps: 90, drop_rate: 0.25, duration_s: 60 }),
    run("v1-t1", "v1", "transfer", "2024-02-01T00:00:00Z", { achieved_tps: 100, drop_rate: 0.1, duration_s: 60 }),
    run("v1-t2", "v1", "transfer", "2024-02-02T00:00:00Z", { achieved_tps: 120, drop_rate: 0.3, duration_s: 90 }),
    run("v1-t3", "v1", "transfer", "2024-02-03T00:00:00Z", { achieved_tps: 110, drop_rate: 0.2, duration_s: 60 }),
    run("v1-m1", "v1", "mint", "2024-02-04T00:00:00Z", { achieved_tps: 50, drop_rate: 0, duration_s: 30 }),
  ];

  it("computes medians per version and workload", () => {
    const stats = computeVersionStats(runs);

    expect(stats.get("v1")?.get("transfer")).toEqual({
      runs: 3,
      medianTps: 110,
      medianDropRate: 0.2,
      medianDuration: 60,
      latest: new Date("2024-02-03T00:00:00Z"),
    });
    expect(stats.get("v2")?.get("transfer")?.runs).toBe(1);
    expect(stats.get("v2")?.has("mint")).toBe(false);
  });

  it("orders versions by their latest run and labels them by their first", () => {
    const bounds = versionBounds(runs);

    expect(versionOrder(runs)).toEqual(["v2", "v1"]);
    expect(formatVersionLabel("v1", bounds)).toBe("v1 (2024-02-01)");
    expect(formatVersionLabel("v7", bounds)).toBe("v7");
  });

  it("selects shared workloads unless asked for all", () => {
    const stats = computeVersionStats(runs);

    expect(selectWorkloads(stats, ["v1", "v2"], { sharedOnly: true })).toEqual(["transfer"]);
    expect(selectWorkloads(stats, ["v1", "v2"])).toEqual(["transfer", "mint"]);
    expect(selectWorkloads(stats, ["v1"], { workloads: ["mint", "ghost"] })).toEqual(["mint"]);
  });

  it("reports reference minus other, relative to other", () => {
    const stats = computeVersionStats(runs);

    const [row] = compareVersions(stats, "v1", "v2", ["transfer"]);

    expect(row.workload).toBe("transfer");
    expect(row.tpsDelta?.delta).toBe(20);
    expect(row.tpsDelta?.relative).toBeCloseTo(0.2222, 4);
    expect(row.dropDelta?.delta).toBeCloseTo(-0.05, 10);
    expect(row.dropDelta?.relative).toBeCloseTo(-0.2, 10);
  });

  it("leaves deltas empty when one side has no runs", () => {
    const stats = computeVersionStats(runs);

    const rows = compareVersions(stats, "v1", "v2", ["mint", "ghost"]);

    expect(rows).toHaveLength(1);
    expect(rows[0].other).toBeNull();
    expect(rows[0].tpsDelta).toBeNull();
  });
});
