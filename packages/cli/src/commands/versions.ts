import chalk from "chalk";
import Table from "cli-table3";
import {
  compareVersions,
  computeVersionStats,
  formatDuration,
  formatPercent,
  formatRelative,
  formatTimestamp,
  formatVersionLabel,
  selectWorkloads,
  versionBounds,
  versionOrder,
  ConfigError,
  type MedianDelta,
  type VersionDeltaRow,
  type WorkloadMedians,
} from "@txreport/core";
import { loadConfig } from "../config.js";
import { openReports, printBanner, type SourceOptions } from "./shared.js";

export interface VersionsOptions extends SourceOptions {
  reference?: string;
  versions?: string[];
  workload?: string[];
  allWorkloads?: boolean;
  json?: boolean;
}

export async function runVersions(options: VersionsOptions): Promise<void> {
  const config = await loadConfig();
  const session = await openReports(config, options);
  const runs = session.repository.runs;

  const order = versionOrder(runs);
  const bounds = versionBounds(runs);
  if (order.length === 0) {
    if (options.json) {
      console.log(JSON.stringify({ reference: null, workloads: [], comparisons: [] }, null, 2));
    } else {
      printBanner("Client versions");
      console.log(chalk.yellow("  No reports found."));
      console.log();
    }
    return;
  }

  const reference = options.reference ?? order[0];
  const unknown = [reference, ...(options.versions ?? [])].filter((v) => !order.includes(v));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown client version(s): ${unknown.join(", ")}`);
  }
  const others = options.versions ?? order.filter((v) => v !== reference).slice(0, 2);

  const stats = computeVersionStats(runs);
  const workloads = selectWorkloads(stats, [reference, ...others], {
    workloads: options.workload,
    sharedOnly: !options.allWorkloads,
  });
  const comparisons = others.map((other) => ({
    version: other,
    rows: compareVersions(stats, reference, other, workloads),
  }));

  if (options.json) {
    const referenceStats = stats.get(reference);
    console.log(
      JSON.stringify(
        {
          reference,
          workloads: workloads.map((workload) => ({
            workload,
            ...serializeMedians(referenceStats?.get(workload) ?? null),
          })),
          comparisons: comparisons.map((c) => ({
            version: c.version,
            rows: c.rows.map((row) => ({
              workload: row.workload,
              reference: serializeMedians(row.reference),
              other: serializeMedians(row.other),
              tpsDelta: row.tpsDelta,
              dropDelta: row.dropDelta,
            })),
          })),
        },
        null,
        2
      )
    );
    return;
  }

  printBanner("Client versions");

  if (workloads.length === 0) {
    console.log(chalk.yellow("  No workloads meet the current selection."));
    console.log();
    return;
  }

  console.log(chalk.bold(`  ${formatVersionLabel(reference, bounds)} medians`));
  const base = new Table({
    head: ["Workload", "Runs", "Median TPS", "Median drop", "Median duration", "Latest run"].map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });
  const referenceStats = stats.get(reference);
  for (const workload of workloads) {
    const entry = referenceStats?.get(workload);
    if (!entry) continue;
    base.push([
      workload,
      String(entry.runs),
      formatTps(entry.medianTps),
      formatPercent(entry.medianDropRate),
      entry.medianDuration === null ? "n/a" : formatDuration(entry.medianDuration),
      formatTimestamp(entry.latest),
    ]);
  }
  console.log(base.toString());
  console.log();

  if (comparisons.length === 0) {
    console.log(chalk.dim("  No other versions to compare against."));
    console.log();
    return;
  }

  for (const { version, rows } of comparisons) {
    console.log(chalk.bold(`  vs ${formatVersionLabel(version, bounds)}`));
    if (rows.length === 0) {
      console.log(chalk.dim("  No overlapping workloads."));
      console.log();
      continue;
    }
    const table = new Table({
      head: ["Workload", "Runs", "Median TPS", "TPS Δ", "Drop rate", "Drop Δ"].map((h) => chalk.bold(h)),
      style: { head: [], border: [] },
    });
    for (const row of rows) {
      table.push(formatVersionRow(row));
    }
    console.log(table.toString());
    console.log();
  }
}

function formatVersionRow(row: VersionDeltaRow): string[] {
  const pair = (ref: string, other: string): string => `${ref} (${other})`;
  return [
    row.workload,
    pair(row.reference ? String(row.reference.runs) : "n/a", row.other ? String(row.other.runs) : "n/a"),
    pair(formatTps(row.reference?.medianTps ?? null), formatTps(row.other?.medianTps ?? null)),
    colorDelta(row.tpsDelta, (d) => `${sign(d.delta)}${d.delta.toFixed(2)} (${formatRelative(d.relative)})`, true),
    pair(formatPercent(row.reference?.medianDropRate), formatPercent(row.other?.medianDropRate)),
    colorDelta(row.dropDelta, (d) => `${sign(d.delta)}${(d.delta * 100).toFixed(2)}pp (${formatRelative(d.relative)})`, false),
  ];
}

/** Green when the change goes the good way for this metric, red otherwise. */
function colorDelta(
  delta: MedianDelta | null,
  render: (d: MedianDelta) => string,
  positiveGood: boolean
): string {
  if (!delta) return chalk.dim("n/a");
  const text = render(delta);
  if (delta.delta === 0) return text;
  const good = positiveGood ? delta.delta > 0 : delta.delta < 0;
  return good ? chalk.green(text) : chalk.red(text);
}

function serializeMedians(entry: WorkloadMedians | null): Record<string, unknown> | null {
  if (!entry) return null;
  return { ...entry, latest: entry.latest?.toISOString() ?? null };
}

function formatTps(value: number | null): string {
  return value === null ? "n/a" : value.toFixed(2);
}

function sign(value: number): string {
  return value >= 0 ? "+" : "";
}
