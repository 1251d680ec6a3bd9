import chalk from "chalk";
import Table from "cli-table3";
import type { MalformedReportError } from "../errors.js";
import type { RunRecord } from "../repository/types.js";
import type { WorkloadSummary } from "../summary/workloads.js";
import {
  formatDuration,
  formatNumber,
  formatPercent,
  formatTimestamp,
  truncate,
} from "../format.js";

export function printOverview(runs: readonly RunRecord[], summaries: WorkloadSummary[]): void {
  const workloads = new Table({
    head: [
      chalk.bold("Workload"),
      chalk.bold("Runs"),
      chalk.bold("Configs"),
      chalk.bold("Latest run"),
    ],
    style: { head: [], border: [] },
  });
  for (const s of summaries) {
    workloads.push([truncate(s.workloadName, 40), String(s.runs), String(s.configHashes), formatTimestamp(s.latest)]);
  }
  console.log(workloads.toString());
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Run"),
      chalk.bold("Start"),
      chalk.bold("Workload"),
      chalk.bold("Mode"),
      chalk.bold("Config"),
      chalk.bold("Version"),
      chalk.bold("Achieved TPS"),
      chalk.bold("Drop rate"),
    ],
    style: { head: [], border: [] },
  });

  for (const run of runs) {
    const tps = run.metrics["achieved_tps"];
    const drop = run.metrics["drop_rate"];
    table.push([
      truncate(run.runId, 36),
      formatTimestamp(run.timestamp),
      truncate(run.workloadName, 24),
      run.genMode,
      run.workloadConfigHash.slice(0, 8),
      run.clientVersion,
      tps === undefined ? chalk.dim("—") : tps.toFixed(2),
      drop === undefined ? chalk.dim("—") : formatPercent(drop),
    ]);
  }

  console.log(table.toString());
  console.log();
  console.log(`  ${runs.length} runs · ${summaries.length} workloads`);
  console.log();
}

export function printRunDetail(run: RunRecord): void {
  console.log(chalk.bold(`  ${run.runId}`));
  console.log(chalk.dim(`  ${run.file}`));
  console.log();

  const duration = run.metrics["duration_s"];
  const facts: [string, string][] = [
    ["Workload", run.workloadName],
    ["Start", formatTimestamp(run.timestamp)],
    ["Duration", duration === undefined ? "n/a" : formatDuration(duration)],
    ["Generator mode", run.genMode],
    ["Client version", run.clientVersion],
    ["Config hash", run.workloadConfigHash],
  ];
  for (const [label, value] of facts) {
    console.log(`  ${chalk.dim(label.padEnd(16))}${value}`);
  }
  console.log();

  const metrics = new Table({
    head: [chalk.bold("Metric"), chalk.bold("Value")],
    style: { head: [], border: [] },
  });
  for (const name of Object.keys(run.metrics).sort()) {
    if (name.includes(".") && hasStat(run, name)) continue;
    metrics.push([name, formatNumber(run.metrics[name])]);
  }
  console.log(metrics.toString());
  console.log();

  const statKeys = Object.keys(run.stats).sort();
  if (statKeys.length === 0) {
    console.log(chalk.dim("  No stats in this report."));
  } else {
    const stats = new Table({
      head: ["Stat", "Mean", "p50", "p90", "p99", "Samples"].map((h) => chalk.bold(h)),
      style: { head: [], border: [] },
    });
    for (const key of statKeys) {
      const overall = run.stats[key];
      stats.push([
        key,
        ...["mean", "p50", "p90", "p99", "samples"].map((field) => {
          const value = overall[field];
          return value === undefined ? chalk.dim("—") : formatNumber(value);
        }),
      ]);
    }
    console.log(stats.toString());
  }
  console.log();

  if (Object.keys(run.workloadConfig).length > 0) {
    console.log(chalk.bold("  Workload config"));
    console.log(
      JSON.stringify(run.workloadConfig, null, 2)
        .split("\n")
        .map((line) => `  ${line}`)
        .join("\n")
    );
    console.log();
  }
}

export function printDiagnostics(errors: readonly MalformedReportError[]): void {
  if (errors.length === 0) return;
  console.log(chalk.yellow(`  Skipped ${errors.length} malformed report(s):`));
  for (const e of errors) {
    console.log(chalk.yellow(`    ${e.file}`) + chalk.dim(` — ${e.reason}`));
  }
  console.log();
}

function hasStat(run: RunRecord, metric: string): boolean {
  const dot = metric.lastIndexOf(".");
  const key = metric.slice(0, dot);
  return Object.hasOwn(run.stats, key) && Object.hasOwn(run.stats[key], metric.slice(dot + 1));
}
