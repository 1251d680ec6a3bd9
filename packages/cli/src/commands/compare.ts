import chalk from "chalk";
import Table from "cli-table3";
import {
  checkRegressions,
  formatNumber,
  formatRelative,
  formatSigned,
  formatTimestamp,
  generateHtmlComparison,
  generateJsonComparison,
  printDiagnostics,
  runLabel,
  truncate,
  type ComparisonReport,
  type MatchSet,
  type MetricDelta,
} from "@txreport/core";
import { loadConfig } from "../config.js";
import { openReports, parseThresholdArgs, printBanner, type SourceOptions } from "./shared.js";

export type CompareFormat = "terminal" | "json" | "html";

export interface CompareOptions extends SourceOptions {
  baseline: string;
  match?: "name" | "hash";
  include?: string[];
  exclude?: string[];
  limit?: number;
  threshold?: string[];
  format?: CompareFormat;
}

export async function runCompare(options: CompareOptions): Promise<void> {
  const config = await loadConfig();
  const format = options.format ?? "terminal";

  // Command-line thresholds come first so their patterns are tried first too.
  const cliThresholds = parseThresholdArgs(options.threshold ?? []);
  const thresholds = {
    ...cliThresholds,
    ...Object.fromEntries(
      Object.entries(config.compare.thresholds).filter(([metric]) => !(metric in cliThresholds))
    ),
  };
  const session = await openReports(config, options, thresholds);

  const match = options.match ?? config.compare.match;
  const snapshot = session.compare({
    baseline: options.baseline,
    mode: match === "hash" ? "by-hash" : "by-name",
    include: options.include,
    exclude: options.exclude,
    limit: options.limit ?? config.compare.limit,
  });

  const result = checkRegressions(snapshot.report);

  if (format === "json") {
    console.log(generateJsonComparison(snapshot.report, snapshot.matchSet));
  } else if (format === "html") {
    console.log(generateHtmlComparison(snapshot.report, snapshot.matchSet));
  } else {
    printBanner("Compare");
    printDiagnostics(snapshot.repository.errors);
    printComparison(snapshot.report, snapshot.matchSet);
    if (result.hasRegressions) {
      console.log(chalk.red.bold(`  ⚠ ${result.regressionSummary}`));
      console.log();
    }
  }

  process.exitCode = result.exitCode;
}

function printComparison(report: ComparisonReport, matchSet: MatchSet): void {
  const { baseline } = matchSet;
  console.log(chalk.bold(`  Baseline: ${baseline.runId}`));
  console.log(chalk.dim(`  ${runLabel(baseline)}`));
  console.log(chalk.dim(`  Matching by ${describeMode(report.mode)}`));
  console.log();

  if (report.results.length === 0) {
    console.log(chalk.yellow("  No comparable runs for this baseline."));
    console.log();
    return;
  }

  const candidates = new Map(matchSet.candidates.map((r) => [r.runId, r]));

  for (const result of report.results) {
    const run = candidates.get(result.candidateRunId);
    const when = run ? chalk.dim(` (${formatTimestamp(run.timestamp)}, ${run.clientVersion})`) : "";
    console.log(`  ${result.flagged ? chalk.red.bold(result.candidateRunId) : chalk.bold(result.candidateRunId)}${when}`);

    const table = new Table({
      head: [
        chalk.bold("Metric"),
        chalk.bold("Baseline"),
        chalk.bold("Candidate"),
        chalk.bold("Delta"),
        chalk.bold("Change"),
        chalk.bold("Status"),
      ],
      style: { head: [], border: [] },
    });

    for (const [name, delta] of Object.entries(result.metrics)) {
      table.push(formatDeltaRow(name, delta));
    }

    console.log(table.toString());
    console.log();
  }

  const parts = [
    `${report.results.length} compared`,
    report.flaggedCount > 0
      ? chalk.red(`${report.flaggedCount} flagged`)
      : chalk.dim("0 flagged"),
  ].join(chalk.dim(" · "));
  console.log(`  ${parts}`);
  console.log();
}

function formatDeltaRow(name: string, delta: MetricDelta): string[] {
  const metric = truncate(name, 36);
  if (delta.status === "missing") {
    return delta.side === "candidate"
      ? [metric, formatNumber(delta.baseline), chalk.dim("—"), chalk.dim("—"), chalk.dim("—"), chalk.yellow("missing in candidate")]
      : [metric, chalk.dim("—"), formatNumber(delta.candidate), chalk.dim("—"), chalk.dim("—"), chalk.yellow("missing in baseline")];
  }

  const change = formatRelative(delta.relativeDelta);
  return [
    metric,
    formatNumber(delta.baseline),
    formatNumber(delta.candidate),
    delta.delta === 0 ? chalk.dim("—") : formatSigned(delta.delta, 3),
    delta.flagged ? chalk.red(change) : change,
    delta.flagged ? chalk.red.bold("FLAGGED") : chalk.dim("ok"),
  ];
}

function describeMode(mode: ComparisonReport["mode"]): string {
  switch (mode) {
    case "by-name":
      return "workload name";
    case "by-hash":
      return "exact config hash";
    case "manual":
      return "hand-picked runs";
  }
}
