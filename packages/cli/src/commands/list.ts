import chalk from "chalk";
import {
  filterRuns,
  printDiagnostics,
  printOverview,
  summarizeRun,
  summarizeWorkloads,
} from "@txreport/core";
import { loadConfig } from "../config.js";
import { openReports, printBanner, type SourceOptions } from "./shared.js";

export interface ListOptions extends SourceOptions {
  workload?: string;
  hash?: string;
  clientVersion?: string;
  json?: boolean;
}

export async function runList(options: ListOptions): Promise<void> {
  const config = await loadConfig();
  const session = await openReports(config, options);
  const { repository } = session;

  const runs = filterRuns(repository.runs, {
    workload: options.workload,
    hash: options.hash,
    clientVersion: options.clientVersion,
  });
  const summaries = summarizeWorkloads(runs);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          root: repository.root,
          workloads: summaries.map((s) => ({ ...s, latest: s.latest?.toISOString() ?? null })),
          runs: runs.map((r) => ({ ...summarizeRun(r), metrics: r.metrics })),
          errors: repository.errors.map((e) => ({ file: e.file, reason: e.reason })),
        },
        null,
        2
      )
    );
    return;
  }

  printBanner("Runs");
  console.log(chalk.dim(`  Reports from ${repository.root}`));
  console.log();

  printDiagnostics(repository.errors);

  if (runs.length === 0) {
    console.log(chalk.yellow("  No reports found."));
    console.log(chalk.dim("  Point --dir at a folder containing '*-report-*.json' files."));
    console.log();
    return;
  }

  printOverview(runs, summaries);
}
