import chalk from "chalk";
import { ConfigError, openSession, type ReportSession, type ThresholdMap } from "@txreport/core";
import type { TxreportConfig } from "../config.js";

export interface SourceOptions {
  dir?: string;
  pattern?: string;
  recursive?: boolean;
}

export function printBanner(title: string): void {
  console.log();
  console.log(chalk.bold(`  txreport — ${title}`));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();
}

/** Open a session on the configured report directory; command-line values win. */
export function openReports(
  config: TxreportConfig,
  source: SourceOptions,
  thresholds?: ThresholdMap
): Promise<ReportSession> {
  return openSession({
    dir: source.dir ?? config.reports.dir,
    pattern: source.pattern ?? config.reports.pattern,
    recursive: source.recursive ?? config.reports.recursive,
    defaultMode: config.compare.match === "hash" ? "by-hash" : "by-name",
    thresholds: thresholds ?? config.compare.thresholds,
  });
}

/** `["latency.p90=0.1", "drop_rate=0.05"]` → relative limits in either direction. */
export function parseThresholdArgs(args: readonly string[]): Record<string, number> {
  const thresholds: Record<string, number> = {};
  for (const arg of args) {
    const eq = arg.lastIndexOf("=");
    const metric = eq > 0 ? arg.slice(0, eq).trim() : "";
    const value = eq > 0 ? Number(arg.slice(eq + 1)) : Number.NaN;
    if (!metric || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`Invalid --threshold "${arg}": expected <metric>=<non-negative number>`);
    }
    thresholds[metric] = value;
  }
  return thresholds;
}

/** Whether the command line asked for machine output, so errors go out as JSON too. */
export function wantsJson(argv: readonly string[]): boolean {
  const formatIdx = argv.indexOf("--format");
  return (
    argv.includes("--json") ||
    argv.includes("--format=json") ||
    (formatIdx !== -1 && argv[formatIdx + 1] === "json")
  );
}
