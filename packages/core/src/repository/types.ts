import type { MalformedReportError } from "../errors.js";

export interface RunRecord {
  /** Report path relative to the scanned root, "/"-separated, without ".json". */
  readonly runId: string;
  /** Absolute path of the report file. */
  readonly file: string;
  readonly workloadName: string;
  /** Empty when a generator report carries no workload config. */
  readonly workloadConfigHash: string;
  readonly workloadConfig: Readonly<Record<string, unknown>>;
  /** `null` when the report carries no timestamp. */
  readonly timestamp: Date | null;
  readonly clientVersion: string;
  readonly genMode: string;
  readonly metrics: Readonly<Record<string, number>>;
  /** Per-metric overall statistics (mean, percentiles, samples), keyed by stats key. */
  readonly stats: Readonly<Record<string, Readonly<Record<string, number>>>>;
}

export interface RunRepository {
  /** Absolute path of the scanned directory. */
  readonly root: string;
  /** Newest first; equal timestamps ordered by file name. */
  readonly runs: readonly RunRecord[];
  /** Files that matched the pattern but could not be loaded. */
  readonly errors: readonly MalformedReportError[];
}

export interface LoadOptions {
  /** File-name pattern; `*` matches any run of characters, `?` a single one. */
  pattern?: string;
  /** Walk subdirectories too. */
  recursive?: boolean;
}

export const DEFAULT_REPORTS_DIR = "reports";
export const DEFAULT_REPORT_PATTERN = "*-report-*.json";
