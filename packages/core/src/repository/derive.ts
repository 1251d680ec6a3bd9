import { createHash } from "node:crypto";
import { MalformedReportError } from "../errors.js";
import type { RunRecord } from "./types.js";
import { parseReportJson, type FlatReport, type TxgenReport } from "./schema.js";

const RFC3339 =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/i;

/**
 * Parse an RFC 3339 timestamp. Fractions longer than milliseconds (the
 * generator writes nanoseconds) are truncated; a missing offset means UTC.
 */
export function parseTimestamp(value: string): Date | null {
  const match = RFC3339.exec(value.trim());
  if (!match) return null;

  const [, base, fraction, zone] = match;
  const millis = fraction ? fraction.slice(0, 4).padEnd(4, "0") : "";
  const offset = !zone || zone.toUpperCase() === "Z" ? "Z" : zone;
  const date = new Date(`${base}${millis}${offset}`);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** JSON with object keys sorted at every level and no whitespace. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Hex SHA-256 of the canonical JSON form: equal configs hash equal regardless of key order. */
export function hashWorkloadConfig(config: Readonly<Record<string, unknown>>): string {
  return createHash("sha256").update(canonicalJson(config), "utf8").digest("hex");
}

/**
 * A generator mode is either a bare variant name or a single-key object
 * tagging the variant with its payload.
 */
export function genModeLabel(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    const [first] = Object.keys(value);
    if (first !== undefined) return first;
  }
  return "unknown";
}

export interface ReportSource {
  runId: string;
  /** Absolute path. */
  file: string;
  /** Path relative to the scanned root, used in error messages. */
  name: string;
}

/**
 * Turn the decoded JSON of one report file into a frozen run record.
 * Throws `MalformedReportError` when the content does not describe a run.
 */
export function deriveRunRecord(data: unknown, source: ReportSource): RunRecord {
  const parsed = parseReportJson(data);
  if (!parsed.success) {
    throw new MalformedReportError(source.name, parsed.reason);
  }

  const record =
    parsed.data.kind === "flat"
      ? fromFlatReport(parsed.data.report, source)
      : fromTxgenReport(parsed.data.report, source);

  return Object.freeze({
    ...record,
    workloadConfig: Object.freeze(record.workloadConfig),
    metrics: Object.freeze(record.metrics),
    stats: Object.freeze(record.stats),
  });
}

function fromFlatReport(report: FlatReport, source: ReportSource): RunRecord {
  let timestamp: Date | null = null;
  if (typeof report.timestamp === "number") {
    timestamp = new Date(report.timestamp);
    if (Number.isNaN(timestamp.getTime())) {
      throw new MalformedReportError(source.name, `timestamp: invalid epoch value ${report.timestamp}`);
    }
  } else if (typeof report.timestamp === "string") {
    timestamp = parseTimestamp(report.timestamp);
    if (!timestamp) {
      throw new MalformedReportError(source.name, `timestamp: not an RFC 3339 time "${report.timestamp}"`);
    }
  }

  return {
    runId: source.runId,
    file: source.file,
    workloadName: report.workload_name,
    workloadConfigHash: report.workload_config_hash,
    workloadConfig: { ...(report.workload_config ?? {}) },
    timestamp,
    clientVersion: report.client_version || "Unknown",
    genMode: report.gen_mode || "unknown",
    metrics: { ...report.metrics },
    stats: {},
  };
}

function fromTxgenReport(report: TxgenReport, source: ReportSource): RunRecord {
  const start = parseTimestamp(report.start_time);
  if (!start) {
    throw new MalformedReportError(source.name, `start_time: not an RFC 3339 time "${report.start_time}"`);
  }
  const end = parseTimestamp(report.end_time);
  if (!end) {
    throw new MalformedReportError(source.name, `end_time: not an RFC 3339 time "${report.end_time}"`);
  }

  const durationS = Math.max((end.getTime() - start.getTime()) / 1000, 0);
  const workloadIdx = report.workload_idx ?? 0;
  const group = report.config?.workload_groups?.[workloadIdx] ?? null;
  const workloadConfig: Record<string, unknown> = group ? structuredClone(group) : {};
  const workloadName = group?.name || `workload_${workloadIdx}`;
  const genMode = genModeLabel(group?.traffic_gens?.[0]?.gen_mode);

  const txsSent = report.txs_sent ?? 0;
  const txsCommitted = report.txs_committed ?? 0;
  const txsDropped = report.txs_dropped ?? Math.max(0, txsSent - txsCommitted);

  const metrics: Record<string, number> = {
    target_tps: report.target_tps ?? 0,
    achieved_tps: durationS > 0 ? txsCommitted / durationS : 0,
    txs_sent: txsSent,
    txs_committed: txsCommitted,
    txs_dropped: txsDropped,
    drop_rate: txsSent > 0 ? txsDropped / txsSent : 0,
    duration_s: durationS,
  };

  const stats = extractStats(report.stats ?? {});
  for (const [key, overall] of Object.entries(stats)) {
    for (const [field, value] of Object.entries(overall)) {
      metrics[`${key}.${field}`] = value;
    }
  }

  return {
    runId: source.runId,
    file: source.file,
    workloadName,
    workloadConfigHash: Object.keys(workloadConfig).length > 0 ? hashWorkloadConfig(workloadConfig) : "",
    workloadConfig,
    timestamp: start,
    clientVersion: report.client_version || "Unknown",
    genMode,
    metrics,
    stats,
  };
}

/** Keep the numeric fields of each stat's `overall` block; skip anything else. */
function extractStats(raw: Record<string, unknown>): Record<string, Record<string, number>> {
  const stats: Record<string, Record<string, number>> = {};
  for (const [key, stat] of Object.entries(raw)) {
    if (typeof stat !== "object" || stat === null || !("overall" in stat)) continue;
    const overall: unknown = stat.overall;
    if (typeof overall !== "object" || overall === null) continue;

    const fields: Record<string, number> = {};
    for (const [field, value] of Object.entries(overall)) {
      const numeric = toFiniteNumber(value);
      if (numeric !== null) fields[field] = numeric;
    }
    stats[key] = fields;
  }
  return stats;
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
