import type { RunRecord } from "./repository/types.js";

export function formatDuration(seconds: number): string {
  const total = Math.max(Math.trunc(seconds), 0);
  const hours = Math.floor(total / 3600);
  const mins = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) return `${hours}h ${mins}m`;
  if (mins > 0) return `${mins}m ${secs}s`;
  return `${secs}s`;
}

export function formatPercent(value: number | null | undefined): string {
  if (value === null || value === undefined) return "n/a";
  return `${(value * 100).toFixed(2)}%`;
}

/** Relative change from `base` to `other`, e.g. "+20.0%". */
export function formatDeltaPercent(base: number, other: number): string {
  if (base === 0) return "—";
  return formatRelative((other - base) / base);
}

export function formatRelative(relative: number | null): string {
  if (relative === null) return "—";
  const pct = relative * 100;
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

/** Difference of two ratios in percentage points, e.g. "+1.50pp". */
export function formatDeltaPoints(base: number, other: number): string {
  const points = (other - base) * 100;
  return `${points >= 0 ? "+" : ""}${points.toFixed(2)}pp`;
}

export function formatSigned(value: number, digits = 2): string {
  return `${value >= 0 ? "+" : ""}${formatNumber(value, digits)}`;
}

/** Integers as-is, everything else rounded to `digits` decimals. */
export function formatNumber(value: number, digits = 3): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}

/** `YYYY-MM-DD HH:MM` in UTC. */
export function formatTimestamp(date: Date | null): string {
  if (!date) return "n/a";
  return date.toISOString().slice(0, 16).replace("T", " ");
}

export function runLabel(run: RunRecord): string {
  return [
    formatTimestamp(run.timestamp),
    run.workloadName,
    run.genMode,
    run.workloadConfigHash.slice(0, 8),
  ].join(" | ");
}

export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + "…";
}
