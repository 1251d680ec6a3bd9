import type { ComparisonReport, DeltaResult, MetricDelta } from "../diff/engine.js";
import type { MatchSet } from "../match/matcher.js";
import type { RunRecord } from "../repository/types.js";
import { formatNumber, formatRelative, formatSigned, formatTimestamp, runLabel } from "../format.js";

export function generateHtmlComparison(report: ComparisonReport, matchSet: MatchSet): string {
  const baseline = matchSet.baseline;
  const byId = new Map(matchSet.candidates.map((r) => [r.runId, r]));
  const metricCount = new Set(report.results.flatMap((r) => Object.keys(r.metrics))).size;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Run comparison — ${esc(baseline.runId)}</title>
<style>
*{box-sizing:border-box;margin:0;padding:0}
body{font-family:-apple-system,BlinkMacSystemFont,"Segoe UI",sans-serif;background:#f8f9fa;color:#212529;padding:2rem;max-width:1200px;margin:0 auto}
.header{margin-bottom:2rem}
.header h1{font-size:1.5rem;font-weight:600}
.header .meta{color:#6c757d;font-size:.875rem;margin-top:.25rem}
.summary{display:flex;gap:1rem;margin-bottom:2rem;flex-wrap:wrap}
.stat{background:#fff;border-radius:8px;padding:1rem 1.5rem;border:1px solid #dee2e6;min-width:120px}
.stat .value{font-size:1.5rem;font-weight:700}
.stat .label{color:#6c757d;font-size:.75rem;text-transform:uppercase;letter-spacing:.05em}
.flagged{color:#dc3545;font-weight:600}
.missing{color:#b8860b}
h2{margin:1.5rem 0 .75rem;font-size:1.1rem}
table{width:100%;background:#fff;border-radius:8px;border-collapse:collapse;border:1px solid #dee2e6;margin-bottom:2rem}
th{text-align:left;padding:.6rem 1rem;border-bottom:2px solid #dee2e6;font-size:.875rem;color:#6c757d}
td{padding:.6rem 1rem;border-bottom:1px solid #dee2e6;font-size:.875rem}
tr:last-child td{border-bottom:none}
tr.flagged td{background:#fdf0f1}
</style>
</head>
<body>
<div class="header">
  <h1>Run comparison</h1>
  <div class="meta">Baseline: ${esc(runLabel(baseline))} | Match: ${esc(report.mode)} | Generated ${new Date().toISOString()}</div>
</div>
<div class="summary">
  <div class="stat"><div class="value">${report.results.length}</div><div class="label">Candidates</div></div>
  <div class="stat"><div class="value flagged">${report.flaggedCount}</div><div class="label">Flagged</div></div>
  <div class="stat"><div class="value">${metricCount}</div><div class="label">Metrics</div></div>
</div>
${report.results.length === 0 ? `<p>No comparable runs for this baseline.</p>` : report.results.map((r) => renderResult(r, byId.get(r.candidateRunId))).join("\n")}
</body>
</html>`;
}

function renderResult(result: DeltaResult, run: RunRecord | undefined): string {
  const title = run
    ? `${esc(result.candidateRunId)} <span class="meta">(${esc(formatTimestamp(run.timestamp))}, ${esc(run.clientVersion)})</span>`
    : esc(result.candidateRunId);

  const rows = Object.entries(result.metrics)
    .map(([name, delta]) => renderRow(name, delta))
    .join("\n");

  return `<h2 class="${result.flagged ? "flagged" : ""}">${title}</h2>
<table>
  <thead><tr><th>Metric</th><th>Baseline</th><th>Candidate</th><th>Delta</th><th>Change</th></tr></thead>
  <tbody>
${rows}
  </tbody>
</table>`;
}

function renderRow(name: string, delta: MetricDelta): string {
  if (delta.status === "missing") {
    const baseline = delta.side === "candidate" ? formatNumber(delta.baseline) : "—";
    const candidate = delta.side === "baseline" ? formatNumber(delta.candidate) : "—";
    return `    <tr><td>${esc(name)}</td><td>${baseline}</td><td>${candidate}</td><td class="missing" colspan="2">missing in ${delta.side}</td></tr>`;
  }

  return `    <tr${delta.flagged ? ' class="flagged"' : ""}><td>${esc(name)}</td><td>${formatNumber(delta.baseline)}</td><td>${formatNumber(delta.candidate)}</td><td>${formatSigned(delta.delta, 3)}</td><td>${formatRelative(delta.relativeDelta)}</td></tr>`;
}

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
