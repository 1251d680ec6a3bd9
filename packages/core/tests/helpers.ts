import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { RunRecord } from "../src/index.js";

/**
 * Write `files` (relative path → JSON value, or raw text for strings) into a
 * fresh temporary directory and return its path.
 */
export async function makeReportDir(files: Record<string, unknown>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "txreport-test-"));
  for (const [name, content] of Object.entries(files)) {
    const path = join(root, name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
  }
  return root;
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function flatReport(
  workloadName: string,
  hash: string,
  metrics: Record<string, number>,
  timestamp?: string,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    workload_name: workloadName,
    workload_config_hash: hash,
    metrics,
    ...(timestamp !== undefined && { timestamp }),
    ...extra,
  };
}

export function makeRun(fields: {
  runId: string;
  workloadName?: string;
  hash?: string;
  metrics?: Record<string, number>;
  timestamp?: string;
  clientVersion?: string;
}): RunRecord {
  return {
    runId: fields.runId,
    file: `/reports/${fields.runId}.json`,
    workloadName: fields.workloadName ?? "transfer",
    workloadConfigHash: fields.hash ?? "hash-transfer",
    workloadConfig: {},
    timestamp: fields.timestamp ? new Date(fields.timestamp) : null,
    clientVersion: fields.clientVersion ?? "Unknown",
    genMode: "unknown",
    metrics: fields.metrics ?? {},
    stats: {},
  };
}
