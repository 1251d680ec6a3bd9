import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

export async function makeTempDir(files: Record<string, unknown> = {}): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "txreport-cli-"));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), typeof content === "string" ? content : JSON.stringify(content), "utf-8");
  }
  return dir;
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function report(
  workloadName: string,
  hash: string,
  metrics: Record<string, number>,
  timestamp: string,
  clientVersion?: string
): Record<string, unknown> {
  return {
    workload_name: workloadName,
    workload_config_hash: hash,
    metrics,
    timestamp,
    ...(clientVersion !== undefined && { client_version: clientVersion }),
  };
}

/** Collect everything written through console.log, one entry per call. */
export function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  });
  return lines;
}
