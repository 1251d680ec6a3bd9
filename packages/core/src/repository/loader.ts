import { readdir, readFile, stat } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import { MalformedReportError, NotFoundError } from "../errors.js";
import { compileWildcard } from "../pattern.js";
import { deriveRunRecord } from "./derive.js";
import {
  DEFAULT_REPORT_PATTERN,
  type LoadOptions,
  type RunRecord,
  type RunRepository,
} from "./types.js";

/**
 * Scan `dir` for report files and parse each one into a run.
 *
 * Files that fail to parse are skipped and returned in `errors`; only a
 * missing or unreadable directory fails the whole load.
 */
export async function loadRunRepository(
  dir: string,
  options: LoadOptions = {}
): Promise<RunRepository> {
  const root = resolve(dir);
  const matcher = compileWildcard(options.pattern ?? DEFAULT_REPORT_PATTERN);
  const recursive = options.recursive ?? true;

  await assertDirectory(root, dir);

  const files = await scanDir(root, recursive, dir, true);
  const reportFiles = files.filter((f) => matcher.test(baseName(f)));

  const runs: RunRecord[] = [];
  const errors: MalformedReportError[] = [];

  for (const file of reportFiles) {
    const name = toPosix(relative(root, file));
    const runId = name.replace(/\.json$/i, "");
    try {
      const data = await readReport(file, name);
      runs.push(deriveRunRecord(data, { runId, file, name }));
    } catch (e) {
      if (e instanceof MalformedReportError) {
        errors.push(e);
      } else {
        throw e;
      }
    }
  }

  runs.sort(byRecency);
  errors.sort((a, b) => compareStrings(a.file, b.file));

  return Object.freeze({
    root,
    runs: Object.freeze(runs),
    errors: Object.freeze(errors),
  });
}

export function findRun(repository: RunRepository, runId: string): RunRecord | undefined {
  return repository.runs.find((r) => r.runId === runId);
}

/** Newest first; undated runs after dated ones; ties by file name. */
export function byRecency(a: RunRecord, b: RunRecord): number {
  const ta = a.timestamp ? a.timestamp.getTime() : Number.NEGATIVE_INFINITY;
  const tb = b.timestamp ? b.timestamp.getTime() : Number.NEGATIVE_INFINITY;
  if (ta !== tb) return ta < tb ? 1 : -1;
  return compareStrings(a.file, b.file) || compareStrings(a.runId, b.runId);
}

async function assertDirectory(root: string, displayPath: string): Promise<void> {
  const info = await stat(root).catch((e: unknown) => {
    throw new NotFoundError(displayPath, "does not exist", e);
  });
  if (!info.isDirectory()) {
    throw new NotFoundError(displayPath, "is not a directory");
  }
}

async function readReport(file: string, name: string): Promise<unknown> {
  const content = await readFile(file, "utf-8").catch((e: unknown) => {
    throw new MalformedReportError(name, `unreadable: ${errorMessage(e)}`, e);
  });

  try {
    return JSON.parse(content);
  } catch (e) {
    throw new MalformedReportError(name, `invalid JSON: ${errorMessage(e)}`, e);
  }
}

/**
 * Only the root must be readable: an unreadable subdirectory is skipped.
 * Symlinks are listed like the entry they point to, except that linked
 * directories are not descended into. A dangling link is kept as a file so
 * it surfaces as an unreadable report.
 */
async function scanDir(
  dir: string,
  recursive: boolean,
  displayPath: string,
  isRoot = false
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isRoot) throw new NotFoundError(displayPath, "cannot be read", e);
    return [];
  }

  entries.sort((a, b) => compareStrings(a.name, b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...(await scanDir(fullPath, recursive, displayPath)));
      }
    } else if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      const target = await stat(fullPath).catch(() => null);
      if (!target || target.isFile()) files.push(fullPath);
    }
  }
  return files;
}

function baseName(path: string): string {
  const idx = path.lastIndexOf(sep);
  return idx === -1 ? path : path.slice(idx + 1);
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
