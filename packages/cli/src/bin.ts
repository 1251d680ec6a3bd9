import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { z } from "zod";
import { ReportError } from "@txreport/core";
import { runList } from "./commands/list.js";
import { runShow } from "./commands/show.js";
import { runCompare, type CompareFormat } from "./commands/compare.js";
import { runVersions } from "./commands/versions.js";
import { wantsJson } from "./commands/shared.js";

const require = createRequire(import.meta.url);
const PackageJson = z.object({ version: z.string().optional() });
const packageVersion =
  process.env.TXREPORT_CLI_VERSION ??
  PackageJson.parse(require("../package.json")).version ??
  "0.0.0";

const program = new Command();

program
  .name("txreport")
  .description("Browse and compare load-generator run reports offline")
  .version(packageVersion);

program
  .command("list")
  .description("List runs and per-workload counts")
  .option("--dir <path>", "Reports folder")
  .option("--pattern <glob>", "Report file-name pattern")
  .option("--no-recursive", "Do not scan subdirectories")
  .option("--workload <name>", "Only runs of this workload")
  .option("--hash <hash>", "Only runs with this workload config hash")
  .option("--client-version <version>", "Only runs of this client version")
  .option("--json", "Output as JSON")
  .action(async (options) => {
    await runList({
      dir: options.dir,
      pattern: options.pattern,
      recursive: options.recursive === false ? false : undefined,
      workload: options.workload,
      hash: options.hash,
      clientVersion: options.clientVersion,
      json: options.json,
    });
  });

program
  .command("show <run>")
  .description("Show one run: metrics, stats and workload config")
  .option("--dir <path>", "Reports folder")
  .option("--pattern <glob>", "Report file-name pattern")
  .option("--no-recursive", "Do not scan subdirectories")
  .option("--json", "Output as JSON")
  .action(async (run: string, options) => {
    await runShow({
      run,
      dir: options.dir,
      pattern: options.pattern,
      recursive: options.recursive === false ? false : undefined,
      json: options.json,
    });
  });

program
  .command("compare <baseline>")
  .description("Compare a baseline run against matching runs")
  .option("--dir <path>", "Reports folder")
  .option("--pattern <glob>", "Report file-name pattern")
  .option("--no-recursive", "Do not scan subdirectories")
  .option("--match <mode>", "Match previous runs by: name, hash", parseMatch)
  .option("--include <runs...>", "Force these runs into the comparison")
  .option("--exclude <runs...>", "Drop these runs from the comparison")
  .option("--limit <n>", "Maximum number of runs to compare", parsePositiveInt)
  .option("--threshold <metric=value...>", "Relative change that flags a metric, e.g. achieved_tps=0.1")
  .option("--format <type>", "Output format: terminal, json, html", parseFormat, "terminal")
  .action(async (baseline: string, options) => {
    await runCompare({
      baseline,
      dir: options.dir,
      pattern: options.pattern,
      recursive: options.recursive === false ? false : undefined,
      match: options.match,
      include: options.include,
      exclude: options.exclude,
      limit: options.limit,
      threshold: options.threshold,
      format: options.format,
    });
  });

program
  .command("versions")
  .description("Compare per-workload medians across client versions")
  .option("--dir <path>", "Reports folder")
  .option("--pattern <glob>", "Report file-name pattern")
  .option("--no-recursive", "Do not scan subdirectories")
  .option("--reference <version>", "Reference client version (default: most recent)")
  .option("--versions <versions...>", "Versions to compare against (default: the next two)")
  .option("--workload <names...>", "Only these workloads")
  .option("--all-workloads", "Include workloads missing from some versions")
  .option("--json", "Output as JSON")
  .action(async (options) => {
    await runVersions({
      dir: options.dir,
      pattern: options.pattern,
      recursive: options.recursive === false ? false : undefined,
      reference: options.reference,
      versions: options.versions,
      workload: options.workload,
      allWorkloads: options.allWorkloads,
      json: options.json,
    });
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof ReportError) {
    if (wantsJson(process.argv)) {
      console.log(JSON.stringify(error.toJSON(), null, 2));
    } else {
      console.error(chalk.red(error.format()));
    }
    process.exitCode = error.exitCode;
    return;
  }
  console.error(chalk.red(error instanceof Error ? error.stack ?? error.message : String(error)));
  process.exitCode = 1;
});

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

function parseMatch(value: string): "name" | "hash" {
  if (value === "name" || value === "hash") return value;
  throw new InvalidArgumentError(`Unknown match mode "${value}". Use "name" or "hash".`);
}

function parseFormat(value: string): CompareFormat {
  if (value === "terminal" || value === "json" || value === "html") return value;
  throw new InvalidArgumentError(`Unknown format "${value}". Use terminal, json or html.`);
}
