import { UnknownRunError, findRun, printRunDetail, summarizeRun } from "@txreport/core";
import { loadConfig } from "../config.js";
import { openReports, printBanner, type SourceOptions } from "./shared.js";

export interface ShowOptions extends SourceOptions {
  run: string;
  json?: boolean;
}

export async function runShow(options: ShowOptions): Promise<void> {
  const config = await loadConfig();
  const session = await openReports(config, options);

  const run = findRun(session.repository, options.run);
  if (!run) {
    throw new UnknownRunError([options.run]);
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          ...summarizeRun(run),
          metrics: run.metrics,
          stats: run.stats,
          workloadConfig: run.workloadConfig,
        },
        null,
        2
      )
    );
    return;
  }

  printBanner("Run detail");
  printRunDetail(run);
}
