import { compareRuns, type ComparisonReport } from "./diff/engine.js";
import type { ThresholdMap } from "./diff/thresholds.js";
import {
  adjustMatch,
  limitMatch,
  matchRuns,
  type MatchMode,
  type MatchSet,
} from "./match/matcher.js";
import { loadRunRepository } from "./repository/loader.js";
import type { LoadOptions, RunRepository } from "./repository/types.js";

export interface SessionOptions extends LoadOptions {
  dir: string;
  /** Mode used when a request names none. */
  defaultMode?: "by-name" | "by-hash";
  thresholds?: ThresholdMap;
}

export interface CompareRequest {
  baseline?: string;
  mode?: MatchMode;
  /** Candidate run ids for `manual` mode. */
  candidates?: readonly string[];
  include?: readonly string[];
  exclude?: readonly string[];
  limit?: number;
  /** Replaces the session thresholds for this request. */
  thresholds?: ThresholdMap;
}

export interface ComparisonSnapshot {
  readonly repository: RunRepository;
  readonly matchSet: MatchSet;
  readonly report: ComparisonReport;
}

/**
 * One user's view of a report directory. The repository is loaded once;
 * every request yields a new snapshot and nothing on the session changes.
 */
export class ReportSession {
  readonly options: Readonly<SessionOptions>;
  readonly repository: RunRepository;

  private constructor(options: SessionOptions, repository: RunRepository) {
    this.options = Object.freeze({ ...options });
    this.repository = repository;
  }

  static async open(options: SessionOptions): Promise<ReportSession> {
    const repository = await loadRunRepository(options.dir, {
      pattern: options.pattern,
      recursive: options.recursive,
    });
    return new ReportSession(options, repository);
  }

  /** Rescan the directory into a fresh session; this one stays usable. */
  reload(): Promise<ReportSession> {
    return ReportSession.open(this.options);
  }

  compare(request: CompareRequest): ComparisonSnapshot {
    const mode = request.mode ?? this.options.defaultMode ?? "by-name";

    let matchSet =
      mode === "manual"
        ? matchRuns(this.repository, request.baseline, { mode, candidates: request.candidates ?? [] })
        : matchRuns(this.repository, request.baseline, { mode });

    if ((request.include?.length ?? 0) > 0 || (request.exclude?.length ?? 0) > 0) {
      matchSet = adjustMatch(matchSet, this.repository, {
        include: request.include,
        exclude: request.exclude,
      });
    }

    if (request.limit !== undefined) {
      matchSet = limitMatch(matchSet, request.limit);
    }

    const report = compareRuns(matchSet, {
      thresholds: request.thresholds ?? this.options.thresholds,
    });

    return Object.freeze({ repository: this.repository, matchSet, report });
  }
}

export function openSession(options: SessionOptions): Promise<ReportSession> {
  return ReportSession.open(options);
}
