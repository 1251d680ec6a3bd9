/**
 * Error hierarchy shared by the library and the CLI.
 *
 * Every error carries a stable `code` for machine output and the process
 * exit code the CLI should end with.
 */

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  MISUSE: 2,
  NOT_FOUND: 7,
  CONFIG_ERROR: 10,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const ErrorCode = {
  NOT_FOUND: "not_found",
  MALFORMED_REPORT: "malformed_report",
  NO_BASELINE: "no_baseline",
  UNKNOWN_RUN: "unknown_run",
  CONFIG_ERROR: "config_error",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ReportErrorOptions {
  code: ErrorCodeValue;
  exitCode?: ExitCodeValue;
  details?: Record<string, unknown>;
  hint?: string;
  cause?: unknown;
}

export interface StructuredError {
  error: {
    code: ErrorCodeValue;
    message: string;
    exitCode: ExitCodeValue;
    details?: Record<string, unknown>;
    hint?: string;
    cause?: string;
  };
}

export class ReportError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: ExitCodeValue;
  readonly details?: Record<string, unknown>;
  readonly hint?: string;

  constructor(message: string, options: ReportErrorOptions) {
    super(message);
    this.name = "ReportError";
    this.code = options.code;
    this.exitCode = options.exitCode ?? ExitCode.ERROR;
    this.details = options.details;
    this.hint = options.hint;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON(): StructuredError {
    return {
      error: {
        code: this.code,
        message: this.message,
        exitCode: this.exitCode,
        ...(this.details && { details: this.details }),
        ...(this.hint && { hint: this.hint }),
        ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
      },
    };
  }

  /** Plain-text rendering; the CLI colours it. */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.hint) {
      output += `\nHint: ${this.hint}`;
    }
    if (this.details && Object.keys(this.details).length > 0) {
      const lines = Object.entries(this.details).map(
        ([key, value]) => `  ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`
      );
      output += `\nDetails:\n${lines.join("\n")}`;
    }
    return output;
  }
}

/** The report directory does not exist, is not a directory, or cannot be read. */
export class NotFoundError extends ReportError {
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Report directory "${path}" ${reason}`, {
      code: ErrorCode.NOT_FOUND,
      exitCode: ExitCode.NOT_FOUND,
      details: { path },
      hint: "Point --dir (or reports.dir in txreport.config.json) at a folder containing '*-report-*.json' files.",
      cause,
    });
    this.name = "NotFoundError";
    this.path = path;
  }
}

/**
 * One report file could not be turned into a run. The loader collects these
 * instead of throwing them.
 */
export class MalformedReportError extends ReportError {
  readonly file: string;
  readonly reason: string;

  constructor(file: string, reason: string, cause?: unknown) {
    super(`Malformed report ${file}: ${reason}`, {
      code: ErrorCode.MALFORMED_REPORT,
      details: { file },
      cause,
    });
    this.name = "MalformedReportError";
    this.file = file;
    this.reason = reason;
  }
}

export class NoBaselineError extends ReportError {
  constructor(message = "No baseline run selected.") {
    super(message, {
      code: ErrorCode.NO_BASELINE,
      exitCode: ExitCode.MISUSE,
      hint: "Choose a baseline run id from `txreport list`.",
    });
    this.name = "NoBaselineError";
  }
}

export class UnknownRunError extends ReportError {
  readonly runIds: string[];

  constructor(runIds: string[]) {
    super(`Unknown run id(s): ${runIds.join(", ")}`, {
      code: ErrorCode.UNKNOWN_RUN,
      exitCode: ExitCode.MISUSE,
      details: { runIds },
    });
    this.name = "UnknownRunError";
    this.runIds = runIds;
  }
}

export class ConfigError extends ReportError {
  constructor(message: string, issues: string[] = []) {
    super(message, {
      code: ErrorCode.CONFIG_ERROR,
      exitCode: ExitCode.CONFIG_ERROR,
      details: issues.length > 0 ? { issues } : undefined,
    });
    this.name = "ConfigError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
