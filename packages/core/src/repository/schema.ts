import { z } from "zod";

const JsonObject = z.record(z.string(), z.unknown());

/**
 * Report already reduced to the comparison fields. This is what most
 * producers other than the transaction generator emit.
 */
export const FlatReportSchema = z
  .object({
    workload_name: z.string().min(1),
    workload_config_hash: z.string().min(1),
    metrics: z.record(z.string(), z.number()),
    timestamp: z.union([z.string(), z.number()]).optional(),
    client_version: z.string().nullish(),
    gen_mode: z.string().nullish(),
    workload_config: JsonObject.optional(),
  })
  .passthrough();

export type FlatReport = z.infer<typeof FlatReportSchema>;

const WorkloadGroupSchema = z
  .object({
    name: z.string().optional(),
    traffic_gens: z.array(JsonObject).optional(),
  })
  .passthrough();

/** Native report written by the transaction generator, one per workload group run. */
export const TxgenReportSchema = z
  .object({
    start_time: z.string(),
    end_time: z.string(),
    workload_idx: z.number().int().nonnegative().optional(),
    config: z
      .object({
        workload_groups: z.array(WorkloadGroupSchema.nullable()).optional(),
      })
      .passthrough()
      .optional(),
    target_tps: z.number().optional(),
    txs_sent: z.number().optional(),
    txs_committed: z.number().optional(),
    txs_dropped: z.number().optional(),
    client_version: z.string().nullish(),
    stats: z.record(z.string(), z.unknown()).nullish(),
  })
  .passthrough();

export type TxgenReport = z.infer<typeof TxgenReportSchema>;

export type ParsedReport =
  | { kind: "flat"; report: FlatReport }
  | { kind: "txgen"; report: TxgenReport };

export type ReportParseResult =
  | { success: true; data: ParsedReport }
  | { success: false; reason: string };

/**
 * Pick the schema by shape: anything with a `start_time` is a generator report,
 * everything else must be a flat report.
 */
export function parseReportJson(data: unknown): ReportParseResult {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { success: false, reason: "report must be a JSON object" };
  }

  if ("start_time" in data) {
    const parsed = TxgenReportSchema.safeParse(data);
    return parsed.success
      ? { success: true, data: { kind: "txgen", report: parsed.data } }
      : { success: false, reason: describeIssues(parsed.error) };
  }

  const parsed = FlatReportSchema.safeParse(data);
  return parsed.success
    ? { success: true, data: { kind: "flat", report: parsed.data } }
    : { success: false, reason: describeIssues(parsed.error) };
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
