import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import {
  ConfigError,
  DEFAULT_REPORTS_DIR,
  DEFAULT_REPORT_PATTERN,
  describeIssues,
} from "@txreport/core";

const ThresholdSchema = z.union([
  z.number().nonnegative(),
  z
    .object({
      relative: z.number().nonnegative().optional(),
      absolute: z.number().nonnegative().optional(),
      direction: z.enum(["increase", "decrease", "either"]).optional(),
    })
    .strict()
    .refine((rule) => rule.relative !== undefined || rule.absolute !== undefined, {
      message: "a threshold needs `relative` or `absolute`",
    }),
]);

export const TxreportConfigSchema = z
  .object({
    reports: z
      .object({
        dir: z.string().min(1).default(DEFAULT_REPORTS_DIR),
        pattern: z.string().min(1).default(DEFAULT_REPORT_PATTERN),
        recursive: z.boolean().default(true),
      })
      .strict()
      .default({}),
    compare: z
      .object({
        match: z.enum(["name", "hash"]).default("name"),
        limit: z.number().int().positive().optional(),
        thresholds: z.record(z.string(), ThresholdSchema).default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type TxreportConfig = z.output<typeof TxreportConfigSchema>;
export type TxreportConfigInput = z.input<typeof TxreportConfigSchema>;

export function defineConfig(config: TxreportConfigInput): TxreportConfigInput {
  return config;
}

/**
 * Find and validate the nearest txreport config. A project without one
 * runs on defaults.
 */
export async function loadConfig(searchFrom?: string): Promise<TxreportConfig> {
  const explorer = cosmiconfig("txreport", {
    searchPlaces: [
      "package.json",
      "txreport.config.json",
      "txreport.config.js",
      "txreport.config.mjs",
      ".txreportrc",
      ".txreportrc.json",
    ],
  });

  const result = searchFrom
    ? await explorer.search(searchFrom)
    : await explorer.search();

  const raw: unknown = result && !result.isEmpty ? result.config : {};
  return parseConfig(raw, result?.filepath);
}

export function parseConfig(raw: unknown, source?: string): TxreportConfig {
  const parsed = TxreportConfigSchema.safeParse(interpolateEnvVars(raw));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ""}: ${describeIssues(parsed.error)}`,
      parsed.error.issues.map((i) => i.message)
    );
  }
  return parsed.data;
}

/** Replace `${env.NAME}` in every string value. */
export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => process.env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, v]) => [key, interpolateEnvVars(v)])
    );
  }
  return value;
}
