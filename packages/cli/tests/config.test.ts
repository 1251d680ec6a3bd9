import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "@txreport/core";
import { interpolateEnvVars, loadConfig, parseConfig } from "../src/config.js";
import { parseThresholdArgs, wantsJson } from "../src/commands/shared.js";
import { makeTempDir, removeDir } from "./helpers.js";

const dirs: string[] = [];

afterEach(async () => {
  delete process.env.TXREPORT_TEST_DIR;
  await Promise.all(dirs.splice(0).map(removeDir));
});

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      reports: { dir: "reports", pattern: "*-report-*.json", recursive: true },
      compare: { match: "name", thresholds: {} },
    });
  });

  it("accepts numeric and rule thresholds", () => {
    const config = parseConfig({
      compare: {
        match: "hash",
        limit: 5,
        thresholds: { achieved_tps: { relative: 0.1, direction: "decrease" }, "*.p90": 0.2 },
      },
    });

    expect(config.compare.match).toBe("hash");
    expect(config.compare.limit).toBe(5);
    expect(config.compare.thresholds["*.p90"]).toBe(0.2);
  });

  it("rejects unknown match modes", () => {
    expect(() => parseConfig({ compare: { match: "exact" } })).toThrow(ConfigError);
  });

  it("rejects a rule without a limit", () => {
    expect(() => parseConfig({ compare: { thresholds: { latency: { direction: "increase" } } } })).toThrow(
      "a threshold needs `relative` or `absolute`"
    );
  });

  it("rejects unknown keys and names the source", () => {
    expect(() => parseConfig({ report: {} }, "/tmp/txreport.config.json")).toThrow(
      /^Invalid configuration in \/tmp\/txreport\.config\.json: /
    );
  });

  it("interpolates environment variables", () => {
    process.env.TXREPORT_TEST_DIR = "/data/reports";

    expect(parseConfig({ reports: { dir: "${env.TXREPORT_TEST_DIR}" } }).reports.dir).toBe("/data/reports");
    expect(interpolateEnvVars(["x-${env.TXREPORT_MISSING_VAR}", 3])).toEqual(["x-", 3]);
  });
});

describe("loadConfig", () => {
  it("reads txreport.config.json", async () => {
    const dir = await makeTempDir({
      "txreport.config.json": { reports: { dir: "runs", recursive: false } },
    });
    dirs.push(dir);

    const config = await loadConfig(dir);

    expect(config.reports).toEqual({ dir: "runs", pattern: "*-report-*.json", recursive: false });
  });

  it("falls back to defaults without a config file", async () => {
    const dir = await makeTempDir();
    dirs.push(dir);

    const config = await loadConfig(dir);

    expect(config.reports.dir).toBe("reports");
    expect(config.compare.match).toBe("name");
  });

  it("reports invalid files as ConfigError", async () => {
    const dir = await makeTempDir({ ".txreportrc.json": { compare: { limit: 0 } } });
    dirs.push(dir);

    await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("parseThresholdArgs", () => {
  it("parses metric=value pairs", () => {
    expect(parseThresholdArgs(["latency.p90=0.1", "drop_rate=0.05"])).toEqual({
      "latency.p90": 0.1,
      drop_rate: 0.05,
    });
  });

  it("rejects malformed values", () => {
    expect(() => parseThresholdArgs(["oops"])).toThrow(
      'Invalid --threshold "oops": expected <metric>=<non-negative number>'
    );
    expect(() => parseThresholdArgs(["latency=-1"])).toThrow(ConfigError);
    expect(() => parseThresholdArgs(["=0.1"])).toThrow(ConfigError);
  });
});

describe("wantsJson", () => {
  it("recognises every way of asking for JSON", () => {
    expect(wantsJson(["node", "txreport", "list", "--json"])).toBe(true);
    expect(wantsJson(["node", "txreport", "compare", "base", "--format", "json"])).toBe(true);
    expect(wantsJson(["node", "txreport", "compare", "base", "--format=json"])).toBe(true);
  });

  it("stays off for other formats", () => {
    expect(wantsJson(["node", "txreport", "compare", "base", "--format=html"])).toBe(false);
    expect(wantsJson(["node", "txreport", "compare", "base", "--format", "terminal"])).toBe(false);
    expect(wantsJson(["node", "txreport", "list"])).toBe(false);
  });
});
