import { compileWildcard, hasWildcard } from "../pattern.js";

export type ThresholdDirection = "increase" | "decrease" | "either";

export interface ThresholdRule {
  /** Largest tolerated |delta / baseline|. */
  relative?: number;
  /** Largest tolerated |delta|, in the metric's own unit. */
  absolute?: number;
  direction?: ThresholdDirection;
}

/** A bare number is a relative limit in either direction. */
export type Threshold = number | ThresholdRule;

/** Keys are metric names or wildcard patterns such as `*.p90`. */
export type ThresholdMap = Readonly<Record<string, Threshold>>;

export function normalizeThreshold(threshold: Threshold): ThresholdRule {
  return typeof threshold === "number" ? { relative: threshold, direction: "either" } : threshold;
}

/**
 * Find the rule for `metric`: an exact key wins, otherwise the first
 * matching pattern in declaration order.
 */
export function resolveThreshold(
  thresholds: ThresholdMap | undefined,
  metric: string
): ThresholdRule | undefined {
  if (!thresholds) return undefined;
  if (Object.hasOwn(thresholds, metric)) {
    const exact = thresholds[metric];
    return exact === undefined ? undefined : normalizeThreshold(exact);
  }
  for (const [pattern, threshold] of Object.entries(thresholds)) {
    if (hasWildcard(pattern) && compileWildcard(pattern).test(metric)) {
      return normalizeThreshold(threshold);
    }
  }
  return undefined;
}

/**
 * Limits are strict: a change exactly at the limit is not flagged. With a
 * zero baseline the relative change is undefined and any non-zero
 * candidate counts as exceeding a relative limit.
 */
export function exceedsThreshold(
  rule: ThresholdRule | undefined,
  baseline: number,
  candidate: number
): boolean {
  if (!rule) return false;

  const delta = candidate - baseline;
  const direction = rule.direction ?? "either";
  if (direction === "increase" && !(delta > 0)) return false;
  if (direction === "decrease" && !(delta < 0)) return false;

  if (rule.relative !== undefined) {
    if (baseline === 0) {
      if (candidate !== 0) return true;
    } else if (Math.abs(delta / baseline) > rule.relative) {
      return true;
    }
  }

  if (rule.absolute !== undefined && Math.abs(delta) > rule.absolute) {
    return true;
  }

  return false;
}
