// src/lib/stats.ts
import type { Stat } from "./types";

/** ======================= Stat values ======================= */

export const UNDEFINED: Stat = Object.freeze({ kind: "undefined" });

export function value(n: number): Stat {
  return { kind: "value", value: n };
}

export function statValue(s: Stat): number | null {
  return s.kind === "value" ? s.value : null;
}

/** ======================= Basic Stats ======================= */

export function sortAsc(nums: readonly number[]): number[] {
  return [...nums].sort((a, b) => a - b);
}

/**
 * Quantile of an ascending, non-empty array, interpolating linearly between
 * the order statistics around position (n - 1) * q.
 */
export function quantile(sortedNums: readonly number[], q: number): number {
  if (sortedNums.length === 0) throw new RangeError("quantile of an empty sample");
  const pos = (sortedNums.length - 1) * Math.min(1, Math.max(0, q));
  const base = Math.floor(pos);
  const rest = pos - base;
  const lo = sortedNums[base];
  const hi = sortedNums[base + 1];
  if (hi !== undefined) return lo + rest * (hi - lo);
  return lo;
}

export function median(sortedNums: readonly number[]): number { return quantile(sortedNums, 0.5); }

export function mean(nums: readonly number[]): number {
  if (nums.length === 0) throw new RangeError("mean of an empty sample");
  return nums.reduce((a, x) => a + x, 0) / nums.length;
}

/** Sample standard deviation (N - 1 denominator); undefined below two values. */
export function sampleStdev(nums: readonly number[]): Stat {
  if (nums.length < 2) return UNDEFINED;
  const m = mean(nums);
  const v = nums.reduce((a, x) => a + (x - m) ** 2, 0) / (nums.length - 1);
  return value(Math.sqrt(v));
}

export function variationCoefficient(stdev: Stat, m: Stat): Stat {
  if (stdev.kind === "undefined" || m.kind === "undefined" || m.value === 0) return UNDEFINED;
  return value(stdev.value / m.value);
}

export function isInteger(n: number) { return Number.isFinite(n) && Math.floor(n) === n; }
