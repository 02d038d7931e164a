// src/lib/profiler.ts
import type {
  Column, ColumnSummary, Dataset, DatasetProfile, DuplicateReport,
  NumericColumn, NumericSummary, OutlierOptions, OutlierReport,
} from "./types";
import { ColumnNotFoundError, EmptyDatasetError } from "./errors";
import {
  UNDEFINED, mean, median, quantile, sampleStdev, sortAsc, value, variationCoefficient,
} from "./stats";
import { rowCount as rowsOf } from "./dataset";

export const DEFAULT_IQR_MULTIPLIER = 1.5;

function assertHasColumns(dataset: Dataset) {
  if (dataset.columns.length === 0) throw new EmptyDatasetError(dataset.name);
}

function nonNull(column: NumericColumn): number[] {
  const out: number[] = [];
  for (const v of column.values) if (v !== null) out.push(v);
  return out;
}

function nullsIn(column: Column) {
  let n = 0;
  for (const v of column.values) if (v === null) n++;
  return n;
}

function distinctIn(column: Column) {
  return new Set<number | string>(
    column.kind === "numeric" ? nonNull(column) : column.values.filter((v): v is string => v !== null),
  ).size;
}

/** ======================= Counts ======================= */

export function countRowsColumns(dataset: Dataset) {
  assertHasColumns(dataset);
  return { rowCount: rowsOf(dataset), columnCount: dataset.columns.length };
}

export function countNulls(dataset: Dataset): Record<string, number> {
  assertHasColumns(dataset);
  return Object.fromEntries(dataset.columns.map((c) => [c.name, nullsIn(c)]));
}

// Tagging each cell keeps the number 1 apart from the text "1".
function rowKey(dataset: Dataset, i: number) {
  return JSON.stringify(dataset.columns.map((c) => (c.kind === "numeric" ? c.values[i] : [c.values[i]])));
}

export function countDuplicates(dataset: Dataset): DuplicateReport {
  assertHasColumns(dataset);
  const n = rowsOf(dataset);
  const firstSeen = new Map<string, number>();
  const duplicates: DuplicateReport["duplicates"] = [];
  for (let i = 0; i < n; i++) {
    const key = rowKey(dataset, i);
    const original = firstSeen.get(key);
    if (original === undefined) firstSeen.set(key, i);
    else duplicates.push({ row: i, original });
  }
  return {
    rowCount: n,
    uniqueCount: firstSeen.size,
    duplicateCount: duplicates.length,
    duplicates,
  };
}

/** Single columns that identify every row: no nulls, all values distinct. */
export function uniqueColumns(dataset: Dataset): string[] {
  assertHasColumns(dataset);
  const n = rowsOf(dataset);
  if (n === 0) return [];
  return dataset.columns
    .filter((c) => nullsIn(c) === 0 && distinctIn(c) === n)
    .map((c) => c.name);
}

/** ======================= Summary statistics ======================= */

function numericSummary(column: NumericColumn): NumericSummary {
  const nums = nonNull(column);
  if (nums.length === 0) {
    return { min: UNDEFINED, max: UNDEFINED, median: UNDEFINED, mean: UNDEFINED, stdev: UNDEFINED, cv: UNDEFINED };
  }
  const sorted = sortAsc(nums);
  const m = value(mean(nums));
  const sd = sampleStdev(nums);
  return {
    min: value(sorted[0]),
    max: value(sorted[sorted.length - 1]),
    median: value(median(sorted)),
    mean: m,
    stdev: sd,
    cv: variationCoefficient(sd, m),
  };
}

export function summarizeColumn(column: Column): ColumnSummary {
  const nullCount = nullsIn(column);
  return {
    name: column.name,
    kind: column.kind,
    count: column.values.length - nullCount,
    nullCount,
    distinct: distinctIn(column),
    numeric: column.kind === "numeric" ? numericSummary(column) : null,
  };
}

export function summaryStatistics(dataset: Dataset): Record<string, ColumnSummary> {
  assertHasColumns(dataset);
  return Object.fromEntries(dataset.columns.map((c) => [c.name, summarizeColumn(c)]));
}

/** ======================= Outliers (IQR rule) ======================= */

function outliersIn(column: NumericColumn, multiplier: number): OutlierReport {
  const nums = nonNull(column);
  if (nums.length === 0) return { column: column.name, bounds: null, rowIndices: [], values: [] };

  const sorted = sortAsc(nums);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const bounds = { q1, q3, iqr, lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr, multiplier };

  const rowIndices: number[] = [];
  const values: number[] = [];
  // zero-width bounds on a constant column flag nothing
  if (iqr > 0) {
    column.values.forEach((v, i) => {
      if (v !== null && (v < bounds.lower || v > bounds.upper)) {
        rowIndices.push(i);
        values.push(v);
      }
    });
  }
  return { column: column.name, bounds, rowIndices, values };
}

/**
 * Flag values outside [Q1 - k·IQR, Q3 + k·IQR] in one column.
 * Returns null for a text column, which has no outlier report.
 */
export function detectOutliers(
  dataset: Dataset,
  column: string,
  options: OutlierOptions = {},
): OutlierReport | null {
  assertHasColumns(dataset);
  const col = dataset.columns.find((c) => c.name === column);
  if (!col) throw new ColumnNotFoundError(dataset.name, column);
  if (col.kind !== "numeric") return null;
  return outliersIn(col, options.multiplier ?? DEFAULT_IQR_MULTIPLIER);
}

export function detectAllOutliers(dataset: Dataset, options: OutlierOptions = {}): OutlierReport[] {
  assertHasColumns(dataset);
  const k = options.multiplier ?? DEFAULT_IQR_MULTIPLIER;
  return dataset.columns
    .filter((c): c is NumericColumn => c.kind === "numeric")
    .map((c) => outliersIn(c, k));
}

/** ======================= Full profile ======================= */

export function profileDataset(dataset: Dataset, options: OutlierOptions = {}): DatasetProfile {
  const { rowCount, columnCount } = countRowsColumns(dataset);
  const nullCounts = countNulls(dataset);
  return {
    name: dataset.name,
    rowCount,
    columnCount,
    nullCounts,
    totalNulls: Object.values(nullCounts).reduce((a, n) => a + n, 0),
    duplicates: countDuplicates(dataset),
    uniqueColumns: uniqueColumns(dataset),
    summaries: summaryStatistics(dataset),
    outliers: detectAllOutliers(dataset, options),
  };
}
