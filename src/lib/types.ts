// src/lib/types.ts

/** ======================= Input ======================= */

export type ColumnKind = "numeric" | "text";

// `null` is the missing-marker in both variants.
export type NumericColumn = { name: string; kind: "numeric"; values: readonly (number | null)[] };
export type TextColumn = { name: string; kind: "text"; values: readonly (string | null)[] };
export type Column = NumericColumn | TextColumn;

export type Dataset = { readonly name: string; readonly columns: readonly Column[] };

/** ======================= Results ======================= */

/** A statistic that may have no value for the sample, e.g. stdev of a single value. */
export type Stat = { kind: "value"; value: number } | { kind: "undefined" };

export type NumericSummary = {
  min: Stat; max: Stat; median: Stat; mean: Stat;
  stdev: Stat; cv: Stat;
};

export type ColumnSummary = {
  name: string;
  kind: ColumnKind;
  count: number;
  nullCount: number;
  distinct: number;
  // null for text columns: min/max/median/stdev are not applicable there
  numeric: NumericSummary | null;
};

export type DuplicateReport = {
  rowCount: number;
  uniqueCount: number;
  duplicateCount: number;
  duplicates: { row: number; original: number }[];
};

export type OutlierBounds = {
  q1: number; q3: number; iqr: number;
  lower: number; upper: number; multiplier: number;
};

export type OutlierReport = {
  column: string;
  bounds: OutlierBounds | null;
  rowIndices: number[];
  values: number[];
};

export type OutlierOptions = { multiplier?: number };

export type DatasetProfile = {
  name: string;
  rowCount: number;
  columnCount: number;
  nullCounts: Record<string, number>;
  totalNulls: number;
  duplicates: DuplicateReport;
  uniqueColumns: string[];
  summaries: Record<string, ColumnSummary>;
  outliers: OutlierReport[];
};

export type Findings = { bullets: string[]; narrative: string };
