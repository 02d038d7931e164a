// src/lib/report.ts
import type { Column, Dataset, DatasetProfile, Findings, Stat } from "./types";
import { isInteger } from "./stats";

export type ProfiledTable = {
  dataset: Dataset;
  profile: DatasetProfile;
  findings: Findings;
  updatedAt: Date;
};

export type Cell = string | number;
export type ReportRow = Record<string, Cell>;
export type ReportTable = { columns: readonly string[]; rows: ReportRow[] };

export type ReportOptions = {
  excludeIdColumns: boolean;
  commonNumericOnly: boolean;
  decimals: number;
};

export const TABLE_STATS_COLUMNS = [
  "Table Name", "Unique Column(s)", "Column Count", "Row count",
  "Unique rows count", "Duplicate rows count", "Null count", "Date updated",
] as const;

export const SUMMARY_COLUMNS = [
  "Table Name", "Numeric Column(s)", "Count", "Null count", "Minimum", "Maximum", "Median",
  "Average", "Standard deviation", "Variation Coefficient", "Date updated",
] as const;

export const OUTLIER_COLUMNS = [
  "Table Name", "Numeric Column", "Q1", "Q3", "IQR", "Lower bound", "Upper bound",
  "Outlier rows", "list of outliers", "Date updated",
] as const;

export const FINDINGS_COLUMNS = ["Table Name", "Finding"] as const;

export const NO_OUTLIERS = "No Outliers";
export const UNDEFINED_CELL = "undefined";

/** ======================= Formatting ======================= */

/** UTC timestamp without milliseconds, e.g. 2026-01-08T12:34:56Z */
export function formatTimestamp(d: Date) {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function round(n: number, decimals: number) {
  return +n.toFixed(decimals);
}

export function formatStat(s: Stat, decimals: number): Cell {
  return s.kind === "value" ? round(s.value, decimals) : UNDEFINED_CELL;
}

/** ======================= ID-like columns ======================= */

const ID_NAME_KEYWORDS = new Set(["id", "key", "identifier", "uuid", "guid"]);

function nameTokens(name: string) {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

/**
 * A numeric identifier column: its name has an id-like token (user_id, orderKey, ID)
 * and its values are mostly distinct integers.
 */
export function isIdLikeColumn(column: Column): boolean {
  if (column.kind !== "numeric") return false;
  if (!nameTokens(column.name).some((t) => ID_NAME_KEYWORDS.has(t))) return false;

  const nums = column.values.filter((v): v is number => v !== null);
  if (nums.length < 3) return false;
  const intish = nums.filter(isInteger).length / nums.length;
  if (intish < 0.95) return false;
  return new Set(nums).size / nums.length >= 0.9;
}

/** Numeric columns of each table that go into the summary and outlier reports. */
export function reportedColumns(tables: readonly ProfiledTable[], options: ReportOptions): Map<ProfiledTable, Set<string>> {
  const perTable = new Map<ProfiledTable, Set<string>>();
  for (const t of tables) {
    const cols = t.dataset.columns
      .filter((c) => c.kind === "numeric")
      .filter((c) => !(options.excludeIdColumns && isIdLikeColumn(c)))
      .map((c) => c.name);
    perTable.set(t, new Set(cols));
  }
  if (options.commonNumericOnly && tables.length > 0) {
    const numericSets = tables.map(
      (t) => new Set(t.dataset.columns.filter((c) => c.kind === "numeric").map((c) => c.name)),
    );
    for (const cols of perTable.values()) {
      for (const c of [...cols]) if (!numericSets.every((s) => s.has(c))) cols.delete(c);
    }
  }
  return perTable;
}

/** ======================= Tables ======================= */

export function buildTableStats(tables: readonly ProfiledTable[]): ReportTable {
  const rows = tables.map(({ profile, updatedAt }): ReportRow => ({
    "Table Name": profile.name,
    "Unique Column(s)": profile.uniqueColumns.length ? profile.uniqueColumns.join(", ") : "None",
    "Column Count": profile.columnCount,
    "Row count": profile.rowCount,
    "Unique rows count": profile.duplicates.uniqueCount,
    "Duplicate rows count": profile.duplicates.duplicateCount,
    "Null count": profile.totalNulls,
    "Date updated": formatTimestamp(updatedAt),
  }));
  return { columns: TABLE_STATS_COLUMNS, rows };
}

export function buildSummaryTable(tables: readonly ProfiledTable[], options: ReportOptions): ReportTable {
  const reported = reportedColumns(tables, options);
  const d = options.decimals;
  const rows: ReportRow[] = [];
  for (const t of tables) {
    const cols = reported.get(t);
    for (const s of Object.values(t.profile.summaries)) {
      if (!s.numeric || !cols?.has(s.name)) continue;
      rows.push({
        "Table Name": t.profile.name,
        "Numeric Column(s)": s.name,
        "Count": s.count,
        "Null count": s.nullCount,
        "Minimum": formatStat(s.numeric.min, d),
        "Maximum": formatStat(s.numeric.max, d),
        "Median": formatStat(s.numeric.median, d),
        "Average": formatStat(s.numeric.mean, d),
        "Standard deviation": formatStat(s.numeric.stdev, d),
        "Variation Coefficient": formatStat(s.numeric.cv, d),
        "Date updated": formatTimestamp(t.updatedAt),
      });
    }
  }
  return { columns: SUMMARY_COLUMNS, rows };
}

export function formatOutlierValues(values: readonly number[], decimals: number) {
  if (values.length === 0) return NO_OUTLIERS;
  return Array.from(new Set(values.map((v) => round(v, decimals))))
    .sort((a, b) => a - b)
    .join("; ");
}

export function buildOutlierTable(tables: readonly ProfiledTable[], options: ReportOptions): ReportTable {
  const reported = reportedColumns(tables, options);
  const d = options.decimals;
  const cell = (n: number | undefined): Cell => (n === undefined ? UNDEFINED_CELL : round(n, d));
  const rows: ReportRow[] = [];
  for (const t of tables) {
    const cols = reported.get(t);
    for (const o of t.profile.outliers) {
      if (!cols?.has(o.column)) continue;
      rows.push({
        "Table Name": t.profile.name,
        "Numeric Column": o.column,
        "Q1": cell(o.bounds?.q1),
        "Q3": cell(o.bounds?.q3),
        "IQR": cell(o.bounds?.iqr),
        "Lower bound": cell(o.bounds?.lower),
        "Upper bound": cell(o.bounds?.upper),
        "Outlier rows": o.rowIndices.join("; "),
        "list of outliers": formatOutlierValues(o.values, d),
        "Date updated": formatTimestamp(t.updatedAt),
      });
    }
  }
  return { columns: OUTLIER_COLUMNS, rows };
}

export function buildFindingsTable(tables: readonly ProfiledTable[]): ReportTable {
  const rows = tables.flatMap(({ profile, findings }) =>
    [findings.narrative, ...findings.bullets].map((f): ReportRow => ({ "Table Name": profile.name, "Finding": f })),
  );
  return { columns: FINDINGS_COLUMNS, rows };
}

export function buildReports(tables: readonly ProfiledTable[], options: ReportOptions) {
  return {
    tableStats: buildTableStats(tables),
    summary: buildSummaryTable(tables, options),
    outliers: buildOutlierTable(tables, options),
    findings: buildFindingsTable(tables),
  };
}
