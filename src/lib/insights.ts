// src/lib/insights.ts
import type { DatasetProfile, Findings } from "./types";

export const MISSING_PCT_THRESHOLD = 10;

export function missingPct(nullCount: number, rowCount: number) {
  return Math.round((nullCount / Math.max(1, rowCount)) * 100);
}

export function generateFindings(profile: DatasetProfile): Findings {
  const bullets: string[] = [];
  const summaries = Object.values(profile.summaries);

  for (const col of summaries) {
    const pct = missingPct(col.nullCount, profile.rowCount);
    if (pct >= MISSING_PCT_THRESHOLD) bullets.push(`"${col.name}" has ~${pct}% missing values.`);
    if (col.count > 0 && col.distinct === 1) bullets.push(`"${col.name}" is constant (single distinct value).`);
    if (col.numeric && col.count > 0 && col.numeric.stdev.kind === "undefined") {
      bullets.push(`"${col.name}" has too few values for a standard deviation.`);
    }
  }

  for (const o of profile.outliers) {
    if (o.rowIndices.length) bullets.push(`"${o.column}" has ${o.rowIndices.length} IQR outlier(s).`);
  }

  const dup = profile.duplicates.duplicateCount;
  if (dup > 0) bullets.push(`Detected ${dup} duplicate row(s).`);
  if (profile.uniqueColumns.length) {
    bullets.push(`Candidate key column(s): ${profile.uniqueColumns.map((c) => `"${c}"`).join(", ")}.`);
  }

  const unique = Array.from(new Set(bullets));
  return { bullets: unique, narrative: buildNarrative(profile, unique.length) };
}

function buildNarrative(profile: DatasetProfile, bulletCount: number) {
  const summaries = Object.values(profile.summaries);
  const numeric = summaries.filter((c) => c.kind === "numeric").length;
  const missingCols = summaries.filter((c) => missingPct(c.nullCount, profile.rowCount) >= MISSING_PCT_THRESHOLD).length;
  const outlierCols = profile.outliers.filter((o) => o.rowIndices.length > 0).length;
  let s = `Dataset summary: ${profile.rowCount} row(s), ${profile.columnCount} column(s) (${numeric} numeric).`;
  if (missingCols > 0) s += ` ${missingCols} column(s) with notable missing values.`;
  if (outlierCols > 0) s += ` Outliers present in ${outlierCols} numeric column(s).`;
  if (bulletCount > 0) s += ` Key findings listed below.`;
  return s;
}
