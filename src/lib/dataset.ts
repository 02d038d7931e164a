// src/lib/dataset.ts
import type { Column, Dataset } from "./types";
import { InvalidDatasetError } from "./errors";

/** ======================= Type Coercion & Detection ======================= */

const NA_VALUES = new Set([
  "", "NA", "N/A", "n/a", "NaN", "nan", "-NaN", "null", "NULL", "None", "#N/A", "<NA>",
]);

const NUMERIC_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const GROUPED_RE = /^[-+]?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/; // 1,234.5

export function isMissing(raw: string | null | undefined): boolean {
  return raw === null || raw === undefined || NA_VALUES.has(raw.trim());
}

export function parseNumber(raw: string): number | null {
  const s = raw.trim();
  let n: number;
  if (NUMERIC_RE.test(s)) n = Number(s);
  else if (GROUPED_RE.test(s)) n = Number(s.replace(/,/g, ""));
  else return null;
  return Number.isFinite(n) ? n : null;
}

/**
 * Decide a column's kind from its raw cells. The column is numeric when at
 * least `minNumericRatio` of its non-missing cells parse as numbers; cells
 * that don't parse then become missing. A column with no values at all is
 * numeric.
 */
export function inferColumn(
  name: string,
  cells: readonly (string | null | undefined)[],
  minNumericRatio = 1,
): Column {
  let present = 0, numeric = 0;
  const parsed = cells.map((c) => {
    if (c === null || c === undefined || isMissing(c)) return null;
    present++;
    const n = parseNumber(c);
    if (n !== null) numeric++;
    return n;
  });

  if (present === 0 || numeric / present >= minNumericRatio) {
    return { name, kind: "numeric", values: parsed };
  }
  return {
    name,
    kind: "text",
    values: cells.map((c) => (c === null || c === undefined || isMissing(c) ? null : c)),
  };
}

/** ======================= Construction ======================= */

export function createDataset(name: string, columns: readonly Column[]): Dataset {
  const seen = new Set<string>();
  for (const c of columns) {
    if (seen.has(c.name)) throw new InvalidDatasetError(name, `duplicate column "${c.name}"`);
    seen.add(c.name);
  }
  const length = columns[0]?.values.length ?? 0;
  const ragged = columns.find((c) => c.values.length !== length);
  if (ragged) {
    throw new InvalidDatasetError(
      name,
      `column "${ragged.name}" has ${ragged.values.length} values, expected ${length}`,
    );
  }
  return Object.freeze({ name, columns: Object.freeze([...columns]) });
}

export type TableOptions = { minNumericRatio?: number };

/** Build a typed Dataset from header fields and row records (as a CSV parser yields them). */
export function tableToDataset(
  name: string,
  fields: readonly string[],
  rows: readonly Record<string, string | null | undefined>[],
  options: TableOptions = {},
): Dataset {
  const columns = fields.map((f) => inferColumn(f, rows.map((r) => r[f]), options.minNumericRatio));
  return createDataset(name, columns);
}

export function rowCount(dataset: Dataset): number {
  return dataset.columns[0]?.values.length ?? 0;
}
