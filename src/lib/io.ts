// src/lib/io.ts
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import type { Dataset } from "./types";
import type { ReportTable } from "./report";
import { tableToDataset, type TableOptions } from "./dataset";
import { RawPathNotFoundError } from "./errors";

export type LoadedCsv = {
  dataset: Dataset;
  updatedAt: Date;
  warnings: string[];
};

type RawRow = Record<string, string | undefined>;

export async function discoverCsvFiles(rawPath: string): Promise<string[]> {
  const info = await stat(rawPath).catch(() => null);
  if (!info?.isDirectory()) throw new RawPathNotFoundError(rawPath);

  const entries = await readdir(rawPath, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".csv"))
    .map((e) => path.join(rawPath, e.name))
    .sort();
}

export function tableNameOf(filePath: string) {
  return path.basename(filePath, path.extname(filePath));
}

export function parseCsvText(name: string, text: string, options: TableOptions = {}) {
  const res = Papa.parse<RawRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });
  const fields = res.meta.fields ?? [];
  const warnings = res.errors.map((e) => (e.row === undefined ? e.message : `row ${e.row}: ${e.message}`));
  return { dataset: tableToDataset(name, fields, res.data, options), warnings };
}

export async function loadCsvDataset(filePath: string, options: TableOptions = {}): Promise<LoadedCsv> {
  const [text, info] = await Promise.all([readFile(filePath, "utf8"), stat(filePath)]);
  // strip a UTF-8 BOM so it doesn't end up in the first header
  const { dataset, warnings } = parseCsvText(tableNameOf(filePath), text.replace(/^\uFEFF/, ""), options);
  return { dataset, updatedAt: info.mtime, warnings };
}

export async function writeCsvTable(dir: string, fileName: string, table: ReportTable): Promise<string> {
  await mkdir(dir, { recursive: true });
  const out = path.join(dir, fileName);
  const csv = Papa.unparse(
    { fields: [...table.columns], data: table.rows.map((r) => table.columns.map((c) => r[c] ?? "")) },
    { newline: "\n" },
  );
  await writeFile(out, `${csv}\n`, "utf8");
  return out;
}
