// src/run.ts
import type { EdaConfig } from "./lib/config";
import { EmptyDatasetError } from "./lib/errors";
import { generateFindings } from "./lib/insights";
import { discoverCsvFiles, loadCsvDataset, writeCsvTable } from "./lib/io";
import { profileDataset } from "./lib/profiler";
import { buildReports, type ProfiledTable } from "./lib/report";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type EdaRunResult = {
  tables: ProfiledTable[];
  failures: { file: string; error: Error }[];
  outputs: string[];
};

/**
 * Profile every CSV under `config.rawPath` and write the report tables to
 * `config.processedPath`. A file with no columns is skipped and recorded in
 * `failures`; any other error aborts the run.
 */
export async function runEda(config: EdaConfig, log: Logger = console): Promise<EdaRunResult> {
  const files = await discoverCsvFiles(config.rawPath);
  log.log(`[eda] found ${files.length} CSV file(s) in ${config.rawPath}`);

  const tables: ProfiledTable[] = [];
  const failures: EdaRunResult["failures"] = [];

  for (const file of files) {
    const { dataset, updatedAt, warnings } = await loadCsvDataset(file, { minNumericRatio: config.minNumericRatio });
    for (const w of warnings) log.warn(`[eda] ${dataset.name}: ${w}`);

    try {
      const profile = profileDataset(dataset, { multiplier: config.outlierMultiplier });
      const findings = generateFindings(profile);
      tables.push({ dataset, profile, findings, updatedAt });
      log.log(`[eda] ${dataset.name}: ${findings.narrative}`);
    } catch (e) {
      if (!(e instanceof EmptyDatasetError)) throw e;
      log.error(`[eda] skipping ${file}: ${e.message}`);
      failures.push({ file, error: e });
    }
  }

  const reports = buildReports(tables, config);
  const outputs = [
    await writeCsvTable(config.processedPath, config.outputFiles.tableStats, reports.tableStats),
    await writeCsvTable(config.processedPath, config.outputFiles.summary, reports.summary),
    await writeCsvTable(config.processedPath, config.outputFiles.outliers, reports.outliers),
    await writeCsvTable(config.processedPath, config.outputFiles.findings, reports.findings),
  ];
  for (const out of outputs) log.log(`[eda] wrote ${out}`);

  return { tables, failures, outputs };
}
