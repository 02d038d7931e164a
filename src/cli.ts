// src/cli.ts
import dotenv from "dotenv";
import { loadConfig } from "./lib/config";
import { runEda } from "./run";

dotenv.config();

// usage: npm run eda -- [rawPath] [processedPath]
const [rawArg, processedArg] = process.argv.slice(2);

(async () => {
  const config = loadConfig();
  if (rawArg) config.rawPath = rawArg;
  if (processedArg) config.processedPath = processedArg;

  const { tables, failures } = await runEda(config);
  console.log(`[eda] done: ${tables.length} table(s) profiled, ${failures.length} skipped`);
  if (failures.length) process.exitCode = 2;
})().catch((e) => {
  console.error("[eda]", e instanceof Error ? e.message : e);
  process.exit(1);
});
