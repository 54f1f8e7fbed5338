import { ALLERGENS } from "./components/allergens";
import { processTable } from "./components/transform";
import { loadTable, saveTable } from "./utils/csv";
import type { ProcessOptions, RunStats } from "./types";

export { FileError, RowError } from "./errors";
export type { ProcessOptions, RunStats } from "./types";

/**
 * Load `input`, fix allergen flags and translations, write the result to
 * `output` (which may be the same path). Nothing is written on a dry run.
 */
export function processCsv(
  input: string,
  output: string,
  { dryRun = false }: ProcessOptions = {}
): RunStats {
  const table = loadTable(input);
  const { rows, stats } = processTable(table);
  if (!dryRun) saveTable(output, rows);
  return stats;
}

export function logSummary(stats: RunStats): void {
  console.log(`Processed ${stats.processed} rows`);
  console.log(`Updated allergen data for ${stats.allergensUpdated} items`);
  console.log(`Improved translations for ${stats.translationsImproved} items`);

  console.log("🏷️  Allergen tally");
  ALLERGENS.forEach((a) => console.log(`  • ${a}: ${stats.flagged[a]} items`));
  if (stats.skipped) console.warn(`Skipped ${stats.skipped} short rows`);
  if (stats.failed) console.warn(`Failed ${stats.failed} rows (kept as-is)`);
}
