/**
 * ========================================================================== *
 *  File        : update.ts                                                   *
 *  Purpose     : Fill allergen flags and tidy EN/DE/RU names in the menu.    *
 *                                                                            *
 *  Usage       : tsx update.ts [source_file] [export_file] [--dry-run]       *
 *                                                                            *
 *  Workflow    : 1) Load menu.csv (BOM stripped, header kept)                *
 *                2) transformRow(): gluten/milk/egg/fish from Turkish name   *
 *                3) improveEnglish/German/Russian() on columns 2–4           *
 *                4) Save via temp file + rename & log summary                *
 *                                                                            *
 *  Source file : ../dataset/menu.csv                                         *
 *  Export file : Same as source unless given (overwrite in place)           *
 *  Simple rules: rows with < 9 fields and failing rows pass through as-is    *
 * ========================================================================== *
 */

import path from "node:path";
import { FileError, logSummary, processCsv } from "./pipeline";
import { parseArgs } from "./utils/args";

/* ---------- CLI ---------- */
const DEFAULT_SRC = path.join(__dirname, "../dataset/menu.csv");

function main() {
  const { source, dest, dryRun } = parseArgs(
    process.argv.slice(2),
    DEFAULT_SRC
  );

  console.log(`🔍  Updating ${source} …`);
  const stats = processCsv(source, dest, { dryRun });
  logSummary(stats);

  if (dryRun) console.log("ℹ️  Dry run, nothing written");
  else console.log(`✅  Saved to ${dest}`);
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error(err instanceof FileError ? `❌  ${err.message}` : err);
    process.exit(1);
  }
}
