import { ALLERGENS, classifyAllergens } from "./allergens";
import { improveEnglish, improveGerman, improveRussian } from "./translations";
import { RowError } from "../errors";
import type { Row, RowResult, RunStats, Table } from "../types";

/* ---------- Const ---------- */
export const MIN_FIELDS = 9;

export const emptyStats = (): RunStats => ({
  total: 0,
  processed: 0,
  allergensUpdated: 0,
  translationsImproved: 0,
  skipped: 0,
  failed: 0,
  flagged: { gluten: 0, milk: 0, egg: 0, fish: 0 },
});

/**
 * Recompute allergen flags and tidy the EN/DE/RU names of one data row.
 * Never throws: a failure yields the untouched row plus a RowError.
 */
export function transformRow(row: Row, index: number): RowResult {
  try {
    const [id, tr, en, de, ru, ...rest] = row;
    if (typeof tr !== "string") throw new TypeError("Turkish name is not text");

    const flags = classifyAllergens(tr);
    const newEn = improveEnglish(en);
    const newDe = improveGerman(de);
    const newRu = improveRussian(ru);

    const oldFlags = rest.slice(0, ALLERGENS.length);
    const allergensChanged = ALLERGENS.some((a, i) => flags[a] !== oldFlags[i]);
    const translationsChanged = newEn !== en || newDe !== de || newRu !== ru;

    // Anything past the fish column is carried along untouched
    const extra = rest.slice(ALLERGENS.length);

    return {
      ok: true,
      row: [id, tr, newEn, newDe, newRu, ...ALLERGENS.map((a) => flags[a]), ...extra],
      flags,
      allergensChanged,
      translationsChanged,
    };
  } catch (err) {
    return { ok: false, row, error: new RowError(index, row, err) };
  }
}

/**
 * Run every data row through transformRow. The header and rows shorter than
 * MIN_FIELDS pass through; failed rows are reported to stderr and kept as-is.
 */
export function processTable(table: Table): { rows: Table; stats: RunStats } {
  const stats = emptyStats();
  const rows: Table = [];

  table.forEach((row, i) => {
    if (i === 0) {
      rows.push(row);
      return;
    }
    stats.total++;

    if (row.length < MIN_FIELDS) {
      stats.skipped++;
      rows.push(row);
      return;
    }

    const res = transformRow(row, i);
    if (!res.ok) {
      stats.failed++;
      console.error(`❌  ${res.error.message}`);
      console.error(`    Row: ${JSON.stringify(res.row)}`);
      rows.push(res.row);
      return;
    }

    stats.processed++;
    if (res.allergensChanged) stats.allergensUpdated++;
    if (res.translationsChanged) stats.translationsImproved++;
    for (const a of ALLERGENS) if (res.flags[a] === "1") stats.flagged[a]++;
    rows.push(res.row);
  });

  return { rows, stats };
}
