import type { ALLERGENS } from "./components/allergens";
import type { RowError } from "./errors";

/* -------- types --------*/
export type Allergen = (typeof ALLERGENS)[number];

export type Flag = "0" | "1";

export type AllergenFlags = Record<Allergen, Flag>;

/** One CSV record, fields in file order */
export type Row = string[];

export type Table = Row[];

export type RowResult =
  | {
      ok: true;
      row: Row;
      flags: AllergenFlags;
      allergensChanged: boolean;
      translationsChanged: boolean;
    }
  | { ok: false; row: Row; error: RowError };

/* -------- interface --------*/
export interface RunStats {
  /** data rows seen (header excluded) */
  total: number;
  processed: number;
  allergensUpdated: number;
  translationsImproved: number;
  /** rows shorter than MIN_FIELDS */
  skipped: number;
  failed: number;
  flagged: Record<Allergen, number>;
}

export interface ProcessOptions {
  dryRun?: boolean;
}
