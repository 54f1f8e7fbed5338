import fs from "node:fs";
import path from "node:path";
import dayjs from "dayjs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { FileError } from "../errors";
import type { Table } from "../types";

const isTable = (v: unknown): v is Table =>
  Array.isArray(v) &&
  v.every((r) => Array.isArray(r) && r.every((f) => typeof f === "string"));

/** Load CSV → array of string rows, header included, BOM stripped */
export function loadTable(file: string): Table {
  let records: unknown;
  try {
    records = parse(fs.readFileSync(file), {
      bom: true,
      encoding: "utf8",
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (err) {
    throw new FileError("read", file, err);
  }
  if (!isTable(records)) {
    throw new FileError("read", file, "parser returned non-text records");
  }
  return records;
}

/** Temp file beside `file`, so the final rename stays on one filesystem */
export const tempPathFor = (file: string) =>
  path.join(
    path.dirname(file),
    `.${path.basename(file)}.${dayjs().format("YYYYMMDDHHmmssSSS")}.tmp`
  );

/**
 * Serialize the whole table first, then write it to a temp file and rename it
 * over `file`. A failure leaves `file` as it was.
 */
export function saveTable(file: string, rows: Table): void {
  // A bare \r must be quoted too, or the reader takes it for a line ending
  const csv = stringify(rows, { record_delimiter: "unix", quoted_match: /\r/ });
  const tmp = tempPathFor(file);

  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(tmp, csv, "utf8");
    fs.renameSync(tmp, file);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw new FileError("write", file, err);
  }
}
