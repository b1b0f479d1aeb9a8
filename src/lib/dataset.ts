import { readFile, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { IOError, errorMessage } from "./errors";
import { type ResultSet, TABLE_COLUMNS, type Table, type TableRow } from "./types";

export const CSV_FILENAME = "spotify_playlist_with_youtube.csv";

export function buildTable(results: ResultSet): Table {
  return {
    columns: TABLE_COLUMNS,
    rows: results.map((m) => [
      m.track.name,
      m.track.artists.join(", "),
      m.videoUrl ?? "",
      m.videoTitle ?? "",
    ]),
  };
}

/**
 * Writes the whole table or nothing: the CSV is rendered in memory, written
 * to a sibling temp file and renamed over the target.
 */
export async function writeCsv(table: Table, path: string): Promise<void> {
  const csv = stringify(table.rows, { header: true, columns: [...table.columns] });
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(tmp, csv, "utf8");
    await rename(tmp, path);
  } catch (e) {
    await rm(tmp, { force: true });
    throw new IOError(`Failed to write ${path}: ${errorMessage(e)}`, path, e);
  }
}

const isRow = (r: unknown): r is TableRow =>
  Array.isArray(r) && r.length === TABLE_COLUMNS.length && r.every((c) => typeof c === "string");

export async function readCsv(path: string): Promise<Table> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new IOError(`Failed to read ${path}: ${errorMessage(e)}`, path, e);
  }
  let records: unknown[];
  try {
    records = parse(text, { relax_column_count: false });
  } catch (e) {
    throw new IOError(`Failed to parse ${path}: ${errorMessage(e)}`, path, e);
  }
  const [header, ...rest] = records;
  if (!isRow(header) || header.some((h, i) => h !== TABLE_COLUMNS[i])) {
    throw new IOError(`Unexpected CSV header in ${path}`, path);
  }
  return { columns: TABLE_COLUMNS, rows: rest.filter(isRow) };
}
