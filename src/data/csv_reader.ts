/**
 * CSV Reader — reads a manifest CSV into named columns for summarising.
 */

import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";

import { DataParseError } from "../shared/errors.js";

export interface CsvReadOptions {
  /** Field separator. Default `,`. */
  delimiter?: string;
  /** First row holds column names. When false, columns are named `0..n-1`. Default true. */
  header?: boolean;
  /** Column (name or zero-based position) holding row labels; left out of statistics. */
  indexColumn?: string | number;
  /** Lines skipped before parsing starts. Default 0. */
  skipRows?: number;
  /** Lines starting with this character are ignored. */
  comment?: string;
  /** Quote character. Default `"`. */
  quote?: string;
  /** Cell values read as missing. */
  naValues?: string[];
}

export const DEFAULT_NA_VALUES = ["", "NA", "N/A", "NaN", "nan", "null", "NULL"];

export interface CsvTable {
  columns: string[];
  rows: string[][];
}

export interface NumericColumn {
  name: string;
  values: number[];
}

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function uniqueNames(names: string[]): string[] {
  const counts = new Map<string, number>();
  return names.map((name) => {
    const n = counts.get(name) ?? 0;
    counts.set(name, n + 1);
    return n === 0 ? name : `${name}.${n}`;
  });
}

/**
 * Read a CSV file. `label` is the name used in error messages.
 */
export function readCsvTable(
  filePath: string,
  label: string,
  options: CsvReadOptions = {},
): CsvTable {
  const text = readFileSync(filePath, "utf-8");

  let records: string[][];
  try {
    records = parse(text, {
      delimiter: options.delimiter ?? ",",
      quote: options.quote ?? '"',
      comment: options.comment,
      from_line: (options.skipRows ?? 0) + 1,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: false,
    }) as string[][];
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataParseError(label, reason, { cause: err });
  }

  if (records.length === 0 || records[0].length === 0) {
    throw new DataParseError(label, "no columns to parse");
  }

  const header = options.header ?? true;
  const columns = header
    ? uniqueNames(records[0])
    : records[0].map((_, i) => String(i));
  const rows = header ? records.slice(1) : records;

  return { columns, rows };
}

function indexPosition(table: CsvTable, label: string, indexColumn: string | number): number {
  if (typeof indexColumn === "number") {
    if (indexColumn < 0 || indexColumn >= table.columns.length) {
      throw new DataParseError(label, `index column ${indexColumn} out of range`);
    }
    return indexColumn;
  }
  const pos = table.columns.indexOf(indexColumn);
  if (pos === -1) {
    throw new DataParseError(label, `index column "${indexColumn}" not found`);
  }
  return pos;
}

/**
 * Columns whose non-missing values all parse as numbers, in file order.
 * Columns with no values at all are not numeric.
 */
export function numericColumns(
  table: CsvTable,
  label: string,
  options: CsvReadOptions = {},
): NumericColumn[] {
  const naValues = new Set(options.naValues ?? DEFAULT_NA_VALUES);
  const skip =
    options.indexColumn === undefined ? -1 : indexPosition(table, label, options.indexColumn);

  const result: NumericColumn[] = [];
  table.columns.forEach((name, col) => {
    if (col === skip) return;
    const values: number[] = [];
    for (const row of table.rows) {
      const cell = row[col];
      if (naValues.has(cell)) continue;
      if (!NUMBER_RE.test(cell)) return;
      values.push(Number(cell));
    }
    if (values.length > 0) result.push({ name, values });
  });
  return result;
}
