import { parse } from "csv-parse/sync";
import { z } from "zod";
import type {
  CellValue,
  HeaderPolicy,
  OutputFormat,
  RawCell,
  RawJsonTable,
  RawTable,
  TypedTable,
} from "./types.js";
import { TableParseError, describeIssues } from "./errors.js";

export interface MaterializeOptions {
  header?: HeaderPolicy;
  /** Column names for every table; no row is consumed as a header. */
  columns?: string[];
}

const jsonCellSchema = z
  .object({
    top: z.number().optional(),
    left: z.number().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    text: z.string().optional(),
  })
  .passthrough();

const jsonTableSchema = z
  .object({
    extraction_method: z.string().optional(),
    page_number: z.number().optional(),
    top: z.number().optional(),
    left: z.number().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    right: z.number().optional(),
    bottom: z.number().optional(),
    data: z.array(z.array(jsonCellSchema)),
  })
  .passthrough();

const recordsSchema = z.array(z.array(z.string()));

const jsonOutputSchema = z.array(jsonTableSchema);

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseJsonOutput(text: string): RawJsonTable[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new TableParseError("tabula-java returned malformed JSON", { cause: err });
  }
  const parsed = jsonOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new TableParseError(`Unexpected JSON from tabula-java: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function jsonToRawTables(tables: readonly RawJsonTable[]): RawTable[] {
  return tables.map(table => ({
    pageNumber: table.page_number,
    rows: table.data.map(row => row.map(cell => (cell.text ? cell.text : null))),
  }));
}

/** Parse CSV or TSV output into a single table. Row widths are checked when the table is materialized. */
export function parseDelimitedOutput(text: string, format: Exclude<OutputFormat, "JSON">): RawTable {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter: format === "TSV" ? "\t" : ",",
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (err) {
    throw new TableParseError(
      "Failed to parse the delimited output of tabula-java. Try `multipleTables: true`.",
      { cause: err }
    );
  }
  const records = recordsSchema.parse(parsed);
  return { rows: records.map(record => record.map(cell => (cell === "" ? null : cell))) };
}

/**
 * Turn raw engine tables into typed tables.
 *
 * Empty tables are dropped. With `header: "infer"` only the first table
 * gives up its first row as header; the remaining tables get positional
 * names unless `columns` is passed.
 */
export function materialize(
  rawTables: readonly RawTable[],
  options: MaterializeOptions = {}
): TypedTable[] {
  const header = options.header ?? "infer";
  const explicit =
    options.columns && options.columns.length > 0 ? buildColumnNames(options.columns) : null;
  const typed: TypedTable[] = [];

  for (const table of rawTables) {
    if (table.rows.length === 0) continue;

    const rows = table.rows.map(row => row.map(normalizeCell));
    let columns: string[];

    if (explicit) {
      columns = explicit;
    } else if (header === "infer" && typed.length === 0) {
      columns = buildColumnNames(rows.shift() ?? []);
    } else if (typeof header === "number") {
      const [headerRow] = rows.splice(header, 1);
      if (!headerRow) {
        throw new TableParseError(
          `Header row ${header} is out of range for a table with ${table.rows.length} rows`
        );
      }
      columns = buildColumnNames(headerRow);
    } else {
      columns = positionalNames(rows);
    }

    typed.push(toTypedTable(columns, rows, table.pageNumber));
  }

  return typed;
}

/**
 * Name missing header cells "Unnamed: <n>" and suffix repeated names with
 * ".1", ".2", ... from left to right.
 */
export function buildColumnNames(header: readonly RawCell[]): string[] {
  let unnamed = 0;
  const names = header.map(cell => (cell === null || cell === "" ? `Unnamed: ${unnamed++}` : cell));

  const counts = new Map<string, number>();
  return names.map(name => {
    let col = name;
    let count = counts.get(col) ?? 0;
    while (count > 0) {
      counts.set(col, count + 1);
      col = `${col}.${count}`;
      count = counts.get(col) ?? 0;
    }
    counts.set(col, count + 1);
    return col;
  });
}

/**
 * Convert a column to numbers when every present value parses as one;
 * otherwise leave it untouched.
 */
export function coerceColumn(values: readonly CellValue[]): CellValue[] {
  const numbers: CellValue[] = [];
  for (const value of values) {
    if (value === null || typeof value === "number") {
      numbers.push(value);
      continue;
    }
    const trimmed = value.trim();
    if (!NUMERIC.test(trimmed)) return [...values];
    numbers.push(Number(trimmed));
  }
  return numbers;
}

function normalizeCell(cell: RawCell): RawCell {
  return cell === "" ? null : cell;
}

function positionalNames(rows: readonly RawCell[][]): string[] {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return Array.from({ length: width }, (_, idx) => String(idx));
}

function toTypedTable(
  columns: string[],
  rows: readonly RawCell[][],
  pageNumber: number | undefined
): TypedTable {
  rows.forEach((row, idx) => {
    if (row.length > columns.length) {
      throw new TableParseError(
        `Row ${idx} has ${row.length} cells but the table has ${columns.length} columns. ` +
          "Pass matching `columns` or change the `header` policy."
      );
    }
  });

  const columnValues = columns.map((_, colIdx) =>
    coerceColumn(rows.map(row => row[colIdx] ?? null))
  );

  const records = rows.map((_, rowIdx) => {
    const record: Record<string, CellValue> = {};
    columns.forEach((name, colIdx) => {
      // defineProperty keeps names such as "__proto__" as own keys
      Object.defineProperty(record, name, {
        value: columnValues[colIdx][rowIdx],
        enumerable: true,
        writable: true,
        configurable: true,
      });
    });
    return record;
  });

  const table: TypedTable = { columns, rows: records };
  if (pageNumber !== undefined) table.pageNumber = pageNumber;
  return table;
}
