/** Portion of a page as [top, left, bottom, right], in points or percent. */
export type Area = number[];

/** "all", a page number, a page string such as "1-2,3", or a list of page numbers. */
export type PageSelector = number | string | number[];

export type OutputFormat = "CSV" | "TSV" | "JSON";

export type ExtractionMethod = "guess" | "lattice" | "stream";

/** A cell as the engine hands it over: text, or null when blank. */
export type RawCell = string | null;

export interface RawTable {
  rows: RawCell[][];
  pageNumber?: number; // one-based, when the engine reports it
}

export interface RawJsonCell {
  top?: number;
  left?: number;
  width?: number;
  height?: number;
  text?: string;
  [key: string]: unknown;
}

export interface RawJsonTable {
  extraction_method?: string;
  page_number?: number;
  top?: number;
  left?: number;
  width?: number;
  height?: number;
  right?: number;
  bottom?: number;
  data: RawJsonCell[][];
  [key: string]: unknown;
}

export type CellValue = number | string | null;

export interface TypedTable {
  pageNumber?: number;
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

/**
 * How column names are found when none are given:
 * - "infer": the first row of the first table
 * - "none": positional names ("0", "1", ...)
 * - a row index: that row of every table
 */
export type HeaderPolicy = "infer" | "none" | number;

export interface TemplateRegion {
  page: number;
  extractionMethod: ExtractionMethod;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}
