import { parseArgsStringToArgv } from "string-argv";
import { z } from "zod";
import type { Area, OutputFormat, PageSelector } from "./types.js";
import { InvalidOptionError, UnsortedColumnsError, describeIssues } from "./errors.js";
import { formatCoordinates, isNonDecreasing, parseCoordinates, validateArea } from "./geometry.js";
import { consoleLogger, type Logger } from "./logger.js";

export const OUTPUT_FORMATS = ["CSV", "TSV", "JSON"] as const;

export const extractionOptionShape = {
  pages: z.union([z.number().int(), z.string(), z.array(z.number().int())]).optional(),
  guess: z.boolean().optional(),
  area: z.union([z.array(z.number()), z.array(z.array(z.number()))]).optional(),
  relativeArea: z.boolean().optional(),
  lattice: z.boolean().optional(),
  stream: z.boolean().optional(),
  password: z.string().optional(),
  silent: z.boolean().optional(),
  columns: z.array(z.number()).optional(),
  relativeColumns: z.boolean().optional(),
  format: z.enum(OUTPUT_FORMATS).optional(),
  batch: z.string().optional(),
  outputPath: z.string().optional(),
  options: z.string().optional(),
  multipleTables: z.boolean().optional(),
};

export const extractionOptionSchema = z.object(extractionOptionShape).strict();

export type ExtractionOptionInit = z.input<typeof extractionOptionSchema>;

/**
 * Every tunable of a single engine invocation.
 *
 * Instances are frozen. Use {@link ExtractionOption.merge} to layer one set of
 * options over another.
 */
export class ExtractionOption {
  readonly pages?: PageSelector;
  readonly guess: boolean;
  readonly area?: Area | Area[];
  readonly relativeArea: boolean;
  readonly lattice: boolean;
  readonly stream: boolean;
  readonly password?: string;
  readonly silent?: boolean;
  readonly columns?: number[];
  readonly relativeColumns: boolean;
  readonly format?: OutputFormat;
  readonly batch?: string;
  readonly outputPath?: string;
  readonly options: string;
  readonly multipleTables: boolean;

  constructor(init: ExtractionOptionInit = {}) {
    const parsed = extractionOptionSchema.safeParse(init);
    if (!parsed.success) {
      throw new InvalidOptionError(`Invalid extraction options: ${describeIssues(parsed.error)}`);
    }
    const o = parsed.data;

    this.pages = o.pages;
    this.area = o.area;
    // An explicit area replaces page-level table guessing.
    this.guess = hasArea(o.area) ? false : o.guess ?? true;
    this.relativeArea = o.relativeArea ?? false;
    this.lattice = o.lattice ?? false;
    this.stream = o.stream ?? false;
    this.password = o.password;
    this.silent = o.silent;
    this.columns = o.columns;
    this.relativeColumns = o.relativeColumns ?? false;
    this.format = o.format;
    this.batch = o.batch;
    this.outputPath = o.outputPath;
    this.options = o.options ?? "";
    this.multipleTables = o.multipleTables ?? true;

    Object.freeze(this);
  }

  /**
   * Right-biased merge: a field of `override` wins when it is truthy (non-empty
   * string or list, non-zero number, `true`), otherwise `base` supplies it.
   *
   * A `false` or empty override therefore never clears a value set on `base`.
   */
  static merge(override: ExtractionOption, base: ExtractionOption): ExtractionOption {
    return new ExtractionOption({
      pages: pick(override.pages, base.pages),
      guess: pick(override.guess, base.guess),
      area: pick(override.area, base.area),
      relativeArea: pick(override.relativeArea, base.relativeArea),
      lattice: pick(override.lattice, base.lattice),
      stream: pick(override.stream, base.stream),
      password: pick(override.password, base.password),
      silent: pick(override.silent, base.silent),
      columns: pick(override.columns, base.columns),
      relativeColumns: pick(override.relativeColumns, base.relativeColumns),
      format: pick(override.format, base.format),
      batch: pick(override.batch, base.batch),
      outputPath: pick(override.outputPath, base.outputPath),
      options: pick(override.options, base.options),
      multipleTables: pick(override.multipleTables, base.multipleTables),
    });
  }

  /** Layers this option over `base`. */
  merge(base: ExtractionOption): ExtractionOption {
    return ExtractionOption.merge(this, base);
  }

  with(changes: ExtractionOptionInit): ExtractionOption {
    return new ExtractionOption({ ...this.toInit(), ...changes });
  }

  toInit(): ExtractionOptionInit {
    return {
      pages: this.pages,
      guess: this.guess,
      area: this.area,
      relativeArea: this.relativeArea,
      lattice: this.lattice,
      stream: this.stream,
      password: this.password,
      silent: this.silent,
      columns: this.columns,
      relativeColumns: this.relativeColumns,
      format: this.format,
      batch: this.batch,
      outputPath: this.outputPath,
      options: this.options,
      multipleTables: this.multipleTables,
    };
  }

  /**
   * Validate the option and render the engine's command-line arguments.
   *
   * Order: raw tokens, --pages, --area*, --lattice, --stream, --guess,
   * --format, --outfile, --columns, --password, --batch, --silent.
   */
  buildArgs(logger: Logger = consoleLogger): string[] {
    const args: string[] = [];

    if (this.options) {
      args.push(...parseArgsStringToArgv(this.options));
    }

    if (this.pages !== undefined && isTruthy(this.pages)) {
      args.push("--pages", formatPages(this.pages));
    } else {
      logger.warn("'pages' is not specified; the engine extracts from page 1 only.");
    }

    let multipleAreas = false;
    if (this.area !== undefined && hasArea(this.area)) {
      if (isAreaList(this.area)) {
        for (const area of this.area) {
          validateArea(area);
          args.push("--area", formatCoordinates(area, this.relativeArea));
          multipleAreas = true;
        }
      } else {
        validateArea(this.area);
        args.push("--area", formatCoordinates(this.area, this.relativeArea));
      }
    }

    if (this.lattice) args.push("--lattice");
    if (this.stream) args.push("--stream");
    if (this.guess && !multipleAreas) args.push("--guess");

    if (this.format) args.push("--format", this.format);
    if (this.outputPath) args.push("--outfile", this.outputPath);

    if (this.columns && this.columns.length > 0) {
      if (!isNonDecreasing(this.columns)) {
        throw new UnsortedColumnsError(
          `columns should be sorted but got [${this.columns.join(", ")}]`
        );
      }
      args.push("--columns", formatCoordinates(this.columns, this.relativeColumns));
    }

    if (this.password) args.push("--password", this.password);
    if (this.batch) args.push("--batch", this.batch);
    if (this.silent) args.push("--silent");

    return args;
  }

  /**
   * Rebuild an option from arguments produced by {@link buildArgs}. The raw
   * pass-through string cannot be recovered; its tokens are rejected as unknown.
   */
  static fromArgs(tokens: readonly string[]): ExtractionOption {
    const init: ExtractionOptionInit = { guess: false };
    const areas: number[][] = [];

    for (let i = 0; i < tokens.length; i++) {
      const flag = tokens[i];
      switch (flag) {
        case "--pages":
          init.pages = parsePages(valueAfter(tokens, ++i, flag));
          break;
        case "--area": {
          const { values, relative } = parseCoordinates(valueAfter(tokens, ++i, flag));
          areas.push(requireNumbers(values, flag));
          if (relative) init.relativeArea = true;
          break;
        }
        case "--lattice":
          init.lattice = true;
          break;
        case "--stream":
          init.stream = true;
          break;
        case "--guess":
          init.guess = true;
          break;
        case "--format": {
          const format = valueAfter(tokens, ++i, flag);
          if (!isOutputFormat(format)) {
            throw new InvalidOptionError(`Unknown format: ${format}`);
          }
          init.format = format;
          break;
        }
        case "--outfile":
          init.outputPath = valueAfter(tokens, ++i, flag);
          break;
        case "--columns": {
          const { values, relative } = parseCoordinates(valueAfter(tokens, ++i, flag));
          init.columns = requireNumbers(values, flag);
          if (relative) init.relativeColumns = true;
          break;
        }
        case "--password":
          init.password = valueAfter(tokens, ++i, flag);
          break;
        case "--batch":
          init.batch = valueAfter(tokens, ++i, flag);
          break;
        case "--silent":
          init.silent = true;
          break;
        default:
          throw new InvalidOptionError(`Unrecognized argument: ${flag}`);
      }
    }

    if (areas.length === 1) init.area = areas[0];
    else if (areas.length > 1) init.area = areas;

    return new ExtractionOption(init);
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function pick<T>(override: T, base: T): T {
  return isTruthy(override) ? override : base;
}

function hasArea(area: Area | Area[] | undefined): boolean {
  return area !== undefined && area.length > 0;
}

function isAreaList(area: Area | Area[]): area is Area[] {
  const items: ReadonlyArray<number | Area> = area;
  return items.some(item => Array.isArray(item));
}

function formatPages(pages: PageSelector): string {
  if (typeof pages === "number") return String(pages);
  if (typeof pages === "string") return pages;
  return pages.join(",");
}

function parsePages(token: string): PageSelector {
  if (/^\d+$/.test(token)) return Number(token);
  if (/^\d+(,\d+)+$/.test(token)) return token.split(",").map(Number);
  return token;
}

function valueAfter(tokens: readonly string[], index: number, flag: string): string {
  const value = tokens[index];
  if (value === undefined) {
    throw new InvalidOptionError(`${flag} expects a value`);
  }
  return value;
}

function requireNumbers(values: number[], flag: string): number[] {
  if (values.some(v => Number.isNaN(v))) {
    throw new InvalidOptionError(`${flag} expects comma-separated numbers`);
  }
  return values;
}
