import { stat } from "node:fs/promises";
import { z } from "zod";
import type { OutputFormat, RawJsonTable, TypedTable } from "./types.js";
import { BackendDispatcher, type InvokeSettings } from "./dispatcher.js";
import type { Env } from "./config.js";
import { InvalidOptionError, describeIssues } from "./errors.js";
import {
  ExtractionOption,
  extractionOptionShape,
  type ExtractionOptionInit,
} from "./extraction-option.js";
import { assertReadableFile, withLocalFile, type InputSource } from "./file-util.js";
import { consoleLogger, type Logger } from "./logger.js";
import {
  jsonToRawTables,
  materialize,
  parseDelimitedOutput,
  parseJsonOutput,
  type MaterializeOptions,
} from "./materializer.js";
import { loadTemplate } from "./template.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./extraction-option.js";
export * from "./template.js";
export * from "./materializer.js";
export * from "./dispatcher.js";
export * from "./environment.js";
export {
  EmbeddedBackend,
  SubprocessBackend,
  buildJavaOptions,
  loadJavaRuntime,
  spawnProcess,
  type BackendKind,
  type EngineBackend,
  type JavaRuntime,
  type JavaRuntimeLoader,
  type ProcessResult,
  type ProcessRunner,
} from "./backend.js";
export {
  assertReadableFile,
  localizeFile,
  withLocalFile,
  type InputSource,
  type LocalFile,
  type LocalizeOptions,
} from "./file-util.js";

const runShape = {
  javaOptions: z.union([z.string(), z.array(z.string())]).optional(),
  encoding: z.string().optional(),
  forceSubprocess: z.boolean().optional(),
  userAgent: z.string().optional(),
};

const materializeShape = {
  header: z.union([z.literal("infer"), z.literal("none"), z.number().int().nonnegative()]).optional(),
  /** Column names for every table; `columns` holds x coordinates of column boundaries. */
  columnNames: z.array(z.string()).optional(),
};

const readPdfOptionsSchema = z
  .object({ ...extractionOptionShape, ...runShape, ...materializeShape })
  .strict();

const convertOptionsSchema = z
  .object({ ...extractionOptionShape, ...runShape, outputFormat: z.string().optional() })
  .omit({ format: true, outputPath: true, batch: true, multipleTables: true })
  .strict();

const batchOptionsSchema = z
  .object({ ...extractionOptionShape, ...runShape, outputFormat: z.string().optional() })
  .omit({ format: true, batch: true, multipleTables: true, userAgent: true })
  .strict();

export type ReadPdfOptions = z.input<typeof readPdfOptionsSchema>;
export type ConvertOptions = z.input<typeof convertOptionsSchema>;
export type BatchConvertOptions = z.input<typeof batchOptionsSchema>;

export interface TableReaderOptions {
  logger?: Logger;
  /** Shared dispatcher; one is created when omitted. */
  dispatcher?: BackendDispatcher;
  env?: Env;
}

interface RunSettings extends InvokeSettings {
  userAgent?: string;
}

interface ParsedReadOptions {
  extraction: ExtractionOptionInit;
  run: RunSettings;
  materialize: MaterializeOptions;
}

export class TableReader {
  readonly dispatcher: BackendDispatcher;
  private readonly logger: Logger;

  constructor(options: TableReaderOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.dispatcher =
      options.dispatcher ?? new BackendDispatcher({ logger: this.logger, env: options.env });
  }

  /**
   * Read the tables of a PDF.
   *
   * By default every detected table becomes its own TypedTable. With
   * `multipleTables: false` the engine's CSV (or TSV) output is read as one table.
   */
  async readPdf(input: InputSource, options: ReadPdfOptions = {}): Promise<TypedTable[]> {
    const { extraction, run, materialize: materializeOptions } = parseReadOptions(options);
    const option = withOutputFormat(new ExtractionOption(extraction));

    return withLocalFile(input, { userAgent: run.userAgent }, async filePath => {
      await assertReadableFile(filePath);
      return this.readTables(filePath, option, run, materializeOptions);
    });
  }

  /** Read the engine's JSON as is, without building typed tables. */
  async readPdfAsJson(input: InputSource, options: ReadPdfOptions = {}): Promise<RawJsonTable[]> {
    const { extraction, run } = parseReadOptions(options);
    const option = new ExtractionOption({ ...extraction, format: "JSON" });

    const output = await withLocalFile(input, { userAgent: run.userAgent }, async filePath => {
      await assertReadableFile(filePath);
      return this.dispatcher.invoke(option, filePath, run);
    });
    if (output.length === 0) {
      this.warnEmptyOutput();
      return [];
    }
    return parseJsonOutput(output);
  }

  /**
   * Read a PDF with a template exported from the Tabula app.
   *
   * Options given here override the template's; `guess` defaults to false.
   * Template entries run one after another and the first failure aborts the rest.
   */
  async readPdfWithTemplate(
    input: InputSource,
    template: InputSource,
    options: ReadPdfOptions = {}
  ): Promise<TypedTable[]> {
    const { extraction, run, materialize: materializeOptions } = parseReadOptions(options);
    const overrides = new ExtractionOption({ ...extraction, guess: extraction.guess ?? false });
    const templateOptions = await loadTemplate(template, { userAgent: run.userAgent });

    return withLocalFile(input, { userAgent: run.userAgent }, async filePath => {
      await assertReadableFile(filePath);
      const tables: TypedTable[] = [];
      for (const templateOption of templateOptions) {
        const option = withOutputFormat(overrides.merge(templateOption));
        tables.push(...(await this.readTables(filePath, option, run, materializeOptions)));
      }
      return tables;
    });
  }

  /** Convert the tables of a PDF into a CSV, TSV or JSON file at `outputPath`. */
  async convertInto(
    input: InputSource,
    outputPath: string,
    options: ConvertOptions = {}
  ): Promise<void> {
    if (!outputPath) {
      throw new InvalidOptionError("'outputPath' should not be empty");
    }
    const parsed = parseOrThrow(convertOptionsSchema, options);
    const { javaOptions, encoding, forceSubprocess, userAgent, outputFormat, ...extraction } = parsed;
    const option = new ExtractionOption({
      ...extraction,
      format: conversionFormat(outputFormat),
      outputPath,
    });

    await withLocalFile(input, { userAgent }, async filePath => {
      await assertReadableFile(filePath);
      await this.dispatcher.invoke(option, filePath, { javaOptions, encoding, forceSubprocess });
    });
  }

  /** Convert every PDF in `inputDir`; outputs are written next to the inputs. */
  async convertIntoByBatch(inputDir: string, options: BatchConvertOptions = {}): Promise<void> {
    if (!(await isDirectory(inputDir))) {
      throw new InvalidOptionError("'inputDir' should be an existing directory path");
    }
    const parsed = parseOrThrow(batchOptionsSchema, options);
    const { javaOptions, encoding, forceSubprocess, outputFormat, ...extraction } = parsed;
    const option = new ExtractionOption({
      ...extraction,
      format: conversionFormat(outputFormat),
      batch: inputDir,
    });

    await this.dispatcher.invoke(option, undefined, { javaOptions, encoding, forceSubprocess });
  }

  private async readTables(
    filePath: string,
    option: ExtractionOption,
    run: InvokeSettings,
    materializeOptions: MaterializeOptions
  ): Promise<TypedTable[]> {
    const output = await this.dispatcher.invoke(option, filePath, run);
    if (output.length === 0) {
      this.warnEmptyOutput();
      return [];
    }
    if (option.format === "JSON" || option.format === undefined) {
      return materialize(jsonToRawTables(parseJsonOutput(output)), materializeOptions);
    }
    return materialize([parseDelimitedOutput(output, option.format)], materializeOptions);
  }

  private warnEmptyOutput(): void {
    this.logger.warn("EmptyOutputWarning: The output file is empty.");
  }
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidOptionError(`Invalid options: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function parseReadOptions(options: ReadPdfOptions): ParsedReadOptions {
  const parsed = parseOrThrow(readPdfOptionsSchema, options);
  const { javaOptions, encoding, forceSubprocess, userAgent, header, columnNames, ...extraction } =
    parsed;
  return {
    extraction,
    run: { javaOptions, encoding, forceSubprocess, userAgent },
    materialize: { header, columns: columnNames },
  };
}

/** JSON when each table is kept apart, otherwise the requested delimited format. */
function withOutputFormat(option: ExtractionOption): ExtractionOption {
  const format: OutputFormat =
    option.multipleTables || option.format === "JSON" ? "JSON" : option.format ?? "CSV";
  return option.with({ format });
}

function conversionFormat(outputFormat = "csv"): OutputFormat {
  switch (outputFormat.toLowerCase()) {
    case "csv":
      return "CSV";
    case "json":
      return "JSON";
    case "tsv":
      return "TSV";
    default:
      throw new InvalidOptionError(`Unknown output format: ${outputFormat}`);
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}
