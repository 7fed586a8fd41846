import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ExtractionMethod, TemplateRegion } from "./types.js";
import { ExtractionOption, type ExtractionOptionInit } from "./extraction-option.js";
import { TemplateFormatError, describeIssues } from "./errors.js";
import { withLocalFile, type InputSource, type LocalizeOptions } from "./file-util.js";
import { roundTo } from "./geometry.js";

// Shape of the JSON written by the Tabula app's "Export template" action.
const templateEntrySchema = z.object({
  page: z.number().int().positive(),
  extraction_method: z.enum(["guess", "lattice", "stream"]),
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
});

const templateSchema = z.array(templateEntrySchema);

const COORDINATE_DIGITS = 3;

/** Validate decoded template JSON and turn it into regions. */
export function parseTemplate(json: unknown): TemplateRegion[] {
  const parsed = templateSchema.safeParse(json);
  if (!parsed.success) {
    throw new TemplateFormatError(`Invalid template: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.map(entry => ({
    page: entry.page,
    extractionMethod: entry.extraction_method,
    x1: entry.x1,
    y1: entry.y1,
    x2: entry.x2,
    y2: entry.y2,
  }));
}

/**
 * Reduce template regions to one option per (page, extraction method).
 *
 * Groups are ordered by page, then method. A group with several regions
 * becomes a single multi-area request.
 */
export function expandTemplate(regions: readonly TemplateRegion[]): ExtractionOption[] {
  const sorted = [...regions].sort(compareRegions);
  const options: ExtractionOption[] = [];

  let group: TemplateRegion[] = [];
  for (const region of sorted) {
    const first = group[0];
    if (first && !sameGroup(first, region)) {
      options.push(groupToOption(group));
      group = [];
    }
    group.push(region);
  }
  if (group.length > 0) options.push(groupToOption(group));

  return options;
}

/** Load a template from a path, URL or buffer and expand it. */
export async function loadTemplate(
  source: InputSource,
  options: LocalizeOptions = {}
): Promise<ExtractionOption[]> {
  const text = await withLocalFile(source, { ...options, suffix: ".json" }, filePath =>
    readFile(filePath, "utf8")
  );

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new TemplateFormatError("Template is not valid JSON", { cause: err });
  }
  return expandTemplate(parseTemplate(json));
}

function compareRegions(a: TemplateRegion, b: TemplateRegion): number {
  if (a.page !== b.page) return a.page - b.page;
  if (a.extractionMethod < b.extractionMethod) return -1;
  if (a.extractionMethod > b.extractionMethod) return 1;
  return 0;
}

function sameGroup(a: TemplateRegion, b: TemplateRegion): boolean {
  return a.page === b.page && a.extractionMethod === b.extractionMethod;
}

function regionArea(region: TemplateRegion): number[] {
  return [
    roundTo(region.y1, COORDINATE_DIGITS),
    roundTo(region.x1, COORDINATE_DIGITS),
    roundTo(region.y2, COORDINATE_DIGITS),
    roundTo(region.x2, COORDINATE_DIGITS),
  ];
}

function methodFlags(method: ExtractionMethod): ExtractionOptionInit {
  switch (method) {
    case "guess":
      return { guess: true };
    case "lattice":
      return { lattice: true };
    case "stream":
      return { stream: true };
  }
}

function groupToOption(group: TemplateRegion[]): ExtractionOption {
  const [first] = group;
  const base: ExtractionOptionInit = { ...methodFlags(first.extractionMethod), pages: first.page };

  if (group.length === 1) {
    return new ExtractionOption({ ...base, area: regionArea(first) });
  }
  return new ExtractionOption({
    ...base,
    area: group.map(regionArea),
    multipleTables: true,
  });
}
