import type { Area } from "./types.js";
import { InvalidRegionError } from "./errors.js";

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Throws unless the area is [top, left, bottom, right] with top < bottom and left < right. */
export function validateArea(area: Area): void {
  if (area.length !== 4) {
    throw new InvalidRegionError(
      `area should have 4 values but [${area.join(", ")}] has ${area.length}`
    );
  }
  const [top, left, bottom, right] = area;
  if (top >= bottom) {
    throw new InvalidRegionError(
      `area bottom=${bottom} should be greater than top=${top}`
    );
  }
  if (left >= right) {
    throw new InvalidRegionError(
      `area right=${right} should be greater than left=${left}`
    );
  }
}

export function isNonDecreasing(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] < values[i - 1]) return false;
  }
  return true;
}

/** Comma-joined coordinates, prefixed with "%" when they are percentages of the page. */
export function formatCoordinates(values: readonly number[], relative: boolean): string {
  const joined = values.map(v => String(v)).join(",");
  return relative ? `%${joined}` : joined;
}

export function parseCoordinates(token: string): { values: number[]; relative: boolean } {
  const relative = token.startsWith("%");
  const body = relative ? token.slice(1) : token;
  const values = body.split(",").map(part => Number(part.trim()));
  return { values, relative };
}
