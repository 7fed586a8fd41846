import { describe, expect, it, vi } from "vitest";
import {
  ExtractionOption,
  InvalidOptionError,
  InvalidRegionError,
  UnsortedColumnsError,
  silentLogger,
} from "../src/index.js";
import type { Logger } from "../src/index.js";

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("ExtractionOption.buildArgs", () => {
  it("renders every flag in a stable order", () => {
    const option = new ExtractionOption({
      options: "--use-line-returns",
      pages: [1, 2],
      lattice: true,
      stream: true,
      format: "JSON",
      outputPath: "out.json",
      columns: [10.1, 20.2, 30.3],
      password: "test-secret",
      batch: "pdfs",
      silent: true,
    });

    expect(option.buildArgs(silentLogger)).toEqual([
      "--use-line-returns",
      "--pages",
      "1,2",
      "--lattice",
      "--stream",
      "--guess",
      "--format",
      "JSON",
      "--outfile",
      "out.json",
      "--columns",
      "10.1,20.2,30.3",
      "--password",
      "test-secret",
      "--batch",
      "pdfs",
      "--silent",
    ]);
  });

  it("is deterministic", () => {
    const option = new ExtractionOption({ pages: "1-2,3", area: [1, 2, 3, 4], columns: [5, 6] });
    expect(option.buildArgs(silentLogger)).toEqual(option.buildArgs(silentLogger));
  });

  it("splits the raw option string like a shell", () => {
    const option = new ExtractionOption({ pages: 1, options: `--outfile "my tables.csv" -r` });
    expect(option.buildArgs(silentLogger)).toEqual([
      "--outfile",
      "my tables.csv",
      "-r",
      "--pages",
      "1",
      "--guess",
    ]);
  });

  it("turns guessing off when an area is given", () => {
    const option = new ExtractionOption({ pages: "1-2,3", area: [269.875, 12.75, 790.5, 561] });

    expect(option.guess).toBe(false);
    expect(option.buildArgs(silentLogger)).toEqual([
      "--pages",
      "1-2,3",
      "--area",
      "269.875,12.75,790.5,561",
    ]);
  });

  it("renders one relative area token per region", () => {
    const option = new ExtractionOption({
      pages: 1,
      guess: true,
      area: [
        [10, 20, 30, 40],
        [50, 60, 70, 80],
      ],
      relativeArea: true,
    });

    expect(option.buildArgs(silentLogger)).toEqual([
      "--pages",
      "1",
      "--area",
      "%10,20,30,40",
      "--area",
      "%50,60,70,80",
    ]);
  });

  it("prefixes relative columns with a percent sign", () => {
    const option = new ExtractionOption({ pages: 1, columns: [10, 50, 90], relativeColumns: true });
    expect(option.buildArgs(silentLogger)).toEqual([
      "--pages",
      "1",
      "--guess",
      "--columns",
      "%10,50,90",
    ]);
  });

  it("warns when no pages are selected", () => {
    const logger = spyLogger();
    const args = new ExtractionOption().buildArgs(logger);

    expect(args).toEqual(["--guess"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "'pages' is not specified; the engine extracts from page 1 only."
    );
  });

  it("rejects an area whose bottom is above its top", () => {
    const option = new ExtractionOption({ pages: 1, area: [10, 10, 5, 50] });
    expect(() => option.buildArgs(silentLogger)).toThrow(InvalidRegionError);
  });

  it("rejects an area whose right edge is left of its left edge", () => {
    const option = new ExtractionOption({ pages: 1, area: [0, 50, 10, 40] });
    expect(() => option.buildArgs(silentLogger)).toThrow(InvalidRegionError);
  });

  it("rejects an area without exactly four values", () => {
    const option = new ExtractionOption({ pages: 1, area: [1, 2, 3] });
    expect(() => option.buildArgs(silentLogger)).toThrow(
      "area should have 4 values but [1, 2, 3] has 3"
    );
  });

  it("rejects decreasing columns and accepts sorted ones", () => {
    expect(() =>
      new ExtractionOption({ pages: 1, columns: [50, 10, 90] }).buildArgs(silentLogger)
    ).toThrow(UnsortedColumnsError);
    expect(new ExtractionOption({ pages: 1, columns: [10, 50, 90] }).buildArgs(silentLogger)).toEqual(
      ["--pages", "1", "--guess", "--columns", "10,50,90"]
    );
  });
});

describe("ExtractionOption construction", () => {
  it("rejects unknown keys", () => {
    const init = { pages: 1, unknownFlag: true };
    expect(() => new ExtractionOption(init)).toThrow(InvalidOptionError);
  });

  it("rejects fractional page numbers", () => {
    expect(() => new ExtractionOption({ pages: 1.5 })).toThrow(InvalidOptionError);
  });

  it("is frozen", () => {
    const option = new ExtractionOption({ pages: 1 });
    expect(Object.isFrozen(option)).toBe(true);
  });
});

describe("ExtractionOption.merge", () => {
  it("prefers override values and falls back to the base", () => {
    const override = new ExtractionOption({ pages: 2, lattice: true });
    const base = new ExtractionOption({ pages: 1, stream: true, password: "test-secret" });

    const merged = override.merge(base);

    expect(merged.pages).toBe(2);
    expect(merged.lattice).toBe(true);
    expect(merged.stream).toBe(true);
    expect(merged.password).toBe("test-secret");
  });

  it("cannot clear a base value with a false or empty override", () => {
    const override = new ExtractionOption({ guess: false, columns: [] });
    const base = new ExtractionOption({ guess: true, columns: [10, 20] });

    const merged = ExtractionOption.merge(override, base);

    expect(merged.guess).toBe(true);
    expect(merged.columns).toEqual([10, 20]);
  });

  it("keeps lists whole instead of merging elements", () => {
    const override = new ExtractionOption({ columns: [5] });
    const base = new ExtractionOption({ columns: [10, 20] });
    expect(override.merge(base).columns).toEqual([5]);
  });

  it("turns guessing off when the base brings an area", () => {
    const override = new ExtractionOption({ guess: true });
    const base = new ExtractionOption({ area: [1, 2, 3, 4] });
    expect(override.merge(base).guess).toBe(false);
  });
});

describe("ExtractionOption.fromArgs", () => {
  it("rebuilds an option with areas and relative columns", () => {
    const option = new ExtractionOption({
      pages: [1, 3],
      area: [
        [10, 20, 30, 40],
        [50, 60, 70, 80],
      ],
      relativeArea: true,
      lattice: true,
      format: "CSV",
      outputPath: "o.csv",
      columns: [1.5, 2.5],
      relativeColumns: true,
      password: "test-secret",
      silent: true,
    });

    const rebuilt = ExtractionOption.fromArgs(option.buildArgs(silentLogger));

    expect(rebuilt.toInit()).toEqual(option.toInit());
  });

  it("rebuilds a guessing option with a page range string", () => {
    const option = new ExtractionOption({ pages: "1-2,3", stream: true, batch: "in" });
    const rebuilt = ExtractionOption.fromArgs(option.buildArgs(silentLogger));

    expect(rebuilt.toInit()).toEqual(option.toInit());
    expect(rebuilt.guess).toBe(true);
  });

  it("rejects arguments it does not know", () => {
    expect(() => ExtractionOption.fromArgs(["--pages", "1", "--foo"])).toThrow(
      "Unrecognized argument: --foo"
    );
  });

  it("rejects a flag without its value", () => {
    expect(() => ExtractionOption.fromArgs(["--pages"])).toThrow("--pages expects a value");
  });
});
