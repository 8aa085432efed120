import { describe, expect, it } from "vitest";
import { CONTENT_RATINGS } from "../../src/domain/movies/movie-schema";
import {
  categoricalSimilarity,
  localSimilarity,
  normalizeOrdinalToken,
  numericRangeSimilarity,
  ordinalSimilarity,
  setJaccardSimilarity,
} from "../../src/domain/similarity/local-metrics";

const YEAR_RANGE = { min: 1920, max: 2025 };
const RATINGS = { orderedValues: CONTENT_RATINGS, fallbackUnknown: "G" };

describe("categoricalSimilarity", () => {
  it("scores exact matches as 1 and anything else as 0", () => {
    expect(categoricalSimilarity("yes", "yes")).toBe(1);
    expect(categoricalSimilarity("yes", "no")).toBe(0);
    expect(categoricalSimilarity(1999, "1999")).toBe(0);
  });

  it("treats missing values as a mismatch", () => {
    expect(categoricalSimilarity(undefined, "yes")).toBe(0);
    expect(categoricalSimilarity(undefined, undefined)).toBe(0);
  });

  it("compares lists element by element", () => {
    expect(categoricalSimilarity(["a", "b"], ["a", "b"])).toBe(1);
    expect(categoricalSimilarity(["a", "b"], ["b", "a"])).toBe(0);
    expect(categoricalSimilarity(["a"], "a")).toBe(0);
  });
});

describe("numericRangeSimilarity", () => {
  it("normalises the distance by the span", () => {
    expect(numericRangeSimilarity(2000, 1999, YEAR_RANGE)).toBeCloseTo(1 - 1 / 105, 12);
    expect(numericRangeSimilarity(1920, 2025, YEAR_RANGE)).toBe(0);
    expect(numericRangeSimilarity(1999, 1999, YEAR_RANGE)).toBe(1);
  });

  it("floors out-of-range values at zero", () => {
    expect(numericRangeSimilarity(1800, 2025, YEAR_RANGE)).toBe(0);
  });

  it("returns 0 for missing or non-numeric values", () => {
    expect(numericRangeSimilarity(undefined, 1999, YEAR_RANGE)).toBe(0);
    expect(numericRangeSimilarity("1999", 1999, YEAR_RANGE)).toBe(0);
    expect(numericRangeSimilarity(Number.NaN, 1999, YEAR_RANGE)).toBe(0);
    expect(numericRangeSimilarity(["1999"], 1999, YEAR_RANGE)).toBe(0);
  });

  it("falls back to exact matching for a degenerate range", () => {
    expect(numericRangeSimilarity(5, 5, { min: 5, max: 5 })).toBe(1);
    expect(numericRangeSimilarity(5, 6, { min: 5, max: 5 })).toBe(0);
  });

  it("never increases as the distance grows", () => {
    let previous = 1;
    for (let offset = 0; offset <= 150; offset += 5) {
      const score = numericRangeSimilarity(1990, 1990 + offset, YEAR_RANGE);
      expect(score).toBeLessThanOrEqual(previous);
      previous = score;
    }
    expect(previous).toBe(0);
  });

  it("is symmetric", () => {
    expect(numericRangeSimilarity(1950, 2010, YEAR_RANGE)).toBe(
      numericRangeSimilarity(2010, 1950, YEAR_RANGE),
    );
  });
});

describe("ordinalSimilarity", () => {
  it("scores by position in the ordered values", () => {
    expect(ordinalSimilarity("G", "NC-17", RATINGS)).toBe(0);
    expect(ordinalSimilarity("PG", "PG-13", RATINGS)).toBe(0.75);
    expect(ordinalSimilarity("R", "R", RATINGS)).toBe(1);
  });

  it("retries with the normalised form", () => {
    expect(normalizeOrdinalToken(" pg  13 ")).toBe("PG-13");
    expect(ordinalSimilarity("pg 13", "PG-13", RATINGS)).toBe(1);
  });

  it("substitutes the fallback for missing or empty values", () => {
    expect(ordinalSimilarity(undefined, "G", RATINGS)).toBe(1);
    expect(ordinalSimilarity("", "PG", RATINGS)).toBe(0.75);
  });

  it("degrades to exact matching when a value is not ordered", () => {
    expect(ordinalSimilarity("XYZ", "XYZ", RATINGS)).toBe(1);
    expect(ordinalSimilarity("XYZ", "R", RATINGS)).toBe(0);
  });

  it("looks numbers up by their decimal form", () => {
    const ages = { orderedValues: ["10", "12", "14"], fallbackUnknown: "10" };
    expect(ordinalSimilarity(12, "14", ages)).toBe(0.5);
  });

  it("returns 1 when only one value is ordered", () => {
    expect(
      ordinalSimilarity("only", "ONLY", { orderedValues: ["ONLY"], fallbackUnknown: "ONLY" }),
    ).toBe(1);
  });

  it("is symmetric", () => {
    expect(ordinalSimilarity("G", "R", RATINGS)).toBe(ordinalSimilarity("R", "G", RATINGS));
  });
});

describe("setJaccardSimilarity", () => {
  it("handles empty sets on either side", () => {
    expect(setJaccardSimilarity([], [])).toBe(1);
    expect(setJaccardSimilarity(["x"], [])).toBe(0);
    expect(setJaccardSimilarity(undefined, undefined)).toBe(1);
  });

  it("divides the intersection by the union", () => {
    expect(setJaccardSimilarity(["a", "b"], ["b", "c"])).toBe(1 / 3);
    expect(setJaccardSimilarity(["b", "c"], ["a", "b"])).toBe(1 / 3);
  });

  it("trims entries, drops blanks and repeats, and wraps scalars", () => {
    expect(setJaccardSimilarity([" a ", "a", ""], ["a"])).toBe(1);
    expect(setJaccardSimilarity("Drama", ["Drama", "Crime"])).toBe(0.5);
  });
});

describe("localSimilarity", () => {
  it("dispatches on the attribute kind", () => {
    expect(localSimilarity({ name: "genre", kind: "setJaccard" }, ["a", "b"], ["b"])).toBe(0.5);
    expect(localSimilarity({ name: "hasSequel", kind: "categorical" }, "yes", "yes")).toBe(1);
    expect(
      localSimilarity({ name: "year", kind: "numericRange", params: YEAR_RANGE }, 2025, 1920),
    ).toBe(0);
    expect(
      localSimilarity({ name: "rating", kind: "ordinal", params: RATINGS }, "PG", "PG-13"),
    ).toBe(0.75);
  });
});
