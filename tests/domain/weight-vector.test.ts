import { describe, expect, it } from "vitest";
import { MOVIE_SCHEMA } from "../../src/domain/movies/movie-schema";
import { applyWeightOverrides, snapshotWeights } from "../../src/domain/similarity/weight-vector";

describe("snapshotWeights", () => {
  it("returns a frozen copy that later edits cannot reach", () => {
    const weights: Record<string, number> = { genre: 0.5 };
    const snapshot = snapshotWeights(weights);
    weights.genre = 0.9;

    expect(snapshot).toEqual({ genre: 0.5 });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe("applyWeightOverrides", () => {
  const defaults = MOVIE_SCHEMA.defaultWeights();

  it("replaces only the overridden attributes", () => {
    const next = applyWeightOverrides(defaults, { genre: 0.6, hasSequel: 0 }, MOVIE_SCHEMA);

    expect(next).toEqual({ ...defaults, genre: 0.6, hasSequel: 0 });
    expect(defaults.genre).toBe(0.25);
  });

  it("keeps the base vector when there are no overrides", () => {
    expect(applyWeightOverrides(defaults, undefined, MOVIE_SCHEMA)).toEqual(defaults);
  });

  it("rejects weights outside [0, 1]", () => {
    expect(() => applyWeightOverrides(defaults, { year: 1.2 }, MOVIE_SCHEMA)).toThrowError(
      'Weight for "year" must be between 0.0 and 1.0.',
    );
    expect(() => applyWeightOverrides(defaults, { year: -0.1 }, MOVIE_SCHEMA)).toThrowError(
      'Weight for "year" must be between 0.0 and 1.0.',
    );
  });

  it("rejects attributes the schema does not know", () => {
    expect(() => applyWeightOverrides(defaults, { mood: 0.5 }, MOVIE_SCHEMA)).toThrowError(
      'Unknown attribute "mood". Configured attributes: genre, year, rating, duration, criticScore, hasSequel.',
    );
  });
});
