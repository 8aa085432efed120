import { describe, expect, it, vi } from "vitest";
import type { ReportWriter } from "../../src/application/ports/report-writer";
import { createRetrievalUseCase, godfather, matrix, reloaded } from "../fixtures/movies";

describe("RetrieveSimilarMoviesUseCase", () => {
  it("ranks movies on the attributes the query provides", async () => {
    const useCase = await createRetrievalUseCase();
    const response = await useCase.execute({ query: { genre: "sci-fi" } });

    expect(response.query).toEqual({ genre: ["Sci-Fi"] });
    expect(response.matches.map((match) => match.movie.title)).toEqual([
      "The Matrix",
      "The Matrix Reloaded",
    ]);
    expect(response.matches.map((match) => match.score)).toEqual([0.5, 0.5]);
    expect(response.matches[0]?.contributions).toEqual([
      { attribute: "genre", weight: 0.25, similarity: 0.5 },
    ]);
    expect(response.totalCandidates).toBe(4);
    expect(response.guidance).toBe("");
    expect(response.reportPath).toBeUndefined();
  });

  it("keeps zero scores on request and applies the limit", async () => {
    const useCase = await createRetrievalUseCase();
    const response = await useCase.execute({
      query: { genre: "Sci-Fi" },
      includeZeroScores: true,
      limit: 3,
    });

    expect(response.matches.map((match) => [match.movie.title, match.score])).toEqual([
      ["The Matrix", 0.5],
      ["The Matrix Reloaded", 0.5],
      ["The Godfather", 0],
    ]);
  });

  it("lets per-call weights change the ranking", async () => {
    const useCase = await createRetrievalUseCase();

    const byDefault = await useCase.execute({ query: { genre: "Sci-Fi", year: 1972 } });
    expect(byDefault.matches[0]?.movie).toBe(matrix);

    const yearOnly = await useCase.execute({
      query: { genre: "Sci-Fi", year: 1972 },
      weights: { genre: 0, year: 1 },
    });
    expect(yearOnly.weights.genre).toBe(0);
    expect(yearOnly.weights.year).toBe(1);
    expect(yearOnly.matches[0]?.movie).toBe(godfather);
    expect(yearOnly.matches[0]?.score).toBe(1);
  });

  it("rejects unknown weight overrides", async () => {
    const useCase = await createRetrievalUseCase();
    await expect(
      useCase.execute({ query: { genre: "Drama" }, weights: { mood: 1 } }),
    ).rejects.toThrowError(
      'Unknown attribute "mood". Configured attributes: genre, year, rating, duration, criticScore, hasSequel.',
    );
  });

  it("finds movies like a reference title, leaving the reference out", async () => {
    const useCase = await createRetrievalUseCase();
    const response = await useCase.executeLike({ title: "the matrix" });

    expect(response.reference).toBe(matrix);
    expect(response.query).toEqual({
      genre: ["Sci-Fi", "Action"],
      year: 1999,
      rating: "R",
      duration: 136,
      criticScore: 8.7,
      hasSequel: "yes",
    });
    expect(response.totalCandidates).toBe(3);
    expect(response.matches[0]?.movie).toBe(reloaded);
    expect(response.matches.map((match) => match.movie)).not.toContain(matrix);
  });

  it("fails when no movie matches the reference title", async () => {
    const useCase = await createRetrievalUseCase();
    await expect(useCase.executeLike({ title: "Casablanca" })).rejects.toThrowError(
      'No movie in the case base matches the title "Casablanca".',
    );
  });

  it("writes a report when asked", async () => {
    const write = vi.fn<ReportWriter["write"]>(
      async () => "reports/movie_search_results_20240105_070809.md",
    );
    const useCase = await createRetrievalUseCase(undefined, { write });

    const response = await useCase.execute({ query: { genre: "animation" }, saveReport: true });

    expect(response.reportPath).toBe("reports/movie_search_results_20240105_070809.md");
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith({ genre: ["Animation"] }, response.matches);
    expect(response.guidance).toBe("Single movie match found -> Toy Story.");
  });

  it("refuses to save a report without a writer", async () => {
    const useCase = await createRetrievalUseCase();
    await expect(
      useCase.execute({ query: { rating: "R" }, saveReport: true }),
    ).rejects.toThrowError("Saving reports is not configured.");
  });

  it("explains empty results", async () => {
    const empty = await createRetrievalUseCase([]);
    expect((await empty.execute({ query: { genre: "Drama" } })).guidance).toBe(
      "The case base is empty. Load movies before searching.",
    );

    const useCase = await createRetrievalUseCase();
    const response = await useCase.execute({ query: { genre: "Western" } });
    expect(response.matches).toEqual([]);
    expect(response.guidance).toBe(
      "No movie scored above 0 for this query. Add criteria or raise their weights.",
    );
  });

  it("describes the configured attributes with their default weights", async () => {
    const useCase = await createRetrievalUseCase();
    const attributes = useCase.describeAttributes();

    expect(attributes.map((attribute) => [attribute.spec.name, attribute.defaultWeight])).toEqual([
      ["genre", 0.25],
      ["year", 0.15],
      ["rating", 0.15],
      ["duration", 0.15],
      ["criticScore", 0.2],
      ["hasSequel", 0.1],
    ]);
    expect(attributes[2]?.spec).toEqual({
      name: "rating",
      kind: "ordinal",
      params: { orderedValues: ["G", "PG", "PG-13", "R", "NC-17"], fallbackUnknown: "G" },
    });
  });
});
