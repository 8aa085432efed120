import type { WeightVector } from "../../domain/entities/case";
import type { MovieCase, MovieMatch, MovieQuery } from "../../domain/entities/movie";
import type { MovieQueryParser, RawMovieQuery } from "../../domain/services/movie-query-parser";
import { explainAggregate } from "../../domain/similarity/aggregator";
import type { AttributeSchema, AttributeSpec } from "../../domain/similarity/attribute-schema";
import { retrieve } from "../../domain/similarity/ranker";
import { applyWeightOverrides } from "../../domain/similarity/weight-vector";
import type { CaseBaseRepository } from "../ports/case-base-repository";
import type { ReportWriter } from "../ports/report-writer";
import type { TitleSearchRepository } from "../ports/title-search-repository";

interface RetrieveSimilarMoviesUseCaseDependencies {
  readonly caseBase: CaseBaseRepository<MovieCase>;
  readonly titleSearch: TitleSearchRepository;
  readonly parser: MovieQueryParser;
  readonly schema: AttributeSchema;
  readonly reportWriter?: ReportWriter;
  readonly policy: PresentationPolicy;
}

export interface PresentationPolicy {
  readonly resultLimit: number;
  readonly excludeZeroScores: boolean;
}

interface RetrievalOptions {
  readonly weights?: Readonly<Record<string, number>>;
  readonly limit?: number;
  readonly includeZeroScores?: boolean;
  readonly saveReport?: boolean;
}

export interface RetrieveSimilarMoviesRequest extends RetrievalOptions {
  readonly query: RawMovieQuery;
}

export interface FindMoviesLikeRequest extends RetrievalOptions {
  readonly title: string;
}

export interface RetrieveSimilarMoviesResponse {
  readonly query: MovieQuery;
  readonly weights: WeightVector;
  readonly matches: MovieMatch[];
  readonly totalCandidates: number;
  readonly guidance: string;
  readonly reference?: MovieCase;
  readonly reportPath?: string;
}

export interface AttributeDescription {
  readonly spec: AttributeSpec;
  readonly defaultWeight: number;
}

export class RetrieveSimilarMoviesUseCase {
  private readonly caseBase: CaseBaseRepository<MovieCase>;
  private readonly titleSearch: TitleSearchRepository;
  private readonly parser: MovieQueryParser;
  private readonly schema: AttributeSchema;
  private readonly reportWriter?: ReportWriter;
  private readonly policy: PresentationPolicy;

  constructor({
    caseBase,
    titleSearch,
    parser,
    schema,
    reportWriter,
    policy,
  }: RetrieveSimilarMoviesUseCaseDependencies) {
    this.caseBase = caseBase;
    this.titleSearch = titleSearch;
    this.parser = parser;
    this.schema = schema;
    this.reportWriter = reportWriter;
    this.policy = policy;
  }

  async execute({
    query: rawQuery,
    ...options
  }: RetrieveSimilarMoviesRequest): Promise<RetrieveSimilarMoviesResponse> {
    const query = this.parser.parse(rawQuery);
    const movies = await this.caseBase.load();
    return this.rank(query, movies, options);
  }

  async executeLike({
    title,
    ...options
  }: FindMoviesLikeRequest): Promise<RetrieveSimilarMoviesResponse> {
    const reference = await this.titleSearch.findByTitle(title);
    if (!reference) {
      throw new Error(`No movie in the case base matches the title "${title}".`);
    }

    const query = this.parser.fromCase(reference);
    const movies = await this.caseBase.load();
    const others = movies.filter((movie) => movie !== reference);
    const response = await this.rank(query, others, options);
    return { ...response, reference };
  }

  describeAttributes(): AttributeDescription[] {
    const defaults = this.schema.defaultWeights();
    return this.schema.specs().map((spec) => ({
      spec,
      defaultWeight: defaults[spec.name] ?? 0,
    }));
  }

  private async rank(
    query: MovieQuery,
    movies: readonly MovieCase[],
    { weights: overrides, limit, includeZeroScores, saveReport }: RetrievalOptions,
  ): Promise<RetrieveSimilarMoviesResponse> {
    const weights = applyWeightOverrides(
      this.schema.defaultWeights(),
      overrides,
      this.schema,
    );

    const ranked = retrieve(query, movies, weights, this.schema);
    const keepZero = includeZeroScores ?? !this.policy.excludeZeroScores;
    const matches = ranked
      .filter((result) => keepZero || result.score > 0)
      .slice(0, limit ?? this.policy.resultLimit)
      .map(
        (result): MovieMatch => ({
          movie: result.case,
          score: result.score,
          contributions: explainAggregate(query, result.case, weights, this.schema)
            .contributions,
        }),
      );

    let reportPath: string | undefined;
    if (saveReport) {
      if (!this.reportWriter) {
        throw new Error("Saving reports is not configured.");
      }
      reportPath = await this.reportWriter.write(query, matches);
    }

    return {
      query,
      weights,
      matches,
      totalCandidates: movies.length,
      guidance: this.buildGuidance(matches, movies.length),
      reportPath,
    };
  }

  private buildGuidance(matches: MovieMatch[], totalCandidates: number): string {
    if (totalCandidates === 0) {
      return "The case base is empty. Load movies before searching.";
    }

    if (matches.length === 0) {
      return "No movie scored above 0 for this query. Add criteria or raise their weights.";
    }

    if (matches.length === 1) {
      return `Single movie match found -> ${matches[0]?.movie.title}.`;
    }

    return "";
  }
}
