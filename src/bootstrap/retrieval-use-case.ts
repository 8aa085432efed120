import { RetrieveSimilarMoviesUseCase } from "../application/use-cases/retrieve-similar-movies.usecase";
import { MOVIE_SCHEMA } from "../domain/movies/movie-schema";
import { MovieQueryParser } from "../domain/services/movie-query-parser";
import { ConfigManager } from "../infrastructure/config/config-manager";
import { CsvMovieCaseBaseRepository } from "../infrastructure/data/csv-movie-case-base.repository";
import { ConsoleLogger, LogLevel, parseLogLevel } from "../infrastructure/logging/logger";
import { MarkdownReportWriter } from "../infrastructure/reporting/markdown-report.writer";
import { FlexSearchTitleSearchRepository } from "../infrastructure/search/flexsearch-title-search.repository";

let cachedUseCase: Promise<RetrieveSimilarMoviesUseCase> | null = null;

export function getRetrievalUseCase(): Promise<RetrieveSimilarMoviesUseCase> {
  if (!cachedUseCase) {
    cachedUseCase = buildUseCase(ConfigManager.fromEnvironment());
  }
  return cachedUseCase;
}

export async function buildUseCase(
  config: ConfigManager,
): Promise<RetrieveSimilarMoviesUseCase> {
  const logger = new ConsoleLogger(
    parseLogLevel(config.getLoggingConfig().level) ?? LogLevel.INFO,
  );
  const retrieval = config.getRetrievalConfig();
  const report = config.getReportConfig();

  const caseBase = new CsvMovieCaseBaseRepository({
    filePath: config.getDataSourceConfig().casesPath,
    logger,
  });
  const movies = await caseBase.load();

  const titleSearch = new FlexSearchTitleSearchRepository({ movies });
  await titleSearch.initialise();

  const schema =
    retrieval.numericBounds === "caseBase"
      ? MOVIE_SCHEMA.withBoundsFrom(movies)
      : MOVIE_SCHEMA;

  return new RetrieveSimilarMoviesUseCase({
    caseBase,
    titleSearch,
    parser: new MovieQueryParser(),
    schema,
    reportWriter: new MarkdownReportWriter({ ...report, logger }),
    policy: retrieval,
  });
}
