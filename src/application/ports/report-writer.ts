import type { MovieMatch, MovieQuery } from "../../domain/entities/movie";

export interface ReportWriter {
  /**
   * Persists a retrieval report and resolves to its location.
   */
  write(query: MovieQuery, matches: readonly MovieMatch[]): Promise<string>;
}
