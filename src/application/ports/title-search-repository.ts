import type { MovieCase } from "../../domain/entities/movie";

export interface TitleSearchRepository {
  findByTitle(title: string): Promise<MovieCase | undefined>;
}
