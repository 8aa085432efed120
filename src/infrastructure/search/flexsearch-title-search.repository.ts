import FlexSearch, { type Document } from "flexsearch";
import type { TitleSearchRepository } from "../../application/ports/title-search-repository";
import { WORD_BOUNDARY } from "../../domain/constants/text-processing";
import type { MovieCase } from "../../domain/entities/movie";

// Token scoring constants
const FIELD_MATCH_SCORE = 1;
const EXACT_TOKEN_MATCH_BONUS = 5;
const PREFIX_TOKEN_MATCH_BONUS = 2;
const SEARCH_LIMIT = 50;

interface FlexSearchTitleSearchRepositoryOptions {
  readonly movies: readonly MovieCase[];
}

interface TitleDocument {
  id: string;
  title: string;
  [key: string]: string;
}

type TitleIndex = Document<TitleDocument, false>;

interface Candidate {
  readonly position: number;
  score: number;
}

/**
 * Resolves a free-text title to one movie of the case base. Exact
 * (case-insensitive) titles win; otherwise the best token match, earlier
 * movies first on ties.
 */
export class FlexSearchTitleSearchRepository implements TitleSearchRepository {
  private readonly movies: readonly MovieCase[];
  private readonly tokenIndex = new Map<string, Set<string>>();
  private document?: TitleIndex;

  constructor({ movies }: FlexSearchTitleSearchRepositoryOptions) {
    this.movies = movies;
  }

  async initialise(): Promise<void> {
    if (this.document) {
      return;
    }

    const document = new FlexSearch.Document<TitleDocument, false>({
      tokenize: "forward",
      cache: true,
      document: {
        id: "id",
        index: ["title"],
      },
    });

    this.movies.forEach((movie, position) => {
      const id = String(position);
      document.add({ id, title: movie.title });
      this.tokenIndex.set(id, new Set(this.tokenize(movie.title)));
    });

    this.document = document;
  }

  async findByTitle(title: string): Promise<MovieCase | undefined> {
    const document = this.document;
    if (!document) {
      throw new Error(
        "FlexSearchTitleSearchRepository must be initialised before searching.",
      );
    }

    const wanted = title.trim().toLowerCase();
    if (!wanted) {
      return undefined;
    }

    const exact = this.movies.find(
      (movie) => movie.title.trim().toLowerCase() === wanted,
    );
    if (exact) {
      return exact;
    }

    const candidates = new Map<string, Candidate>();
    for (const keyword of this.tokenize(title)) {
      const results = document.search(keyword, {
        enrich: true,
        limit: SEARCH_LIMIT,
        suggest: true,
      });

      for (const fieldResult of results) {
        for (const entry of fieldResult.result) {
          const id = this.resolveId(entry);
          if (id === undefined) {
            continue;
          }
          this.updateScore(candidates, id, keyword);
        }
      }
    }

    const best = Array.from(candidates.values()).sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      return a.position - b.position;
    })[0];

    return best ? this.movies[best.position] : undefined;
  }

  private updateScore(
    candidates: Map<string, Candidate>,
    id: string,
    keyword: string,
  ): void {
    const position = Number(id);
    if (!Number.isInteger(position) || !this.movies[position]) {
      return;
    }

    const current = candidates.get(id) ?? { position, score: 0 };
    current.score += FIELD_MATCH_SCORE;

    for (const token of this.tokenIndex.get(id) ?? []) {
      if (token === keyword) {
        current.score += EXACT_TOKEN_MATCH_BONUS;
      } else if (token.startsWith(keyword)) {
        current.score += PREFIX_TOKEN_MATCH_BONUS;
      }
    }

    candidates.set(id, current);
  }

  private tokenize(value: string): string[] {
    return value
      .split(WORD_BOUNDARY)
      .map((token) => token.trim().toLowerCase())
      .filter(Boolean);
  }

  private resolveId(entry: unknown): string | undefined {
    if (typeof entry === "string") {
      return entry;
    }
    if (typeof entry === "number") {
      return String(entry);
    }
    if (!entry || typeof entry !== "object") {
      return undefined;
    }

    if ("id" in entry && (typeof entry.id === "string" || typeof entry.id === "number")) {
      return String(entry.id);
    }

    return undefined;
  }
}
