import type { MovieCase, MovieQuery } from "../entities/movie";
import { KNOWN_GENRES, labelFor } from "../movies/movie-schema";
import {
  canonicalFlag,
  canonicalRating,
  canonicalizeAgainst,
  isBlank,
  parseDecimal,
  parseDuration,
  parseInteger,
  splitList,
} from "./field-normalizer";

export interface RawMovieQuery {
  readonly genre?: string | readonly string[];
  readonly year?: string | number;
  readonly rating?: string | number;
  readonly duration?: string | number;
  readonly criticScore?: string | number;
  readonly hasSequel?: string | boolean;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export class MovieQueryParser {
  parse(raw: RawMovieQuery): MovieQuery {
    const query: Mutable<MovieQuery> = {};

    if (raw.genre !== undefined && !isBlank(raw.genre)) {
      const genres = canonicalizeAgainst(splitList(raw.genre), KNOWN_GENRES);
      if (genres.length > 0) {
        query.genre = genres;
      }
    }
    if (raw.year !== undefined && !isBlank(raw.year)) {
      query.year = this.require("year", raw.year, parseInteger(raw.year));
    }
    if (raw.rating !== undefined && !isBlank(raw.rating)) {
      query.rating = this.require("rating", raw.rating, canonicalRating(raw.rating));
    }
    if (raw.duration !== undefined && !isBlank(raw.duration)) {
      query.duration = this.require("duration", raw.duration, parseDuration(raw.duration));
    }
    if (raw.criticScore !== undefined && !isBlank(raw.criticScore)) {
      query.criticScore = this.require(
        "criticScore",
        raw.criticScore,
        parseDecimal(raw.criticScore),
      );
    }
    if (raw.hasSequel !== undefined && !isBlank(raw.hasSequel)) {
      query.hasSequel = this.require("hasSequel", raw.hasSequel, canonicalFlag(raw.hasSequel));
    }

    if (Object.keys(query).length === 0) {
      throw new Error("Provide at least one movie attribute to search for.");
    }

    return query;
  }

  /**
   * Uses a recorded movie as the query: every attribute except its title.
   */
  fromCase(movie: MovieCase): MovieQuery {
    const { title: _title, ...attributes } = movie;
    return attributes;
  }

  private require<T>(attribute: string, raw: unknown, parsed: T | undefined): T {
    if (parsed === undefined) {
      throw new Error(`Could not read ${labelFor(attribute).toLowerCase()} from "${String(raw)}".`);
    }
    return parsed;
  }
}
