import type { AttributeContribution } from "../similarity/aggregator";

export type SequelFlag = "yes" | "no";

export type MovieCase = Readonly<{
  title: string;
  genre?: readonly string[];
  year?: number;
  rating?: string;
  duration?: number;
  criticScore?: number;
  hasSequel?: SequelFlag;
}>;

export type MovieQuery = Omit<MovieCase, "title">;

export interface MovieMatch {
  readonly movie: MovieCase;
  readonly score: number;
  readonly contributions: readonly AttributeContribution[];
}
