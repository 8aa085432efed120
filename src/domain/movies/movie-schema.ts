import { AttributeSchema } from "../similarity/attribute-schema";

export const CONTENT_RATINGS = ["G", "PG", "PG-13", "R", "NC-17"] as const;

export const KNOWN_GENRES = [
  "Action",
  "Adventure",
  "Animation",
  "Comedy",
  "Crime",
  "Drama",
  "Fantasy",
  "Horror",
  "Mystery",
  "Romance",
  "Sci-Fi",
  "Thriller",
  "War",
  "Western",
] as const;

export const MOVIE_ATTRIBUTE_LABELS: Readonly<Record<string, string>> = {
  title: "Title",
  genre: "Genre",
  year: "Release year",
  rating: "Content rating",
  duration: "Duration (minutes)",
  criticScore: "Critic score",
  hasSequel: "Has sequel",
};

export const MOVIE_SCHEMA = new AttributeSchema([
  { spec: { name: "genre", kind: "setJaccard" }, defaultWeight: 0.25 },
  {
    spec: { name: "year", kind: "numericRange", params: { min: 1920, max: 2025 } },
    defaultWeight: 0.15,
  },
  {
    spec: {
      name: "rating",
      kind: "ordinal",
      params: { orderedValues: CONTENT_RATINGS, fallbackUnknown: "G" },
    },
    defaultWeight: 0.15,
  },
  {
    spec: { name: "duration", kind: "numericRange", params: { min: 60, max: 240 } },
    defaultWeight: 0.15,
  },
  {
    spec: { name: "criticScore", kind: "numericRange", params: { min: 1, max: 10 } },
    defaultWeight: 0.2,
  },
  { spec: { name: "hasSequel", kind: "categorical" }, defaultWeight: 0.1 },
]);

export function labelFor(attribute: string): string {
  return MOVIE_ATTRIBUTE_LABELS[attribute] ?? attribute;
}
