import type { SequelFlag } from "../entities/movie";
import { LIST_DELIMITER } from "../constants/text-processing";

export type RawField = string | number | boolean | readonly string[] | null | undefined;

const DURATION_MINUTES = /^(\d+(?:\.\d+)?)\s*(?:m|min|mins|minutes?)?$/iu;
const DURATION_HOURS = /^(\d+)\s*h(?:rs?|ours?)?\s*(?:(\d+)\s*(?:m|min|mins|minutes?)?)?$/iu;
const DURATION_CLOCK = /^(\d+):([0-5]?\d)$/u;
const DECIMAL = /^-?\d+(?:\.\d+)?$/u;
const INTEGER = /^-?\d+$/u;

const YES_TOKENS = new Set(["yes", "y", "true", "1", "sim", "s"]);
const NO_TOKENS = new Set(["no", "n", "false", "0", "não", "nao"]);

/**
 * True when the field carries no information: missing, blank or an empty list.
 */
export function isBlank(raw: RawField): boolean {
  if (raw === null || raw === undefined) {
    return true;
  }
  if (typeof raw === "string") {
    return raw.trim().length === 0;
  }
  if (typeof raw === "number" || typeof raw === "boolean") {
    return false;
  }
  return raw.every((entry) => entry.trim().length === 0);
}

/**
 * Splits comma (or semicolon / pipe) separated values, trimming entries and
 * dropping blanks and repeats. Input order is kept.
 */
export function splitList(raw: string | readonly string[]): string[] {
  const segments = typeof raw === "string" ? [raw] : raw;
  const values = segments.flatMap((segment) =>
    segment
      .split(LIST_DELIMITER)
      .map((token) => token.trim())
      .filter(Boolean),
  );
  return Array.from(new Set(values));
}

/**
 * Replaces each value with its spelling in `known` when they match
 * case-insensitively. Unknown values pass through.
 */
export function canonicalizeAgainst(
  values: readonly string[],
  known: readonly string[],
): string[] {
  const byLowerCase = new Map(known.map((entry) => [entry.toLowerCase(), entry]));
  return Array.from(
    new Set(values.map((value) => byLowerCase.get(value.toLowerCase()) ?? value)),
  );
}

/**
 * Minutes from "136", "136 min", "2h 16min", "2h" or "2:16".
 */
export function parseDuration(raw: string | number): number | undefined {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : undefined;
  }

  const value = raw.trim();
  const minutes = DURATION_MINUTES.exec(value);
  if (minutes) {
    return Number(minutes[1]);
  }

  const hours = DURATION_HOURS.exec(value);
  if (hours) {
    return Number(hours[1]) * 60 + Number(hours[2] ?? 0);
  }

  const clock = DURATION_CLOCK.exec(value);
  if (clock) {
    return Number(clock[1]) * 60 + Number(clock[2]);
  }

  return undefined;
}

/**
 * Accepts both "8.7" and the decimal-comma form "8,7".
 */
export function parseDecimal(raw: string | number): number | undefined {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : undefined;
  }

  let value = raw.trim();
  if (!value.includes(".") && value.split(",").length === 2) {
    value = value.replace(",", ".");
  }
  return DECIMAL.test(value) ? Number(value) : undefined;
}

export function parseInteger(raw: string | number): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? raw : undefined;
  }
  const value = raw.trim();
  return INTEGER.test(value) ? Number(value) : undefined;
}

/**
 * "pg 13" -> "PG-13", "nc_17" -> "NC-17".
 */
export function canonicalRating(raw: string | number): string | undefined {
  const value = String(raw).trim();
  if (!value) {
    return undefined;
  }
  return value
    .toUpperCase()
    .replace(/[\s_]+/gu, "-")
    .replace(/-{2,}/gu, "-");
}

export function canonicalFlag(raw: string | number | boolean): SequelFlag | undefined {
  if (typeof raw === "boolean") {
    return raw ? "yes" : "no";
  }

  const token = String(raw).trim().toLowerCase();
  if (YES_TOKENS.has(token)) {
    return "yes";
  }
  if (NO_TOKENS.has(token)) {
    return "no";
  }
  return undefined;
}
