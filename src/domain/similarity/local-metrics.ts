import type { AttributeValue } from "../entities/case";
import type {
  AttributeKind,
  AttributeSpec,
  NumericRangeParams,
  OrdinalParams,
  SpecOfKind,
} from "./attribute-schema";

type MaybeValue = AttributeValue | null | undefined;

/**
 * Compares one attribute between a query and a case. Every metric returns a
 * value in [0, 1], is symmetric in its two values and never throws.
 */
export interface LocalMetric<K extends AttributeKind> {
  compare(a: MaybeValue, b: MaybeValue, spec: SpecOfKind<K>): number;
}

export function categoricalSimilarity(a: MaybeValue, b: MaybeValue): number {
  if (a === undefined || a === null || b === undefined || b === null) {
    return 0;
  }
  return sameValue(a, b) ? 1 : 0;
}

export function numericRangeSimilarity(
  a: MaybeValue,
  b: MaybeValue,
  { min, max }: NumericRangeParams,
): number {
  if (!isFiniteNumber(a) || !isFiniteNumber(b)) {
    return 0;
  }

  const span = max - min;
  if (span === 0) {
    return a === b ? 1 : 0;
  }

  // Query values outside [min, max] can push the raw score below zero.
  return Math.max(0, 1 - Math.abs(a - b) / span);
}

export function ordinalSimilarity(
  a: MaybeValue,
  b: MaybeValue,
  { orderedValues, fallbackUnknown }: OrdinalParams,
): number {
  const indexA = resolveOrdinalIndex(a, orderedValues, fallbackUnknown);
  const indexB = resolveOrdinalIndex(b, orderedValues, fallbackUnknown);

  if (indexA === undefined || indexB === undefined) {
    return sameValue(a, b) ? 1 : 0;
  }

  if (orderedValues.length === 1) {
    return 1;
  }

  return 1 - Math.abs(indexA - indexB) / (orderedValues.length - 1);
}

export function setJaccardSimilarity(a: MaybeValue, b: MaybeValue): number {
  const left = toStringSet(a);
  const right = toStringSet(b);

  if (left.size === 0 && right.size === 0) {
    return 1;
  }
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const value of left) {
    if (right.has(value)) {
      intersection += 1;
    }
  }

  const union = left.size + right.size - intersection;
  return intersection / union;
}

export const LOCAL_METRICS: { readonly [K in AttributeKind]: LocalMetric<K> } = {
  categorical: { compare: (a, b) => categoricalSimilarity(a, b) },
  numericRange: {
    compare: (a, b, spec) => numericRangeSimilarity(a, b, spec.params),
  },
  ordinal: { compare: (a, b, spec) => ordinalSimilarity(a, b, spec.params) },
  setJaccard: { compare: (a, b) => setJaccardSimilarity(a, b) },
};

/**
 * Dispatches to the metric registered for the spec's kind.
 */
export function localSimilarity(
  spec: AttributeSpec,
  a: MaybeValue,
  b: MaybeValue,
): number {
  switch (spec.kind) {
    case "categorical":
      return LOCAL_METRICS.categorical.compare(a, b, spec);
    case "numericRange":
      return LOCAL_METRICS.numericRange.compare(a, b, spec);
    case "ordinal":
      return LOCAL_METRICS.ordinal.compare(a, b, spec);
    case "setJaccard":
      return LOCAL_METRICS.setJaccard.compare(a, b, spec);
  }
}

export function normalizeOrdinalToken(value: string): string {
  return value.trim().toUpperCase().replace(/\s+/gu, "-");
}

function resolveOrdinalIndex(
  value: MaybeValue,
  orderedValues: readonly string[],
  fallbackUnknown: string,
): number | undefined {
  if (isStringList(value)) {
    return undefined;
  }

  let raw: string;
  if (value === undefined || value === null) {
    raw = fallbackUnknown;
  } else if (typeof value === "number") {
    raw = String(value);
  } else if (typeof value === "string") {
    raw = value.trim() === "" ? fallbackUnknown : value;
  } else {
    return undefined;
  }

  const direct = orderedValues.indexOf(raw);
  if (direct !== -1) {
    return direct;
  }

  const normalized = orderedValues.indexOf(normalizeOrdinalToken(raw));
  return normalized === -1 ? undefined : normalized;
}

function toStringSet(value: MaybeValue): Set<string> {
  const entries: readonly (string | number)[] =
    value === undefined || value === null
      ? []
      : isStringList(value)
        ? value
        : [value];

  const set = new Set<string>();
  for (const entry of entries) {
    const token = String(entry).trim();
    if (token) {
      set.add(token);
    }
  }
  return set;
}

function sameValue(a: MaybeValue, b: MaybeValue): boolean {
  if (isStringList(a) || isStringList(b)) {
    if (!isStringList(a) || !isStringList(b) || a.length !== b.length) {
      return false;
    }
    const other = b;
    return a.every((entry, index) => entry === other[index]);
  }
  return a === b;
}

function isStringList(value: MaybeValue): value is readonly string[] {
  return Array.isArray(value);
}

function isFiniteNumber(value: MaybeValue): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
