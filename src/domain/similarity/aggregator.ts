import type {
  AttributeValue,
  CaseRecord,
  Query,
  WeightVector,
} from "../entities/case";
import type { AttributeSchema, AttributeSpec } from "./attribute-schema";
import { localSimilarity } from "./local-metrics";

/**
 * How one attribute stands for a given (query, case) pair.
 */
export type AttributeState =
  | {
      readonly state: "present";
      readonly spec: AttributeSpec;
      readonly queryValue: AttributeValue;
      readonly caseValue: AttributeValue;
    }
  | { readonly state: "absent"; readonly spec: AttributeSpec }
  | { readonly state: "unconfigured" };

export type SkipReason = "zeroWeight" | "absent" | "unconfigured";

export interface AttributeContribution {
  readonly attribute: string;
  readonly weight: number;
  readonly similarity: number;
}

export interface SkippedAttribute {
  readonly attribute: string;
  readonly reason: SkipReason;
}

export interface AggregateBreakdown {
  readonly score: number;
  readonly effectiveWeight: number;
  readonly contributions: readonly AttributeContribution[];
  readonly skipped: readonly SkippedAttribute[];
}

export function resolveAttributeState(
  name: string,
  query: Query,
  caseRecord: CaseRecord,
  schema: AttributeSchema,
): AttributeState {
  const spec = schema.lookup(name);
  if (!spec) {
    return { state: "unconfigured" };
  }

  const queryValue = query[name];
  const caseValue = caseRecord[name];
  if (queryValue === undefined || caseValue === undefined) {
    return { state: "absent", spec };
  }

  return { state: "present", spec, queryValue, caseValue };
}

/**
 * Weighted mean of the local similarities over the attributes that are
 * weighted, configured and valued on both sides. Weights renormalise over
 * those attributes only.
 */
export function explainAggregate(
  query: Query,
  caseRecord: CaseRecord,
  weights: WeightVector,
  schema: AttributeSchema,
): AggregateBreakdown {
  const contributions: AttributeContribution[] = [];
  const skipped: SkippedAttribute[] = [];
  let numerator = 0;
  let effectiveWeight = 0;

  for (const [attribute, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight <= 0) {
      skipped.push({ attribute, reason: "zeroWeight" });
      continue;
    }

    const resolved = resolveAttributeState(attribute, query, caseRecord, schema);
    if (resolved.state !== "present") {
      skipped.push({ attribute, reason: resolved.state });
      continue;
    }

    const similarity = localSimilarity(
      resolved.spec,
      resolved.queryValue,
      resolved.caseValue,
    );
    numerator += weight * similarity;
    effectiveWeight += weight;
    contributions.push({ attribute, weight, similarity });
  }

  const score =
    effectiveWeight === 0
      ? 0
      : Math.min(1, Math.max(0, numerator / effectiveWeight));

  return { score, effectiveWeight, contributions, skipped };
}

export function aggregate(
  query: Query,
  caseRecord: CaseRecord,
  weights: WeightVector,
  schema: AttributeSchema,
): number {
  return explainAggregate(query, caseRecord, weights, schema).score;
}
