import type { WeightVector } from "../entities/case";
import type { AttributeSchema } from "./attribute-schema";

/**
 * Frozen copy of a weight vector, used for the duration of one retrieval.
 */
export function snapshotWeights(weights: WeightVector): WeightVector {
  return Object.isFrozen(weights) ? weights : Object.freeze({ ...weights });
}

/**
 * Builds the next weight vector from a base vector and per-call overrides.
 * Overrides must name configured attributes and stay within [0, 1].
 */
export function applyWeightOverrides(
  base: WeightVector,
  overrides: Readonly<Record<string, number>> | undefined,
  schema: AttributeSchema,
): WeightVector {
  if (!overrides) {
    return snapshotWeights(base);
  }

  const next: Record<string, number> = { ...base };
  for (const [name, weight] of Object.entries(overrides)) {
    if (!schema.has(name)) {
      throw new Error(
        `Unknown attribute "${name}". Configured attributes: ${schema.attributeNames().join(", ")}.`,
      );
    }
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new Error(`Weight for "${name}" must be between 0.0 and 1.0.`);
    }
    next[name] = weight;
  }

  return Object.freeze(next);
}
