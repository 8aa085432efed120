import type {
  CaseBase,
  CaseRecord,
  Query,
  SimilarityResult,
  WeightVector,
} from "../entities/case";
import { aggregate } from "./aggregator";
import type { AttributeSchema } from "./attribute-schema";
import { snapshotWeights } from "./weight-vector";

/**
 * Scores every case in the base against the query and returns all of them,
 * best first. Equal scores keep the base's insertion order.
 */
export function retrieve<C extends CaseRecord>(
  query: Query,
  base: CaseBase<C>,
  weights: WeightVector,
  schema: AttributeSchema,
): SimilarityResult<C>[] {
  const snapshot = snapshotWeights(weights);

  return base
    .map((caseRecord, position) => ({
      position,
      result: Object.freeze({
        case: caseRecord,
        score: aggregate(query, caseRecord, snapshot, schema),
      }) satisfies SimilarityResult<C>,
    }))
    .sort((a, b) => {
      if (b.result.score !== a.result.score) {
        return b.result.score - a.result.score;
      }
      return a.position - b.position;
    })
    .map(({ result }) => result);
}
