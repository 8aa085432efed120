export type ScalarValue = string | number;

export type AttributeValue = ScalarValue | readonly string[];

/**
 * A recorded case. Attributes missing from the record (or set to undefined)
 * are unknown for that case.
 */
export type CaseRecord = Readonly<Record<string, AttributeValue | undefined>>;

/**
 * A partial case describing what the user is looking for.
 */
export type Query = CaseRecord;

export type CaseBase<C extends CaseRecord = CaseRecord> = readonly C[];

/**
 * Weight per attribute name, each in [0, 1]. Weights need not sum to 1.
 */
export type WeightVector = Readonly<Record<string, number>>;

export interface SimilarityResult<C extends CaseRecord = CaseRecord> {
  readonly case: C;
  readonly score: number;
}
