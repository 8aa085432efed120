import type { CaseBase, CaseRecord, WeightVector } from "../entities/case";

export type AttributeKind =
  | "categorical"
  | "numericRange"
  | "ordinal"
  | "setJaccard";

export interface NumericRangeParams {
  readonly min: number;
  readonly max: number;
}

export interface OrdinalParams {
  readonly orderedValues: readonly string[];
  readonly fallbackUnknown: string;
}

export type AttributeSpec =
  | { readonly name: string; readonly kind: "categorical" }
  | {
      readonly name: string;
      readonly kind: "numericRange";
      readonly params: NumericRangeParams;
    }
  | {
      readonly name: string;
      readonly kind: "ordinal";
      readonly params: OrdinalParams;
    }
  | { readonly name: string; readonly kind: "setJaccard" };

export type SpecOfKind<K extends AttributeKind> = Extract<
  AttributeSpec,
  { kind: K }
>;

export interface AttributeDefinition {
  readonly spec: AttributeSpec;
  readonly defaultWeight: number;
}

/**
 * Registry of configured attributes. Lookups for names that were never
 * declared return undefined, which the aggregator treats as "skip".
 */
export class AttributeSchema {
  private readonly definitions = new Map<string, AttributeDefinition>();

  constructor(definitions: readonly AttributeDefinition[]) {
    for (const definition of definitions) {
      const { spec, defaultWeight } = definition;
      if (this.definitions.has(spec.name)) {
        throw new Error(`Attribute "${spec.name}" is declared more than once.`);
      }
      validateSpec(spec);
      if (
        !Number.isFinite(defaultWeight) ||
        defaultWeight < 0 ||
        defaultWeight > 1
      ) {
        throw new Error(
          `Default weight for "${spec.name}" must be between 0 and 1, got ${defaultWeight}.`,
        );
      }
      this.definitions.set(spec.name, definition);
    }
  }

  lookup(name: string): AttributeSpec | undefined {
    return this.definitions.get(name)?.spec;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  attributeNames(): string[] {
    return Array.from(this.definitions.keys());
  }

  specs(): AttributeSpec[] {
    return Array.from(this.definitions.values(), (definition) => definition.spec);
  }

  defaultWeights(): WeightVector {
    const weights: Record<string, number> = {};
    for (const [name, definition] of this.definitions) {
      weights[name] = definition.defaultWeight;
    }
    return Object.freeze(weights);
  }

  /**
   * Returns a copy whose numeric bounds are the min and max observed in the
   * given base. Attributes without any numeric observation keep their bounds.
   */
  withBoundsFrom<C extends CaseRecord>(base: CaseBase<C>): AttributeSchema {
    const definitions = Array.from(this.definitions.values(), (definition) => {
      const { spec } = definition;
      if (spec.kind !== "numericRange") {
        return definition;
      }

      const observed = base
        .map((record) => record[spec.name])
        .filter(
          (value): value is number =>
            typeof value === "number" && Number.isFinite(value),
        );
      if (observed.length === 0) {
        return definition;
      }

      return {
        ...definition,
        spec: {
          ...spec,
          params: {
            min: Math.min(...observed),
            max: Math.max(...observed),
          },
        },
      } satisfies AttributeDefinition;
    });

    return new AttributeSchema(definitions);
  }
}

function validateSpec(spec: AttributeSpec): void {
  switch (spec.kind) {
    case "numericRange": {
      const { min, max } = spec.params;
      if (!Number.isFinite(min) || !Number.isFinite(max) || max < min) {
        throw new Error(
          `Numeric attribute "${spec.name}" needs finite bounds with max >= min, got [${min}, ${max}].`,
        );
      }
      return;
    }
    case "ordinal": {
      const { orderedValues } = spec.params;
      if (new Set(orderedValues).size !== orderedValues.length) {
        throw new Error(
          `Ordinal attribute "${spec.name}" has duplicate ordered values.`,
        );
      }
      return;
    }
    case "categorical":
    case "setJaccard":
      return;
  }
}
