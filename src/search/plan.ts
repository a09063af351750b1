import {
  TEXT_EMBEDDING_DIMENSIONS,
  VISUAL_EMBEDDING_DIMENSIONS,
} from "../db/schema.js";
import { ConfigurationError } from "../errors.js";
import {
  THUMBNAIL_EMBEDDING_FIELDS,
  type EmbeddingField,
  type ClipRecord,
  type TextEmbeddingField,
} from "../store/types.js";

// A score plan is the only thing a store needs to rank candidates. Stores
// render it into a fixed query template (or evaluate it in process); column
// names never come from caller input, only from the field unions below.

export type EmbeddingSpace = "text" | "visual";

const SPACE_DIMENSIONS: Record<EmbeddingSpace, number> = {
  text: TEXT_EMBEDDING_DIMENSIONS,
  visual: VISUAL_EMBEDDING_DIMENSIONS,
};

/** weight × cosine(vector, stored column) */
export type ColumnTerm = {
  field: TextEmbeddingField;
  vector: number[];
  weight: number;
};

/** weight × max over the candidate's thumbnail slots of cosine(vector, slot) */
export type CrossSlotTerm = {
  vector: number[];
  weight: number;
};

export type ScoreComponent =
  | { kind: "sum"; factor: number; terms: ColumnTerm[] }
  | { kind: "crossSlotMean"; factor: number; terms: CrossSlotTerm[] };

/**
 * score = Σ factor × component over the components that are non-null for a
 * candidate; null when every component is null.
 *
 * - `sum`: Σ weight × similarity over the terms whose column is present.
 * - `crossSlotMean`: Σ weight × max-slot similarity / Σ weight.
 */
export type ScorePlan = {
  components: ScoreComponent[];
};

export type SimilarMode = "text" | "visual" | "combined";

export type SemanticQuery = {
  summaryVector?: number[] | null;
  keywordVector?: number[] | null;
  summaryWeight: number;
  keywordWeight: number;
};

export type SimilarWeights = {
  textSummaryWeight: number;
  textKeywordWeight: number;
  visualThumb1Weight: number;
  visualThumb2Weight: number;
  visualThumb3Weight: number;
  combinedTextFactor: number;
  combinedVisualFactor: number;
};

export type EmbeddingSet = Pick<ClipRecord, EmbeddingField>;

export const assertDimensions = (
  vector: number[],
  space: EmbeddingSpace,
  label: string,
) => {
  const expected = SPACE_DIMENSIONS[space];
  if (vector.length !== expected) {
    throw new ConfigurationError(
      `${label} has ${vector.length} dimensions but the ${space} space stores ${expected}`,
    );
  }
};

const assertWeight = (weight: number, label: string) => {
  if (!Number.isFinite(weight) || weight < 0) {
    throw new ConfigurationError(`${label} must be a non-negative number, got ${weight}`);
  }
};

const columnTerms = (
  candidates: Array<{ field: TextEmbeddingField; vector?: number[] | null; weight: number }>,
): ColumnTerm[] => {
  const terms: ColumnTerm[] = [];
  for (const { field, vector, weight } of candidates) {
    assertWeight(weight, `${field} weight`);
    if (!vector || weight === 0) {
      continue;
    }
    assertDimensions(vector, "text", field);
    terms.push({ field, vector, weight });
  }
  return terms;
};

/** Returns null when no (vector, weight) pair can contribute. */
export const semanticPlan = (query: SemanticQuery): ScorePlan | null => {
  const terms = columnTerms([
    { field: "summaryEmbedding", vector: query.summaryVector, weight: query.summaryWeight },
    { field: "keywordEmbedding", vector: query.keywordVector, weight: query.keywordWeight },
  ]);
  if (terms.length === 0) {
    return null;
  }
  return { components: [{ kind: "sum", factor: 1, terms }] };
};

const textComponent = (
  source: EmbeddingSet,
  weights: SimilarWeights,
  factor: number,
): ScoreComponent | null => {
  const terms = columnTerms([
    { field: "summaryEmbedding", vector: source.summaryEmbedding, weight: weights.textSummaryWeight },
    { field: "keywordEmbedding", vector: source.keywordEmbedding, weight: weights.textKeywordWeight },
  ]);
  return terms.length > 0 ? { kind: "sum", factor, terms } : null;
};

const visualComponent = (
  source: EmbeddingSet,
  weights: SimilarWeights,
  factor: number,
): ScoreComponent | null => {
  const slotWeights = [
    weights.visualThumb1Weight,
    weights.visualThumb2Weight,
    weights.visualThumb3Weight,
  ];
  const terms: CrossSlotTerm[] = [];
  THUMBNAIL_EMBEDDING_FIELDS.forEach((field, index) => {
    const weight = slotWeights[index] ?? 0;
    assertWeight(weight, `${field} weight`);
    const vector = source[field];
    if (!vector || weight === 0) {
      return;
    }
    assertDimensions(vector, "visual", field);
    terms.push({ vector, weight });
  });
  return terms.length > 0 ? { kind: "crossSlotMean", factor, terms } : null;
};

const similarComponents = (
  source: EmbeddingSet,
  mode: SimilarMode,
  weights: SimilarWeights,
): Array<ScoreComponent | null> => {
  switch (mode) {
    case "text":
      return [textComponent(source, weights, 1)];
    case "visual":
      return [visualComponent(source, weights, 1)];
    case "combined":
      assertWeight(weights.combinedTextFactor, "combinedTextFactor");
      assertWeight(weights.combinedVisualFactor, "combinedVisualFactor");
      return [
        weights.combinedTextFactor > 0
          ? textComponent(source, weights, weights.combinedTextFactor)
          : null,
        weights.combinedVisualFactor > 0
          ? visualComponent(source, weights, weights.combinedVisualFactor)
          : null,
      ];
  }
};

/**
 * Builds the plan comparing every other clip against `source`. Returns null
 * when the source lacks every embedding the mode needs; the caller must not
 * fall back to a different mode.
 */
export const similarPlan = (
  source: EmbeddingSet,
  mode: SimilarMode,
  weights: SimilarWeights,
): ScorePlan | null => {
  const present = similarComponents(source, mode, weights).filter(
    (component): component is ScoreComponent => component !== null,
  );
  return present.length > 0 ? { components: present } : null;
};

/** First term per text column across the plan's `sum` components. */
export const textTermsByField = (
  plan: ScorePlan,
): Partial<Record<TextEmbeddingField, ColumnTerm>> => {
  const terms: Partial<Record<TextEmbeddingField, ColumnTerm>> = {};
  for (const component of plan.components) {
    if (component.kind !== "sum") continue;
    for (const term of component.terms) {
      terms[term.field] ??= term;
    }
  }
  return terms;
};

/** Loggable shape of a plan without the vectors. */
export const describePlan = (plan: ScorePlan) =>
  plan.components.map((component) => ({
    kind: component.kind,
    factor: component.factor,
    weights: component.terms.map((term) => term.weight),
  }));
