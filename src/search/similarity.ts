import { ConfigurationError } from "../errors.js";
import { THUMBNAIL_EMBEDDING_FIELDS } from "../store/types.js";
import type { TextEmbeddingField } from "../store/types.js";
import {
  textTermsByField,
  type EmbeddingSet,
  type ScoreComponent,
  type ScorePlan,
} from "./plan.js";

/** Cosine similarity in [-1, 1]; 0 when either vector has zero norm. */
export const cosineSimilarity = (a: number[], b: number[]): number => {
  if (a.length !== b.length) {
    throw new ConfigurationError(
      `Cannot compare vectors of ${a.length} and ${b.length} dimensions`,
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/** Highest similarity of `vector` to any present thumbnail slot of `candidate`. */
export const crossSlotMax = (vector: number[], candidate: EmbeddingSet): number | null => {
  let best: number | null = null;
  for (const field of THUMBNAIL_EMBEDDING_FIELDS) {
    const slot = candidate[field];
    if (!slot) continue;
    const similarity = cosineSimilarity(vector, slot);
    if (best === null || similarity > best) {
      best = similarity;
    }
  }
  return best;
};

const evaluateComponent = (
  component: ScoreComponent,
  candidate: EmbeddingSet,
): number | null => {
  if (component.kind === "sum") {
    let total: number | null = null;
    for (const term of component.terms) {
      const stored = candidate[term.field];
      if (!stored) continue;
      total = (total ?? 0) + term.weight * cosineSimilarity(term.vector, stored);
    }
    return total;
  }

  let weighted: number | null = null;
  let weightTotal = 0;
  for (const term of component.terms) {
    weightTotal += term.weight;
    const best = crossSlotMax(term.vector, candidate);
    if (best === null) continue;
    weighted = (weighted ?? 0) + term.weight * best;
  }
  if (weighted === null || weightTotal === 0) {
    return null;
  }
  return weighted / weightTotal;
};

/** Raw cosine of each text column the plan compares, skipping absent columns. */
export const fieldSimilarities = (
  plan: ScorePlan,
  candidate: EmbeddingSet,
): Partial<Record<TextEmbeddingField, number>> => {
  const similarities: Partial<Record<TextEmbeddingField, number>> = {};
  for (const term of Object.values(textTermsByField(plan))) {
    if (!term) continue;
    const stored = candidate[term.field];
    if (stored) {
      similarities[term.field] = cosineSimilarity(term.vector, stored);
    }
  }
  return similarities;
};

/**
 * In-process evaluation of a score plan, with the same null semantics as the
 * SQL rendering in `db.ts`. Zero-norm vectors score 0 in both.
 */
export const evaluatePlan = (plan: ScorePlan, candidate: EmbeddingSet): number | null => {
  let score: number | null = null;
  for (const component of plan.components) {
    const value = evaluateComponent(component, candidate);
    if (value === null) continue;
    score = (score ?? 0) + component.factor * value;
  }
  return score;
};
