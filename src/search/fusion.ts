/**
 * Reciprocal Rank Fusion
 *
 * score(id) = Σ over lists L containing id of weight_L / (k + rank_L(id))
 *
 * Fusion works on ranks rather than raw scores, so BM25-style relevance and
 * cosine similarity never need to be put on a common scale. A larger k
 * flattens the difference between neighbouring ranks.
 */

import { ConfigurationError } from "../errors.js";

export type FusionSource = "fulltext" | "summary" | "keyword";

export type RankedEntry = {
  id: string;
  /** 1 = best */
  rank: number;
  score: number;
};

export type RankedList = {
  source: FusionSource;
  weight: number;
  entries: RankedEntry[];
};

export type FusedEntry = {
  id: string;
  score: number;
  contributions: Partial<Record<FusionSource, { rank: number; score: number }>>;
};

/**
 * Ranks `items` by score, highest first. Equal scores keep their input order,
 * and a repeated id keeps only its best position.
 */
export const toRankedList = (
  source: FusionSource,
  weight: number,
  items: Array<{ id: string; score: number }>,
): RankedList => {
  const sorted = [...items].sort((a, b) => b.score - a.score);
  const seen = new Set<string>();
  const entries: RankedEntry[] = [];
  for (const item of sorted) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    entries.push({ id: item.id, rank: entries.length + 1, score: item.score });
  }
  return { source, weight, entries };
};

export const fuse = (lists: RankedList[], k: number): FusedEntry[] => {
  if (!Number.isFinite(k) || k < 0) {
    throw new ConfigurationError(`RRF constant k must be a non-negative number, got ${k}`);
  }

  const fused = new Map<string, FusedEntry>();

  for (const list of lists) {
    if (!Number.isFinite(list.weight) || list.weight < 0) {
      throw new ConfigurationError(
        `Weight for ${list.source} must be a non-negative number, got ${list.weight}`,
      );
    }

    const seen = new Set<string>();
    for (const entry of list.entries) {
      if (seen.has(entry.id)) continue;
      seen.add(entry.id);
      if (entry.rank < 1) {
        throw new ConfigurationError(`Ranks start at 1, got ${entry.rank} for ${entry.id}`);
      }

      const contribution = list.weight / (k + entry.rank);
      const existing = fused.get(entry.id);
      if (existing) {
        existing.score += contribution;
        existing.contributions[list.source] = { rank: entry.rank, score: entry.score };
      } else {
        fused.set(entry.id, {
          id: entry.id,
          score: contribution,
          contributions: { [list.source]: { rank: entry.rank, score: entry.score } },
        });
      }
    }
  }

  // A row only reached through zero-weight lists has nothing to rank on.
  return Array.from(fused.values())
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score);
};
