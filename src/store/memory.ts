import { randomUUID } from "node:crypto";

import type { ScorePlan } from "../search/plan.js";
import { evaluatePlan, fieldSimilarities } from "../search/similarity.js";
import {
  toListing,
  type ClipFilters,
  type ClipListing,
  type ClipRecord,
  type ClipStore,
  type ClipUpsert,
  type ListOptions,
  type RankOptions,
  type ScoredListing,
  type SortField,
} from "./types.js";

const BM25_K1 = 1.2;
const BM25_B = 0.75;

const tokenize = (text: string): string[] => text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

const indexedText = (clip: ClipRecord) =>
  [clip.searchableContent, clip.fileName, clip.contentSummary, clip.transcriptPreview]
    .filter((value): value is string => Boolean(value))
    .join(" ");

const matchesFilters = (clip: ClipRecord, filters?: ClipFilters): boolean => {
  if (!filters) return true;
  if (filters.contentCategory !== undefined && clip.contentCategory !== filters.contentCategory) {
    return false;
  }
  if (filters.cameraMake !== undefined && clip.cameraMake !== filters.cameraMake) {
    return false;
  }
  if (filters.cameraModel !== undefined && clip.cameraModel !== filters.cameraModel) {
    return false;
  }
  if (filters.processedAfter !== undefined) {
    if (!clip.processedAt || clip.processedAt < filters.processedAfter) return false;
  }
  if (filters.processedBefore !== undefined) {
    if (!clip.processedAt || clip.processedAt > filters.processedBefore) return false;
  }
  if (filters.minDurationSeconds !== undefined) {
    if (clip.durationSeconds === null || clip.durationSeconds < filters.minDurationSeconds) {
      return false;
    }
  }
  if (filters.maxDurationSeconds !== undefined) {
    if (clip.durationSeconds === null || clip.durationSeconds > filters.maxDurationSeconds) {
      return false;
    }
  }
  return true;
};

const sortValue = (clip: ClipRecord, field: SortField): string | number | null => {
  switch (field) {
    case "processed_at":
      return clip.processedAt ? clip.processedAt.getTime() : null;
    case "file_name":
      return clip.fileName;
    case "duration_seconds":
      return clip.durationSeconds;
    case "created_at":
      return clip.createdAt.getTime();
  }
};

const compareIds = (a: { id: string }, b: { id: string }) =>
  a.id < b.id ? -1 : a.id > b.id ? 1 : 0;

const byScoreThenId = (a: ScoredListing, b: ScoredListing) =>
  b.score - a.score || compareIds(a.clip, b.clip);

/**
 * Process-local `ClipStore`. Full-text relevance is Okapi BM25 over the same
 * fields the Postgres `search_vector` column indexes; vector ranking evaluates
 * the score plan directly. Used by the tests and for running without a
 * database.
 */
export class InMemoryClipStore implements ClipStore {
  private readonly rows = new Map<string, ClipRecord>();

  constructor(
    seed: ClipRecord[] = [],
    private readonly now: () => Date = () => new Date(),
  ) {
    for (const record of seed) {
      this.rows.set(record.id, record);
    }
  }

  private filtered(filters?: ClipFilters) {
    return Array.from(this.rows.values()).filter((clip) => matchesFilters(clip, filters));
  }

  async fulltextSearch(
    query: string,
    options: { limit: number; filters?: ClipFilters },
  ): Promise<ScoredListing[]> {
    const terms = Array.from(new Set(tokenize(query)));
    if (terms.length === 0) {
      return [];
    }

    const documents = Array.from(this.rows.values()).map((clip) => ({
      clip,
      tokens: tokenize(indexedText(clip)),
    }));
    if (documents.length === 0) {
      return [];
    }

    const averageLength =
      documents.reduce((total, doc) => total + doc.tokens.length, 0) / documents.length;
    const documentFrequency = new Map<string, number>();
    for (const term of terms) {
      documentFrequency.set(term, documents.filter((doc) => doc.tokens.includes(term)).length);
    }

    const results: ScoredListing[] = [];
    for (const { clip, tokens } of documents) {
      if (!matchesFilters(clip, options.filters)) continue;

      let score = 0;
      for (const term of terms) {
        const frequency = tokens.filter((token) => token === term).length;
        if (frequency === 0) continue;
        const containing = documentFrequency.get(term) ?? 0;
        const idf = Math.log(1 + (documents.length - containing + 0.5) / (containing + 0.5));
        const lengthNorm = 1 - BM25_B + (BM25_B * tokens.length) / (averageLength || 1);
        score += (idf * frequency * (BM25_K1 + 1)) / (frequency + BM25_K1 * lengthNorm);
      }

      if (score > 0) {
        results.push({ clip: toListing(clip), score });
      }
    }

    return results.sort(byScoreThenId).slice(0, options.limit);
  }

  async rankByPlan(plan: ScorePlan, options: RankOptions): Promise<ScoredListing[]> {
    const results: ScoredListing[] = [];
    for (const clip of this.filtered(options.filters)) {
      if (clip.id === options.excludeId) continue;
      const score = evaluatePlan(plan, clip);
      if (score === null || score < options.threshold) continue;
      results.push({
        clip: toListing(clip),
        score,
        fieldSimilarities: fieldSimilarities(plan, clip),
      });
    }
    return results.sort(byScoreThenId).slice(0, options.limit);
  }

  async getClip(id: string): Promise<ClipRecord | null> {
    return this.rows.get(id) ?? null;
  }

  async getListingsByIds(ids: string[]): Promise<ClipListing[]> {
    return ids.flatMap((id) => {
      const clip = this.rows.get(id);
      return clip ? [toListing(clip)] : [];
    });
  }

  async listClips(options: ListOptions): Promise<{ clips: ClipListing[]; total: number }> {
    const direction = options.sortOrder === "ascending" ? 1 : -1;
    const matching = this.filtered(options.filters).sort((a, b) => {
      const left = sortValue(a, options.sortBy);
      const right = sortValue(b, options.sortBy);
      // NULLS LAST in either direction
      if (left === null && right === null) return compareIds(a, b);
      if (left === null) return 1;
      if (right === null) return -1;
      if (left < right) return -direction;
      if (left > right) return direction;
      return compareIds(a, b);
    });

    return {
      clips: matching.slice(options.offset, options.offset + options.limit).map(toListing),
      total: matching.length,
    };
  }

  async upsertClip(input: ClipUpsert): Promise<{ clip: ClipRecord; created: boolean }> {
    const timestamp = this.now();
    const existing = Array.from(this.rows.values()).find(
      (clip) => clip.checksum === input.checksum,
    );

    const clip: ClipRecord = existing
      ? { ...input, id: existing.id, createdAt: existing.createdAt, updatedAt: timestamp }
      : { ...input, id: randomUUID(), createdAt: timestamp, updatedAt: timestamp };

    this.rows.set(clip.id, clip);
    return { clip, created: !existing };
  }

  async deleteClip(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}
