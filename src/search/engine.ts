import type { EmbeddingClient } from "../embeddings.js";
import { ConfigurationError, withDeadline } from "../errors.js";
import { logger } from "../logger.js";
import type {
  ClipFilters,
  ClipListing,
  ClipRecord,
  ClipStore,
  ScoredListing,
} from "../store/types.js";
import { fuse, toRankedList, type FusionSource, type RankedList } from "./fusion.js";
import { describePlan, semanticPlan, similarPlan, type ScorePlan, type SimilarMode } from "./plan.js";
import {
  resolveSearchSettings,
  type SearchSettings,
  type SearchSettingsOverrides,
} from "./settings.js";

export type SearchMode = "fulltext" | "semantic" | "hybrid";

export type FailureSource =
  | "fulltext"
  | "summary"
  | "keyword"
  | "summary_embedding"
  | "keyword_embedding"
  | "listing"
  | "similar"
  | "source";

/**
 * - `ok`: every attempted source answered (results may still be empty)
 * - `degraded`: some sources failed, the rest answered
 * - `failed`: nothing answered
 * - `not_found`: the referenced clip does not exist
 */
export type OutcomeStatus = "ok" | "degraded" | "failed" | "not_found";

export type SearchOutcome<T> = {
  status: OutcomeStatus;
  results: T[];
  failures: FailureSource[];
};

export type FulltextHit = { kind: "fulltext"; clip: ClipListing; ftsScore: number };

export type SemanticHit = {
  kind: "semantic";
  clip: ClipListing;
  combinedSimilarity: number;
  summarySimilarity?: number;
  keywordSimilarity?: number;
};

export type HybridHit = {
  kind: "hybrid";
  clip: ClipListing;
  similarityScore: number;
  searchRank: number;
  ftsScore?: number;
  summarySimilarity?: number;
  keywordSimilarity?: number;
};

export type SimilarHit = {
  kind: "similar";
  clip: ClipListing;
  similarityScore: number;
  searchRank: number;
  mode: SimilarMode;
};

export type SearchHit = FulltextHit | SemanticHit | HybridHit;

export type SearchOptions = {
  limit?: number;
  filters?: ClipFilters;
  overrides?: SearchSettingsOverrides;
};

export type QueryVectors = {
  summaryVector?: number[] | null;
  keywordVector?: number[] | null;
};

type RequestContext = {
  settings: SearchSettings;
  limit: number;
  filters?: ClipFilters;
};

/** Summary embeddings are built from descriptive prose; the query is phrased to match. */
export const summaryQueryText = (query: string) => `Video content about: ${query}`;

const settle = <T>(results: T[], failures: FailureSource[], answered: number): SearchOutcome<T> => ({
  status: failures.length === 0 ? "ok" : answered > 0 ? "degraded" : "failed",
  results,
  failures,
});

const empty = <T>(status: OutcomeStatus = "ok", failures: FailureSource[] = []): SearchOutcome<T> => ({
  status,
  results: [],
  failures,
});

const pairSimilarities = ({ fieldSimilarities }: ScoredListing) => ({
  ...(fieldSimilarities?.summaryEmbedding !== undefined
    ? { summarySimilarity: fieldSimilarities.summaryEmbedding }
    : {}),
  ...(fieldSimilarities?.keywordEmbedding !== undefined
    ? { keywordSimilarity: fieldSimilarities.keywordEmbedding }
    : {}),
});

type SourceResult =
  | { ok: true; rows: ScoredListing[] }
  | { ok: false };

export class SearchEngine {
  private readonly store: ClipStore;
  private readonly textEmbeddings: EmbeddingClient;
  private readonly settings: SearchSettings;

  constructor(deps: {
    store: ClipStore;
    textEmbeddings: EmbeddingClient;
    settings: SearchSettings;
  }) {
    if (deps.textEmbeddings.space !== "text") {
      throw new ConfigurationError(
        `Query embeddings must come from the text space, got ${deps.textEmbeddings.space}`,
      );
    }
    this.store = deps.store;
    this.textEmbeddings = deps.textEmbeddings;
    this.settings = deps.settings;
  }

  get effectiveSettings(): SearchSettings {
    return this.settings;
  }

  private context(options: SearchOptions, extra?: SearchSettingsOverrides): RequestContext {
    const settings =
      options.overrides || extra
        ? resolveSearchSettings(this.settings, options.overrides ?? {}, extra ?? {})
        : this.settings;

    const requested = options.limit ?? settings.defaultMatchCount;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new ConfigurationError(`Result limit must be a positive integer, got ${requested}`);
    }

    let limit = requested;
    if (requested > settings.maxMatchCount) {
      logger.warn("search", "Requested limit exceeds maximum, clamping", {
        requested,
        max: settings.maxMatchCount,
      });
      limit = settings.maxMatchCount;
    }

    return { settings, limit, filters: options.filters };
  }

  private async runFulltext(
    query: string,
    limit: number,
    filters?: ClipFilters,
  ): Promise<SourceResult> {
    try {
      const rows = await this.store.fulltextSearch(query, { limit, filters });
      return { ok: true, rows };
    } catch (error) {
      logger.error("search", "Full-text query failed", { query, error });
      return { ok: false };
    }
  }

  private async runPlan(
    plan: ScorePlan,
    options: { limit: number; threshold: number; excludeId?: string; filters?: ClipFilters },
    label: string,
  ): Promise<SourceResult> {
    try {
      const rows = await this.store.rankByPlan(plan, options);
      logger.debug("search", `${label} ranking returned rows`, {
        count: rows.length,
        plan: describePlan(plan),
        threshold: options.threshold,
      });
      return { ok: true, rows };
    } catch (error) {
      logger.error("search", `${label} ranking failed`, { error });
      return { ok: false };
    }
  }

  async fulltextSearch(
    query: string,
    options: SearchOptions = {},
  ): Promise<SearchOutcome<FulltextHit>> {
    const trimmed = query.trim();
    if (!trimmed) {
      return empty();
    }
    return this.rankFulltext(trimmed, this.context(options));
  }

  private async rankFulltext(
    query: string,
    { limit, filters }: RequestContext,
  ): Promise<SearchOutcome<FulltextHit>> {
    const result = await this.runFulltext(query, limit, filters);
    if (!result.ok) {
      return empty("failed", ["fulltext"]);
    }

    logger.info("search", "Full-text search completed", { query, count: result.rows.length });
    return settle(
      result.rows.map(({ clip, score }): FulltextHit => ({ kind: "fulltext", clip, ftsScore: score })),
      [],
      1,
    );
  }

  async semanticSearch(
    vectors: QueryVectors,
    options: SearchOptions = {},
  ): Promise<SearchOutcome<SemanticHit>> {
    return this.rankSemantic(vectors, this.context(options));
  }

  private async rankSemantic(
    vectors: QueryVectors,
    { settings, limit, filters }: RequestContext,
  ): Promise<SearchOutcome<SemanticHit>> {
    const plan = semanticPlan({
      summaryVector: vectors.summaryVector,
      keywordVector: vectors.keywordVector,
      summaryWeight: settings.summaryWeight,
      keywordWeight: settings.keywordWeight,
    });
    if (!plan) {
      logger.warn("search", "Semantic search has no query vector with a positive weight");
      return empty();
    }

    const result = await this.runPlan(
      plan,
      { limit, threshold: settings.similarityThreshold, filters },
      "Semantic",
    );
    if (!result.ok) {
      const failures: FailureSource[] = [];
      if (vectors.summaryVector && settings.summaryWeight > 0) failures.push("summary");
      if (vectors.keywordVector && settings.keywordWeight > 0) failures.push("keyword");
      return empty("failed", failures);
    }

    return settle(
      result.rows.map((row): SemanticHit => ({
        kind: "semantic",
        clip: row.clip,
        combinedSimilarity: row.score,
        ...pairSimilarities(row),
      })),
      [],
      1,
    );
  }

  async hybridSearch(
    query: string,
    vectors: QueryVectors,
    options: SearchOptions = {},
  ): Promise<SearchOutcome<HybridHit>> {
    return this.rankHybrid(query, vectors, this.context(options));
  }

  private async rankHybrid(
    query: string,
    vectors: QueryVectors,
    { settings, limit, filters }: RequestContext,
  ): Promise<SearchOutcome<HybridHit>> {
    const fetchLimit = limit * settings.overfetchFactor;
    const trimmed = query.trim();

    const isolated = (vector: number[] | null | undefined, field: "summary" | "keyword") => {
      const weight = field === "summary" ? settings.summaryWeight : settings.keywordWeight;
      if (!vector || weight === 0) return null;
      return semanticPlan(
        field === "summary"
          ? { summaryVector: vector, summaryWeight: 1, keywordWeight: 0 }
          : { keywordVector: vector, summaryWeight: 0, keywordWeight: 1 },
      );
    };

    const summaryPlan = isolated(vectors.summaryVector, "summary");
    const keywordPlan = isolated(vectors.keywordVector, "keyword");
    const threshold = settings.similarityThreshold;

    const [fulltext, summary, keyword] = await Promise.all([
      trimmed ? this.runFulltext(trimmed, fetchLimit, filters) : null,
      summaryPlan
        ? this.runPlan(summaryPlan, { limit: fetchLimit, threshold, filters }, "Summary")
        : null,
      keywordPlan
        ? this.runPlan(keywordPlan, { limit: fetchLimit, threshold, filters }, "Keyword")
        : null,
    ]);

    const sources: Array<[FusionSource, number, SourceResult | null]> = [
      ["fulltext", settings.fulltextWeight, fulltext],
      ["summary", settings.summaryWeight, summary],
      ["keyword", settings.keywordWeight, keyword],
    ];

    const failures: FailureSource[] = [];
    const lists: RankedList[] = [];
    for (const [source, weight, result] of sources) {
      if (!result) continue;
      if (!result.ok) {
        failures.push(source);
        continue;
      }
      lists.push(
        toRankedList(
          source,
          weight,
          result.rows.map(({ clip, score }) => ({ id: clip.id, score })),
        ),
      );
    }

    const fused = fuse(lists, settings.rrfK).slice(0, limit);
    logger.info("search", "Hybrid fusion completed", {
      query: trimmed,
      lists: lists.map((list) => ({ source: list.source, count: list.entries.length })),
      fused: fused.length,
      failures,
    });

    if (fused.length === 0) {
      return settle([], failures, lists.length);
    }

    let listings: ClipListing[];
    try {
      listings = await this.store.getListingsByIds(fused.map((entry) => entry.id));
    } catch (error) {
      logger.error("search", "Hybrid result fetch failed", { error });
      return empty("failed", [...failures, "listing"]);
    }

    const byId = new Map(listings.map((clip) => [clip.id, clip]));
    const results: HybridHit[] = [];
    for (const entry of fused) {
      const clip = byId.get(entry.id);
      if (!clip) {
        logger.warn("search", "Fused clip missing from result fetch", { id: entry.id });
        continue;
      }
      const { fulltext: fts, summary: sum, keyword: kw } = entry.contributions;
      results.push({
        kind: "hybrid",
        clip,
        similarityScore: entry.score,
        searchRank: results.length + 1,
        ...(fts ? { ftsScore: fts.score } : {}),
        ...(sum ? { summarySimilarity: sum.score } : {}),
        ...(kw ? { keywordSimilarity: kw.score } : {}),
      });
    }

    return settle(results, failures, lists.length);
  }

  private async embedQuery(
    query: string,
    settings: SearchSettings,
  ): Promise<{ vectors: QueryVectors; failures: FailureSource[] }> {
    const [summaryVector, keywordVector] = await Promise.all([
      settings.summaryWeight > 0
        ? this.textEmbeddings.embedText(summaryQueryText(query))
        : null,
      settings.keywordWeight > 0 ? this.textEmbeddings.embedText(query) : null,
    ]);

    const failures: FailureSource[] = [];
    if (settings.summaryWeight > 0 && !summaryVector) failures.push("summary_embedding");
    if (settings.keywordWeight > 0 && !keywordVector) failures.push("keyword_embedding");
    if (failures.length > 0) {
      logger.warn("search", "Query embedding unavailable, continuing without it", {
        failures,
      });
    }
    return { vectors: { summaryVector, keywordVector }, failures };
  }

  /**
   * Entry point for free-text queries. Bounded by `requestTimeoutMs`; on expiry
   * rejects with `SearchTimeoutError` and returns nothing partial.
   */
  async search(
    query: string,
    mode: SearchMode,
    options: SearchOptions = {},
  ): Promise<SearchOutcome<SearchHit>> {
    const context = this.context(options);
    return withDeadline(
      `${mode} search`,
      this.dispatch(query, mode, context),
      context.settings.requestTimeoutMs,
    );
  }

  private async dispatch(
    query: string,
    mode: SearchMode,
    context: RequestContext,
  ): Promise<SearchOutcome<SearchHit>> {
    const trimmed = query.trim();
    if (!trimmed) {
      return empty();
    }
    if (mode === "fulltext") {
      return this.rankFulltext(trimmed, context);
    }

    const { vectors, failures: embeddingFailures } = await this.embedQuery(
      trimmed,
      context.settings,
    );

    if (mode === "semantic") {
      // Failed only when an embedding was attempted and none came back.
      if (embeddingFailures.length > 0 && !vectors.summaryVector && !vectors.keywordVector) {
        return empty("failed", embeddingFailures);
      }
      const outcome = await this.rankSemantic(vectors, context);
      return this.withEmbeddingFailures(outcome, embeddingFailures);
    }

    const outcome = await this.rankHybrid(trimmed, vectors, context);
    return this.withEmbeddingFailures(outcome, embeddingFailures);
  }

  private withEmbeddingFailures<T>(
    outcome: SearchOutcome<T>,
    embeddingFailures: FailureSource[],
  ): SearchOutcome<T> {
    if (embeddingFailures.length === 0) {
      return outcome;
    }
    return {
      status: outcome.status === "ok" ? "degraded" : outcome.status,
      results: outcome.results,
      failures: [...embeddingFailures, ...outcome.failures],
    };
  }

  /**
   * Ranks every other clip against the stored embeddings of `sourceId`. An
   * unknown source is `not_found`; a source without the embeddings `mode`
   * needs yields an empty `ok` outcome.
   */
  async findSimilar(
    sourceId: string,
    mode: SimilarMode,
    options: SearchOptions & { threshold?: number } = {},
  ): Promise<SearchOutcome<SimilarHit>> {
    const context = this.context(
      options,
      options.threshold !== undefined ? { similarThreshold: options.threshold } : undefined,
    );
    return withDeadline(
      `${mode} similarity search`,
      this.rankSimilar(sourceId, mode, context),
      context.settings.requestTimeoutMs,
    );
  }

  private async rankSimilar(
    sourceId: string,
    mode: SimilarMode,
    { settings, limit, filters }: RequestContext,
  ): Promise<SearchOutcome<SimilarHit>> {
    let source: ClipRecord | null;
    try {
      source = await this.store.getClip(sourceId);
    } catch (error) {
      logger.error("search", "Source clip lookup failed", { sourceId, error });
      return empty("failed", ["source"]);
    }

    if (!source) {
      logger.warn("search", "Source clip not found", { sourceId });
      return empty("not_found");
    }

    const plan = similarPlan(source, mode, settings);
    if (!plan) {
      logger.warn("search", "Source clip lacks the embeddings this mode needs", {
        sourceId,
        mode,
      });
      return empty();
    }

    const result = await this.runPlan(
      plan,
      { limit, threshold: settings.similarThreshold, excludeId: source.id, filters },
      `Similar (${mode})`,
    );
    if (!result.ok) {
      return empty("failed", ["similar"]);
    }

    logger.info("search", "Similarity search completed", {
      sourceId,
      mode,
      count: result.rows.length,
    });
    return settle(
      result.rows.map(({ clip, score }, index): SimilarHit => ({
        kind: "similar",
        clip,
        similarityScore: score,
        searchRank: index + 1,
        mode,
      })),
      [],
      1,
    );
  }
}
