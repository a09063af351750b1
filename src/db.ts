import { Pool, type PoolConfig } from "pg";
import {
  and,
  asc,
  count,
  desc,
  eq,
  getTableColumns,
  gte,
  inArray,
  lte,
  ne,
  sql,
  type SQL,
} from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import z from "zod";

import type { AppConfig } from "./config.js";
import * as schema from "./db/schema.js";
import { clips } from "./db/schema.js";
import { logger } from "./logger.js";
import { textTermsByField, type ScoreComponent, type ScorePlan } from "./search/plan.js";
import {
  THUMBNAIL_EMBEDDING_FIELDS,
  type ClipFilters,
  type ClipListing,
  type ClipRecord,
  type ClipStore,
  type ClipUpsert,
  type ListOptions,
  type RankOptions,
  type ScoredListing,
  type SortField,
  type TextEmbeddingField,
} from "./store/types.js";

export type Database = NodePgDatabase<typeof schema>;

/** Server-side and client-side bounds on every query. */
export const poolConfig = (dbConfig: AppConfig["db"]): PoolConfig => ({
  user: dbConfig.user,
  password: dbConfig.password,
  host: dbConfig.host,
  port: dbConfig.port,
  database: dbConfig.database,
  ssl: dbConfig.ssl,
  statement_timeout: dbConfig.statementTimeoutMs,
  query_timeout: dbConfig.statementTimeoutMs,
});

export const createDatabase = (dbConfig: AppConfig["db"]) => {
  const pool = new Pool(poolConfig(dbConfig));

  const db: Database = drizzle({ client: pool, schema });
  return { pool, db };
};

export const ensureExtensions = async (pool: Pool) => {
  await pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
  // Tables and indexes come from src/db/schema.ts via drizzle-kit.
};

const { searchVector: _searchVector, ...recordColumns } = getTableColumns(clips);

const listingColumns = {
  id: clips.id,
  fileName: clips.fileName,
  localPath: clips.localPath,
  checksum: clips.checksum,
  fileSizeBytes: clips.fileSizeBytes,
  durationSeconds: clips.durationSeconds,
  createdAt: clips.createdAt,
  processedAt: clips.processedAt,
  updatedAt: clips.updatedAt,
  cameraMake: clips.cameraMake,
  cameraModel: clips.cameraModel,
  contentCategory: clips.contentCategory,
  contentSummary: clips.contentSummary,
  contentTags: clips.contentTags,
  transcriptPreview: clips.transcriptPreview,
  primaryThumbnailPath: clips.primaryThumbnailPath,
};

const SORT_COLUMNS: Record<SortField, AnyPgColumn> = {
  processed_at: clips.processedAt,
  file_name: clips.fileName,
  duration_seconds: clips.durationSeconds,
  created_at: clips.createdAt,
};

// Postgres rejects malformed uuids at bind time; treat them as unknown ids.
const isClipId = (id: string) => z.uuid().safeParse(id).success;

const filterConditions = (filters?: ClipFilters): SQL[] => {
  const conditions: SQL[] = [];
  if (!filters) return conditions;

  if (filters.contentCategory !== undefined) {
    conditions.push(eq(clips.contentCategory, filters.contentCategory));
  }
  if (filters.cameraMake !== undefined) {
    conditions.push(eq(clips.cameraMake, filters.cameraMake));
  }
  if (filters.cameraModel !== undefined) {
    conditions.push(eq(clips.cameraModel, filters.cameraModel));
  }
  if (filters.processedAfter !== undefined) {
    conditions.push(gte(clips.processedAt, filters.processedAfter));
  }
  if (filters.processedBefore !== undefined) {
    conditions.push(lte(clips.processedAt, filters.processedBefore));
  }
  if (filters.minDurationSeconds !== undefined) {
    conditions.push(gte(clips.durationSeconds, filters.minDurationSeconds));
  }
  if (filters.maxDurationSeconds !== undefined) {
    conditions.push(lte(clips.durationSeconds, filters.maxDurationSeconds));
  }
  return conditions;
};

// pgvector cosine distance operator: <=>, 0 for identical vectors and NaN
// when either side has zero norm. Similarity is 1 - distance, 0 for NaN, and
// NULL when the stored column is NULL.
const cosine = (column: AnyPgColumn, vector: number[]): SQL => {
  const distance = sql`(${column} <=> ${JSON.stringify(vector)}::vector)`;
  return sql`(CASE WHEN ${distance} = 'NaN'::float8 THEN 0 ELSE 1 - ${distance} END)`;
};

// SUM skips NULL rows and is NULL when every row is NULL.
const sumOf = (terms: SQL[]): SQL =>
  sql`(SELECT SUM(t.s) FROM (VALUES ${sql.join(
    terms.map((term) => sql`(${term})`),
    sql`, `,
  )}) AS t(s))`;

const renderComponent = (component: ScoreComponent): SQL => {
  if (component.kind === "sum") {
    return sumOf(
      component.terms.map(
        (term) => sql`${term.weight}::float8 * ${cosine(clips[term.field], term.vector)}`,
      ),
    );
  }

  // GREATEST ignores NULL slots.
  const weightTotal = component.terms.reduce((total, term) => total + term.weight, 0);
  const weighted = sumOf(
    component.terms.map((term) => {
      const slots = THUMBNAIL_EMBEDDING_FIELDS.map((field) => cosine(clips[field], term.vector));
      return sql`${term.weight}::float8 * GREATEST(${sql.join(slots, sql`, `)})`;
    }),
  );
  return sql`(${weighted} / ${weightTotal}::float8)`;
};

export const renderPlan = (plan: ScorePlan): SQL =>
  sumOf(
    plan.components.map(
      (component) => sql`${component.factor}::float8 * ${renderComponent(component)}`,
    ),
  );

const fieldSimilarity = (plan: ScorePlan, field: TextEmbeddingField) => {
  const term = textTermsByField(plan)[field];
  return term
    ? sql<number | null>`${cosine(clips[field], term.vector)}`
    : sql<number | null>`NULL::float8`;
};

const presentSimilarities = (values: Record<TextEmbeddingField, number | null>) => {
  const similarities: Partial<Record<TextEmbeddingField, number>> = {};
  if (values.summaryEmbedding !== null) {
    similarities.summaryEmbedding = Number(values.summaryEmbedding);
  }
  if (values.keywordEmbedding !== null) {
    similarities.keywordEmbedding = Number(values.keywordEmbedding);
  }
  return similarities;
};

export class PgClipStore implements ClipStore {
  constructor(private readonly db: Database) {}

  async fulltextSearch(
    query: string,
    options: { limit: number; filters?: ClipFilters },
  ): Promise<ScoredListing[]> {
    const tsQuery = sql`websearch_to_tsquery('english', ${query})`;
    const rank = sql<number>`ts_rank_cd(${clips.searchVector}, ${tsQuery})`.mapWith(Number);

    const rows = await this.db
      .select({ ...listingColumns, score: rank })
      .from(clips)
      .where(
        and(
          sql`${clips.searchVector} @@ ${tsQuery}`,
          sql`${rank} > 0`,
          ...filterConditions(options.filters),
        ),
      )
      .orderBy(desc(rank), asc(clips.id))
      .limit(options.limit);

    return rows.map(({ score, ...clip }) => ({ clip, score: Number(score) }));
  }

  async rankByPlan(plan: ScorePlan, options: RankOptions): Promise<ScoredListing[]> {
    const conditions = filterConditions(options.filters);
    if (options.excludeId !== undefined && isClipId(options.excludeId)) {
      conditions.push(ne(clips.id, options.excludeId));
    }

    const scored = this.db
      .select({
        id: clips.id,
        score: sql<number | null>`${renderPlan(plan)}`.as("score"),
        summarySimilarity: fieldSimilarity(plan, "summaryEmbedding").as("summary_similarity"),
        keywordSimilarity: fieldSimilarity(plan, "keywordEmbedding").as("keyword_similarity"),
      })
      .from(clips)
      .where(and(...conditions))
      .as("scored");

    const rows = await this.db
      .select({
        ...listingColumns,
        score: scored.score,
        summarySimilarity: scored.summarySimilarity,
        keywordSimilarity: scored.keywordSimilarity,
      })
      .from(scored)
      .innerJoin(clips, eq(clips.id, scored.id))
      .where(
        and(
          sql`${scored.score} IS NOT NULL`,
          sql`${scored.score} >= ${options.threshold}::float8`,
        ),
      )
      .orderBy(sql`${scored.score} DESC`, asc(clips.id))
      .limit(options.limit);

    return rows.map(({ score, summarySimilarity, keywordSimilarity, ...clip }) => ({
      clip,
      score: Number(score),
      fieldSimilarities: presentSimilarities({
        summaryEmbedding: summarySimilarity,
        keywordEmbedding: keywordSimilarity,
      }),
    }));
  }

  async getClip(id: string): Promise<ClipRecord | null> {
    if (!isClipId(id)) return null;
    const [row] = await this.db
      .select(recordColumns)
      .from(clips)
      .where(eq(clips.id, id))
      .limit(1);
    return row ?? null;
  }

  async getListingsByIds(ids: string[]): Promise<ClipListing[]> {
    const validIds = ids.filter(isClipId);
    if (validIds.length === 0) {
      return [];
    }
    return this.db.select(listingColumns).from(clips).where(inArray(clips.id, validIds));
  }

  async listClips(options: ListOptions): Promise<{ clips: ClipListing[]; total: number }> {
    const where = and(...filterConditions(options.filters));
    const direction = options.sortOrder === "ascending" ? sql`ASC` : sql`DESC`;
    const sortColumn = SORT_COLUMNS[options.sortBy];

    const [countResult] = await this.db.select({ count: count() }).from(clips).where(where);
    const total = Number(countResult?.count ?? 0);

    const rows = await this.db
      .select(listingColumns)
      .from(clips)
      .where(where)
      .orderBy(sql`${sortColumn} ${direction} NULLS LAST`, asc(clips.id))
      .limit(options.limit)
      .offset(options.offset);

    return { clips: rows, total };
  }

  async upsertClip(input: ClipUpsert): Promise<{ clip: ClipRecord; created: boolean }> {
    const { checksum: _checksum, ...changes } = input;

    const [row] = await this.db
      .insert(clips)
      .values(input)
      .onConflictDoUpdate({
        target: clips.checksum,
        set: { ...changes, updatedAt: sql`now()` },
      })
      .returning({ ...recordColumns, created: sql<boolean>`(xmax = 0)` });

    if (!row) {
      throw new Error(`Upsert of clip ${input.checksum} returned no row`);
    }

    const { created, ...clip } = row;
    logger.debug("db", created ? "Inserted clip" : "Updated clip", {
      id: clip.id,
      checksum: clip.checksum,
    });
    return { clip, created: Boolean(created) };
  }

  async deleteClip(id: string): Promise<boolean> {
    if (!isClipId(id)) return false;
    const deleted = await this.db
      .delete(clips)
      .where(eq(clips.id, id))
      .returning({ id: clips.id });
    return deleted.length > 0;
  }
}
