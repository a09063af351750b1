import {
  bigint,
  customType,
  doublePrecision,
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
  vector,
} from "drizzle-orm/pg-core";
import { sql, type SQL } from "drizzle-orm";

/** Width of the text embedding space (summary and keyword columns). */
export const TEXT_EMBEDDING_DIMENSIONS = 1024;
/** Width of the visual embedding space (thumbnail columns). */
export const VISUAL_EMBEDDING_DIMENSIONS = 1152;

const tsvector = customType<{ data: string }>({
  dataType() {
    return "tsvector";
  },
});

export type AiSelectedThumbnail = {
  path: string;
  timestamp: string;
  rank: number;
  reason: string;
};

export const clips = pgTable(
  "clips",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    fileName: text("file_name").notNull(),
    localPath: text("local_path").notNull(),
    checksum: text("file_checksum").notNull().unique(),
    fileSizeBytes: bigint("file_size_bytes", { mode: "number" }).notNull(),
    durationSeconds: doublePrecision("duration_seconds"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    processedAt: timestamp("processed_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    cameraMake: text("camera_make"),
    cameraModel: text("camera_model"),
    contentCategory: text("content_category"),
    contentSummary: text("content_summary"),
    contentTags: text("content_tags").array().notNull().default(sql`'{}'::text[]`),
    searchableContent: text("searchable_content"),
    transcriptPreview: text("transcript_preview"),
    fullTranscript: text("full_transcript"),
    primaryThumbnailPath: text("primary_thumbnail_path"),
    aiSelectedThumbnails: jsonb("ai_selected_thumbnails").$type<AiSelectedThumbnail[]>(),
    fullAiAnalysis: jsonb("full_ai_analysis").$type<Record<string, unknown>>(),
    summaryEmbedding: vector("summary_embedding", { dimensions: TEXT_EMBEDDING_DIMENSIONS }),
    keywordEmbedding: vector("keyword_embedding", { dimensions: TEXT_EMBEDDING_DIMENSIONS }),
    thumbnail1Embedding: vector("thumbnail_1_embedding", { dimensions: VISUAL_EMBEDDING_DIMENSIONS }),
    thumbnail2Embedding: vector("thumbnail_2_embedding", { dimensions: VISUAL_EMBEDDING_DIMENSIONS }),
    thumbnail3Embedding: vector("thumbnail_3_embedding", { dimensions: VISUAL_EMBEDDING_DIMENSIONS }),
    searchVector: tsvector("search_vector").generatedAlwaysAs(
      (): SQL =>
        sql`to_tsvector('english', coalesce(${clips.searchableContent}, '') || ' ' || coalesce(${clips.fileName}, '') || ' ' || coalesce(${clips.contentSummary}, '') || ' ' || coalesce(${clips.transcriptPreview}, ''))`,
    ),
  },
  (table) => [
    index("clips_search_vector_idx").using("gin", table.searchVector),
    index("clips_created_at_idx").on(table.createdAt.desc()),
    index("clips_summary_vec_idx").using("hnsw", table.summaryEmbedding.op("vector_cosine_ops")),
    index("clips_keyword_vec_idx").using("hnsw", table.keywordEmbedding.op("vector_cosine_ops")),
    index("clips_thumbnail_1_vec_idx").using("hnsw", table.thumbnail1Embedding.op("vector_cosine_ops")),
    index("clips_thumbnail_2_vec_idx").using("hnsw", table.thumbnail2Embedding.op("vector_cosine_ops")),
    index("clips_thumbnail_3_vec_idx").using("hnsw", table.thumbnail3Embedding.op("vector_cosine_ops")),
  ],
);

export type Clip = typeof clips.$inferSelect;
export type NewClip = typeof clips.$inferInsert;
