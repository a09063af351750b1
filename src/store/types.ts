import type { Clip } from "../db/schema.js";
import type { ScorePlan } from "../search/plan.js";

export type ClipRecord = Omit<Clip, "searchVector">;

export const THUMBNAIL_EMBEDDING_FIELDS = [
  "thumbnail1Embedding",
  "thumbnail2Embedding",
  "thumbnail3Embedding",
] as const;

export type TextEmbeddingField = "summaryEmbedding" | "keywordEmbedding";
export type ThumbnailEmbeddingField = (typeof THUMBNAIL_EMBEDDING_FIELDS)[number];
export type EmbeddingField = TextEmbeddingField | ThumbnailEmbeddingField;

export const LISTING_FIELDS = [
  "id",
  "fileName",
  "localPath",
  "checksum",
  "fileSizeBytes",
  "durationSeconds",
  "createdAt",
  "processedAt",
  "updatedAt",
  "cameraMake",
  "cameraModel",
  "contentCategory",
  "contentSummary",
  "contentTags",
  "transcriptPreview",
  "primaryThumbnailPath",
] as const;

export type ListingField = (typeof LISTING_FIELDS)[number];

/** The display subset of a clip carried by every search and browse result. */
export type ClipListing = Pick<ClipRecord, ListingField>;

/** Everything but the store-managed identity and timestamps. */
export type ClipUpsert = Omit<ClipRecord, "id" | "createdAt" | "updatedAt">;

export type ScoredListing = {
  clip: ClipListing;
  score: number;
  /** Unweighted similarity per text column the plan compares, where the clip stores one. */
  fieldSimilarities?: Partial<Record<TextEmbeddingField, number>>;
};

export type ClipFilters = {
  contentCategory?: string;
  cameraMake?: string;
  cameraModel?: string;
  processedAfter?: Date;
  processedBefore?: Date;
  minDurationSeconds?: number;
  maxDurationSeconds?: number;
};

export type SortField = "processed_at" | "file_name" | "duration_seconds" | "created_at";
export type SortOrder = "ascending" | "descending";

export type ListOptions = {
  sortBy: SortField;
  sortOrder: SortOrder;
  limit: number;
  offset: number;
  filters?: ClipFilters;
};

export type RankOptions = {
  limit: number;
  threshold: number;
  /** Excluded in the candidate predicate, never post-filtered. */
  excludeId?: string;
  filters?: ClipFilters;
};

export interface ClipStore {
  /** Rows with a strictly positive relevance score, best first. */
  fulltextSearch(
    query: string,
    options: { limit: number; filters?: ClipFilters },
  ): Promise<ScoredListing[]>;
  /** Rows whose plan score is non-null and at least `threshold`, best first. */
  rankByPlan(plan: ScorePlan, options: RankOptions): Promise<ScoredListing[]>;
  getClip(id: string): Promise<ClipRecord | null>;
  /** Order of the returned rows is unspecified. */
  getListingsByIds(ids: string[]): Promise<ClipListing[]>;
  listClips(options: ListOptions): Promise<{ clips: ClipListing[]; total: number }>;
  upsertClip(input: ClipUpsert): Promise<{ clip: ClipRecord; created: boolean }>;
  deleteClip(id: string): Promise<boolean>;
}

export const toListing = (record: ClipRecord): ClipListing => ({
  id: record.id,
  fileName: record.fileName,
  localPath: record.localPath,
  checksum: record.checksum,
  fileSizeBytes: record.fileSizeBytes,
  durationSeconds: record.durationSeconds,
  createdAt: record.createdAt,
  processedAt: record.processedAt,
  updatedAt: record.updatedAt,
  cameraMake: record.cameraMake,
  cameraModel: record.cameraModel,
  contentCategory: record.contentCategory,
  contentSummary: record.contentSummary,
  contentTags: record.contentTags,
  transcriptPreview: record.transcriptPreview,
  primaryThumbnailPath: record.primaryThumbnailPath,
});
