import type { ClipListing, ClipRecord } from "../store/types.js";
import { THUMBNAIL_EMBEDDING_FIELDS } from "../store/types.js";
import type { FulltextHit, HybridHit, SearchHit, SemanticHit, SimilarHit } from "./engine.js";
import type { SimilarMode } from "./plan.js";

export type FormattedClip = {
  id: string;
  file_name: string;
  local_path: string;
  content_summary: string | null;
  content_tags: string[];
  duration_seconds: number | null;
  camera_make: string | null;
  camera_model: string | null;
  content_category: string | null;
  transcript_preview: string | null;
  primary_thumbnail_path: string | null;
  created_at: string | null;
  processed_at: string | null;
  updated_at: string | null;
};

export type FormattedResult =
  | (FormattedClip & { search_type: "fulltext"; fts_score: number })
  | (FormattedClip & {
      search_type: "semantic";
      combined_similarity: number;
      summary_similarity?: number;
      keyword_similarity?: number;
    })
  | (FormattedClip & {
      search_type: "hybrid";
      similarity_score: number;
      search_rank: number;
      fts_score?: number;
      summary_similarity?: number;
      keyword_similarity?: number;
    })
  | (FormattedClip & {
      search_type: "similar";
      similarity_score: number;
      search_rank: number;
      similarity_mode: SimilarMode;
    });

const isoOrNull = (value: Date | null) => (value ? value.toISOString() : null);

export const formatClip = (clip: ClipListing): FormattedClip => ({
  id: clip.id,
  file_name: clip.fileName,
  local_path: clip.localPath,
  content_summary: clip.contentSummary,
  content_tags: [...clip.contentTags],
  duration_seconds: clip.durationSeconds,
  camera_make: clip.cameraMake,
  camera_model: clip.cameraModel,
  content_category: clip.contentCategory,
  transcript_preview: clip.transcriptPreview,
  primary_thumbnail_path: clip.primaryThumbnailPath,
  created_at: isoOrNull(clip.createdAt),
  processed_at: isoOrNull(clip.processedAt),
  updated_at: isoOrNull(clip.updatedAt),
});

const formatFulltext = (hit: FulltextHit): FormattedResult => ({
  ...formatClip(hit.clip),
  search_type: "fulltext",
  fts_score: hit.ftsScore,
});

const formatSemantic = (hit: SemanticHit): FormattedResult => ({
  ...formatClip(hit.clip),
  search_type: "semantic",
  combined_similarity: hit.combinedSimilarity,
  ...(hit.summarySimilarity !== undefined ? { summary_similarity: hit.summarySimilarity } : {}),
  ...(hit.keywordSimilarity !== undefined ? { keyword_similarity: hit.keywordSimilarity } : {}),
});

const formatHybrid = (hit: HybridHit): FormattedResult => ({
  ...formatClip(hit.clip),
  search_type: "hybrid",
  similarity_score: hit.similarityScore,
  search_rank: hit.searchRank,
  ...(hit.ftsScore !== undefined ? { fts_score: hit.ftsScore } : {}),
  ...(hit.summarySimilarity !== undefined ? { summary_similarity: hit.summarySimilarity } : {}),
  ...(hit.keywordSimilarity !== undefined ? { keyword_similarity: hit.keywordSimilarity } : {}),
});

export const formatSimilarHit = (hit: SimilarHit): FormattedResult => ({
  ...formatClip(hit.clip),
  search_type: "similar",
  similarity_score: hit.similarityScore,
  search_rank: hit.searchRank,
  similarity_mode: hit.mode,
});

export const formatSearchHit = (hit: SearchHit): FormattedResult => {
  switch (hit.kind) {
    case "fulltext":
      return formatFulltext(hit);
    case "semantic":
      return formatSemantic(hit);
    case "hybrid":
      return formatHybrid(hit);
  }
};

/** Full row for the detail view; vectors are reported by presence only. */
export const formatClipDetail = (clip: ClipRecord) => ({
  ...formatClip(clip),
  file_checksum: clip.checksum,
  file_size_bytes: clip.fileSizeBytes,
  searchable_content: clip.searchableContent,
  full_transcript: clip.fullTranscript,
  ai_selected_thumbnails: clip.aiSelectedThumbnails
    ? clip.aiSelectedThumbnails.map((thumbnail) => ({ ...thumbnail }))
    : null,
  full_ai_analysis: clip.fullAiAnalysis ? structuredClone(clip.fullAiAnalysis) : null,
  embeddings: {
    summary: clip.summaryEmbedding !== null,
    keyword: clip.keywordEmbedding !== null,
    thumbnails: THUMBNAIL_EMBEDDING_FIELDS.map((field) => clip[field] !== null),
  },
});
