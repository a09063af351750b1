import type { EmbeddingClient } from "./embeddings.js";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";
import {
  clipUpsertPayloadSchema,
  type ClipUpsertPayload,
  type ThumbnailInput,
} from "./schemas.js";
import type {
  ClipListing,
  ClipRecord,
  ClipStore,
  ClipUpsert,
  ListOptions,
} from "./store/types.js";

const MAX_EMBEDDING_TEXT_LENGTH = 3500;

const compact = (parts: Array<string | null | undefined>) =>
  parts.map((part) => part?.trim()).filter((part): part is string => Boolean(part));

const truncate = (text: string) =>
  text.length > MAX_EMBEDDING_TEXT_LENGTH ? text.slice(0, MAX_EMBEDDING_TEXT_LENGTH) : text;

/** Narrative text for the summary embedding: "<category> content. <summary>". */
export const summaryEmbeddingText = (payload: ClipUpsertPayload): string | null => {
  const parts = compact([
    payload.content_category ? `${payload.content_category} content` : null,
    payload.content_summary,
  ]);
  return parts.length > 0 ? truncate(parts.join(". ")) : null;
};

/** Concept text for the keyword embedding: transcript, tags and category. */
export const keywordEmbeddingText = (payload: ClipUpsertPayload): string | null => {
  const parts = compact([
    payload.full_transcript ?? payload.transcript_preview,
    payload.content_tags.join(" "),
    payload.content_category?.toLowerCase(),
  ]);
  return parts.length > 0 ? truncate(parts.join(" ")) : null;
};

/** Everything full-text search should match on, flattened into one string. */
export const searchableContent = (payload: ClipUpsertPayload): string | null => {
  const parts = compact([
    payload.file_name,
    payload.camera_make,
    payload.camera_model,
    payload.content_category,
    payload.content_summary,
    ...payload.content_tags,
    payload.full_transcript ?? payload.transcript_preview,
  ]);
  return parts.length > 0 ? parts.join(" ") : null;
};

/** The best three thumbnails by rank occupy slots 1..3. */
const rankedThumbnails = (thumbnails: ThumbnailInput[] = []) =>
  [...thumbnails].sort((a, b) => a.rank - b.rank).slice(0, 3);

export class CatalogService {
  private readonly store: ClipStore;
  private readonly textEmbeddings: EmbeddingClient;
  private readonly visualEmbeddings: EmbeddingClient | null;

  constructor(deps: {
    store: ClipStore;
    textEmbeddings: EmbeddingClient;
    visualEmbeddings: EmbeddingClient | null;
  }) {
    if (deps.textEmbeddings.space !== "text") {
      throw new ConfigurationError("Text embeddings client must use the text space");
    }
    if (deps.visualEmbeddings && deps.visualEmbeddings.space !== "visual") {
      throw new ConfigurationError("Visual embeddings client must use the visual space");
    }
    this.store = deps.store;
    this.textEmbeddings = deps.textEmbeddings;
    this.visualEmbeddings = deps.visualEmbeddings;
  }

  private async textEmbedding(
    supplied: number[] | null | undefined,
    text: string | null,
  ): Promise<number[] | null> {
    if (supplied) return supplied;
    if (!text) return null;
    return this.textEmbeddings.embedText(text);
  }

  private async thumbnailEmbedding(
    supplied: number[] | null | undefined,
    thumbnail: ThumbnailInput | undefined,
  ): Promise<number[] | null> {
    if (supplied) return supplied;
    if (!thumbnail?.image || !this.visualEmbeddings) return null;
    return this.visualEmbeddings.embed(thumbnail.image);
  }

  /**
   * Inserts or refreshes the clip identified by `file_checksum`. Embeddings not
   * supplied are generated; a generation failure stores null for that column.
   */
  async upsertClip(input: unknown): Promise<{ clip: ClipRecord; created: boolean }> {
    const payload = clipUpsertPayloadSchema.parse(input);
    const thumbnails = rankedThumbnails(payload.ai_selected_thumbnails);
    const { embeddings } = payload;

    const [summary, keyword, thumbnail1, thumbnail2, thumbnail3] = await Promise.all([
      this.textEmbedding(embeddings.summary, summaryEmbeddingText(payload)),
      this.textEmbedding(embeddings.keyword, keywordEmbeddingText(payload)),
      this.thumbnailEmbedding(embeddings.thumbnail_1, thumbnails[0]),
      this.thumbnailEmbedding(embeddings.thumbnail_2, thumbnails[1]),
      this.thumbnailEmbedding(embeddings.thumbnail_3, thumbnails[2]),
    ]);

    const record: ClipUpsert = {
      fileName: payload.file_name,
      localPath: payload.local_path,
      checksum: payload.file_checksum,
      fileSizeBytes: payload.file_size_bytes,
      durationSeconds: payload.duration_seconds ?? null,
      processedAt: payload.processed_at ?? null,
      cameraMake: payload.camera_make ?? null,
      cameraModel: payload.camera_model ?? null,
      contentCategory: payload.content_category ?? null,
      contentSummary: payload.content_summary ?? null,
      contentTags: payload.content_tags,
      searchableContent: searchableContent(payload),
      transcriptPreview: payload.transcript_preview ?? null,
      fullTranscript: payload.full_transcript ?? null,
      primaryThumbnailPath: payload.primary_thumbnail_path ?? thumbnails[0]?.path ?? null,
      aiSelectedThumbnails: payload.ai_selected_thumbnails
        ? payload.ai_selected_thumbnails.map(({ path, timestamp, rank, reason }) => ({
            path,
            timestamp,
            rank,
            reason,
          }))
        : null,
      fullAiAnalysis: payload.full_ai_analysis ?? null,
      summaryEmbedding: summary,
      keywordEmbedding: keyword,
      thumbnail1Embedding: thumbnail1,
      thumbnail2Embedding: thumbnail2,
      thumbnail3Embedding: thumbnail3,
    };

    const missing = Object.entries({ summary, keyword, thumbnail1, thumbnail2, thumbnail3 })
      .filter(([, vector]) => vector === null)
      .map(([name]) => name);
    if (missing.length > 0) {
      logger.warn("catalog", "Clip stored without some embeddings", {
        checksum: record.checksum,
        missing,
      });
    }

    const result = await this.store.upsertClip(record);
    logger.info("catalog", result.created ? "Clip created" : "Clip updated", {
      id: result.clip.id,
      checksum: result.clip.checksum,
    });
    return result;
  }

  getClip(id: string): Promise<ClipRecord | null> {
    return this.store.getClip(id);
  }

  async deleteClip(id: string): Promise<boolean> {
    const deleted = await this.store.deleteClip(id);
    if (deleted) {
      logger.info("catalog", "Clip deleted", { id });
    }
    return deleted;
  }

  listClips(options: ListOptions): Promise<{ clips: ClipListing[]; total: number }> {
    return this.store.listClips(options);
  }
}
