import z from "zod";

import {
  TEXT_EMBEDDING_DIMENSIONS,
  VISUAL_EMBEDDING_DIMENSIONS,
} from "./db/schema.js";
import type { ClipFilters } from "./store/types.js";

const optionalText = z.string().trim().min(1).nullable().optional();

// Cosine similarity is undefined for a zero vector.
const embeddingVector = (dimensions: number) =>
  z
    .array(z.number())
    .length(dimensions)
    .refine((vector) => vector.some((value) => value !== 0), "embedding must not be all zeros");

const textVector = embeddingVector(TEXT_EMBEDDING_DIMENSIONS);
const visualVector = embeddingVector(VISUAL_EMBEDDING_DIMENSIONS);

export const thumbnailInputSchema = z.object({
  path: z.string().min(1),
  timestamp: z.string(),
  rank: z.int().min(1),
  reason: z.string().default(""),
  /** `data:<mime>;base64,...`; only used to compute the visual embedding. */
  image: z
    .string()
    .regex(/^data:[\w.+-]+\/[\w.+-]+;base64,/, "image must be a base64 data URI")
    .optional(),
});

export const clipUpsertPayloadSchema = z.object({
  file_name: z.string().min(1),
  local_path: z.string().min(1),
  file_checksum: z.string().min(1),
  file_size_bytes: z.int().nonnegative(),
  duration_seconds: z.number().nonnegative().nullable().optional(),
  processed_at: z.coerce.date().nullable().optional(),
  camera_make: optionalText,
  camera_model: optionalText,
  content_category: optionalText,
  content_summary: optionalText,
  content_tags: z.array(z.string().trim().min(1)).default([]),
  transcript_preview: optionalText,
  full_transcript: optionalText,
  primary_thumbnail_path: optionalText,
  ai_selected_thumbnails: z.array(thumbnailInputSchema).max(10).optional(),
  full_ai_analysis: z.record(z.string(), z.unknown()).nullable().optional(),
  embeddings: z
    .object({
      summary: textVector.nullable().optional(),
      keyword: textVector.nullable().optional(),
      thumbnail_1: visualVector.nullable().optional(),
      thumbnail_2: visualVector.nullable().optional(),
      thumbnail_3: visualVector.nullable().optional(),
    })
    .default({}),
});

export type ClipUpsertPayload = z.infer<typeof clipUpsertPayloadSchema>;
export type ThumbnailInput = z.infer<typeof thumbnailInputSchema>;

const filterQueryShape = {
  content_category: z.string().min(1).optional(),
  camera_make: z.string().min(1).optional(),
  camera_model: z.string().min(1).optional(),
  processed_after: z.coerce.date().optional(),
  processed_before: z.coerce.date().optional(),
  min_duration: z.coerce.number().nonnegative().optional(),
  max_duration: z.coerce.number().nonnegative().optional(),
};

const limitParam = z.coerce.number().int().positive().optional();

export const searchQuerySchema = z.object({
  q: z.string().default(""),
  mode: z.enum(["fulltext", "semantic", "hybrid"]).default("hybrid"),
  limit: limitParam,
  ...filterQueryShape,
});

export const similarQuerySchema = z.object({
  mode: z.enum(["text", "visual", "combined"]).default("combined"),
  limit: limitParam,
  threshold: z.coerce.number().min(0).max(1).optional(),
  ...filterQueryShape,
});

export const listQuerySchema = z.object({
  sort_by: z
    .enum(["processed_at", "file_name", "duration_seconds", "created_at"])
    .default("processed_at"),
  sort_order: z.enum(["ascending", "descending"]).default("descending"),
  limit: z.coerce.number().int().positive().max(100).default(20),
  offset: z.coerce.number().int().nonnegative().default(0),
  ...filterQueryShape,
});

type FilterQuery = {
  content_category?: string;
  camera_make?: string;
  camera_model?: string;
  processed_after?: Date;
  processed_before?: Date;
  min_duration?: number;
  max_duration?: number;
};

export const toClipFilters = (query: FilterQuery): ClipFilters | undefined => {
  const filters: ClipFilters = {};
  if (query.content_category !== undefined) filters.contentCategory = query.content_category;
  if (query.camera_make !== undefined) filters.cameraMake = query.camera_make;
  if (query.camera_model !== undefined) filters.cameraModel = query.camera_model;
  if (query.processed_after !== undefined) filters.processedAfter = query.processed_after;
  if (query.processed_before !== undefined) filters.processedBefore = query.processed_before;
  if (query.min_duration !== undefined) filters.minDurationSeconds = query.min_duration;
  if (query.max_duration !== undefined) filters.maxDurationSeconds = query.max_duration;
  return Object.keys(filters).length > 0 ? filters : undefined;
};
