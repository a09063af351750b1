import { vi } from "vitest";

import {
  TEXT_EMBEDDING_DIMENSIONS,
  VISUAL_EMBEDDING_DIMENSIONS,
} from "../db/schema.js";
import type { EmbeddingClient } from "../embeddings.js";
import type { EmbeddingSpace } from "../search/plan.js";
import type { ClipRecord } from "../store/types.js";

/**
 * Vector of the given width with the listed coordinates set. Two vectors built
 * from disjoint coordinates are orthogonal (cosine 0).
 */
export const vectorOf = (dimensions: number, coordinates: Record<number, number>) => {
  const vector = new Array<number>(dimensions).fill(0);
  for (const [index, value] of Object.entries(coordinates)) {
    vector[Number(index)] = value;
  }
  return vector;
};

export const textVector = (coordinates: Record<number, number>) =>
  vectorOf(TEXT_EMBEDDING_DIMENSIONS, coordinates);

export const visualVector = (coordinates: Record<number, number>) =>
  vectorOf(VISUAL_EMBEDDING_DIMENSIONS, coordinates);

let sequence = 0;

export const makeClip = (overrides: Partial<ClipRecord> = {}): ClipRecord => {
  sequence += 1;
  const timestamp = new Date("2024-05-01T12:00:00.000Z");
  return {
    id: `00000000-0000-4000-8000-${String(sequence).padStart(12, "0")}`,
    fileName: `clip-${sequence}.mp4`,
    localPath: `/videos/clip-${sequence}.mp4`,
    checksum: `checksum-${sequence}`,
    fileSizeBytes: 1000,
    durationSeconds: 30,
    createdAt: timestamp,
    processedAt: timestamp,
    updatedAt: timestamp,
    cameraMake: null,
    cameraModel: null,
    contentCategory: null,
    contentSummary: null,
    contentTags: [],
    searchableContent: null,
    transcriptPreview: null,
    fullTranscript: null,
    primaryThumbnailPath: null,
    aiSelectedThumbnails: null,
    fullAiAnalysis: null,
    summaryEmbedding: null,
    keywordEmbedding: null,
    thumbnail1Embedding: null,
    thumbnail2Embedding: null,
    thumbnail3Embedding: null,
    ...overrides,
  };
};

/** Embedding client answering from a fixed table; unknown inputs yield null. */
export const fakeEmbeddings = (
  space: EmbeddingSpace,
  answers: Record<string, number[] | null> = {},
) => {
  const embed = vi.fn(async (input: string) => answers[input] ?? null);
  const client: EmbeddingClient = {
    space,
    dimensions: space === "text" ? TEXT_EMBEDDING_DIMENSIONS : VISUAL_EMBEDDING_DIMENSIONS,
    embed,
    embedText: (text) => embed(text),
  };
  return { client, embed };
};
