import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";

import {
  CatalogService,
  keywordEmbeddingText,
  searchableContent,
  summaryEmbeddingText,
} from "../catalog.js";
import { ConfigurationError } from "../errors.js";
import { clipUpsertPayloadSchema } from "../schemas.js";
import { InMemoryClipStore } from "../store/memory.js";
import { fakeEmbeddings, textVector, visualVector } from "./helpers.js";

const IMAGE_A = "data:image/jpeg;base64,AAAA";
const IMAGE_B = "data:image/jpeg;base64,BBBB";

const payload = {
  file_name: "harbour.mp4",
  local_path: "/videos/harbour.mp4",
  file_checksum: "sha256-harbour",
  file_size_bytes: 2048,
  duration_seconds: 61,
  content_category: "travel",
  content_summary: "Boats in the harbour",
  content_tags: ["boats", "harbour"],
  transcript_preview: "listen to the gulls",
};

const SUMMARY_TEXT = "travel content. Boats in the harbour";
const KEYWORD_TEXT = "listen to the gulls boats harbour travel";

describe("embedding and index text", () => {
  const parsed = clipUpsertPayloadSchema.parse(payload);

  it("builds the summary text from category and summary", () => {
    expect(summaryEmbeddingText(parsed)).toBe(SUMMARY_TEXT);
  });

  it("builds the keyword text from transcript, tags and category", () => {
    expect(keywordEmbeddingText(parsed)).toBe(KEYWORD_TEXT);
  });

  it("flattens searchable fields for full-text indexing", () => {
    expect(searchableContent(parsed)).toBe(
      "harbour.mp4 travel Boats in the harbour boats harbour listen to the gulls",
    );
  });

  it("has no summary text without category or summary", () => {
    const bare = clipUpsertPayloadSchema.parse({
      file_name: "x.mp4",
      local_path: "/x.mp4",
      file_checksum: "x",
      file_size_bytes: 1,
    });
    expect(summaryEmbeddingText(bare)).toBeNull();
    expect(keywordEmbeddingText(bare)).toBeNull();
  });
});

describe("CatalogService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const summaryVector = textVector({ 0: 1 });
  const keywordVector = textVector({ 1: 1 });

  const setup = (withVisual = true) => {
    const store = new InMemoryClipStore();
    const text = fakeEmbeddings("text", {
      [SUMMARY_TEXT]: summaryVector,
      [KEYWORD_TEXT]: keywordVector,
    });
    const visual = fakeEmbeddings("visual", {
      [IMAGE_A]: visualVector({ 0: 1 }),
      [IMAGE_B]: visualVector({ 1: 1 }),
    });
    const catalog = new CatalogService({
      store,
      textEmbeddings: text.client,
      visualEmbeddings: withVisual ? visual.client : null,
    });
    return { catalog, store, text, visual };
  };

  it("generates missing embeddings and creates the clip", async () => {
    const { catalog } = setup();

    const { clip, created } = await catalog.upsertClip(payload);

    expect(created).toBe(true);
    expect(clip.summaryEmbedding).toEqual(summaryVector);
    expect(clip.keywordEmbedding).toEqual(keywordVector);
    expect(clip.searchableContent).toBe(
      "harbour.mp4 travel Boats in the harbour boats harbour listen to the gulls",
    );
    expect(clip.thumbnail1Embedding).toBeNull();
  });

  it("keeps supplied embeddings instead of generating them", async () => {
    const { catalog, text } = setup();
    const supplied = textVector({ 9: 1 });

    const { clip } = await catalog.upsertClip({ ...payload, embeddings: { summary: supplied } });

    expect(clip.summaryEmbedding).toEqual(supplied);
    expect(text.embed).toHaveBeenCalledTimes(1);
    expect(text.embed).toHaveBeenCalledWith(KEYWORD_TEXT);
  });

  it("fills thumbnail slots in rank order", async () => {
    const { catalog } = setup();

    const { clip } = await catalog.upsertClip({
      ...payload,
      ai_selected_thumbnails: [
        { path: "/thumbs/b.jpg", timestamp: "00:10", rank: 2, reason: "wide", image: IMAGE_B },
        { path: "/thumbs/a.jpg", timestamp: "00:02", rank: 1, reason: "sharp", image: IMAGE_A },
      ],
    });

    expect(clip.thumbnail1Embedding).toEqual(visualVector({ 0: 1 }));
    expect(clip.thumbnail2Embedding).toEqual(visualVector({ 1: 1 }));
    expect(clip.thumbnail3Embedding).toBeNull();
    expect(clip.primaryThumbnailPath).toBe("/thumbs/a.jpg");
    expect(clip.aiSelectedThumbnails).toEqual([
      { path: "/thumbs/b.jpg", timestamp: "00:10", rank: 2, reason: "wide" },
      { path: "/thumbs/a.jpg", timestamp: "00:02", rank: 1, reason: "sharp" },
    ]);
  });

  it("stores null thumbnail embeddings without a visual client", async () => {
    const { catalog } = setup(false);

    const { clip } = await catalog.upsertClip({
      ...payload,
      ai_selected_thumbnails: [
        { path: "/thumbs/a.jpg", timestamp: "00:02", rank: 1, reason: "sharp", image: IMAGE_A },
      ],
    });

    expect(clip.thumbnail1Embedding).toBeNull();
  });

  it("stores null when generation fails and still saves the clip", async () => {
    const { catalog } = setup();

    const { clip } = await catalog.upsertClip({ ...payload, content_summary: "Unseen text" });

    expect(clip.summaryEmbedding).toBeNull();
    expect(clip.keywordEmbedding).toEqual(keywordVector);
    expect(vi.mocked(console.warn).mock.calls[0]?.[0]).toContain(
      "Clip stored without some embeddings",
    );
  });

  it("updates in place on the same checksum", async () => {
    const { catalog } = setup();

    const first = await catalog.upsertClip(payload);
    const second = await catalog.upsertClip({ ...payload, duration_seconds: 62 });

    expect(second.created).toBe(false);
    expect(second.clip.id).toBe(first.clip.id);
    expect(second.clip.durationSeconds).toBe(62);
  });

  it("rejects an invalid payload", async () => {
    const { catalog } = setup();
    await expect(catalog.upsertClip({ ...payload, file_checksum: "" })).rejects.toBeInstanceOf(
      ZodError,
    );
    await expect(
      catalog.upsertClip({ ...payload, embeddings: { keyword: [1, 2, 3] } }),
    ).rejects.toBeInstanceOf(ZodError);
  });

  it("rejects an all-zero supplied embedding", async () => {
    const { catalog, store } = setup();

    await expect(
      catalog.upsertClip({ ...payload, embeddings: { summary: textVector({}) } }),
    ).rejects.toBeInstanceOf(ZodError);
    const { total } = await store.listClips({
      sortBy: "created_at",
      sortOrder: "descending",
      limit: 10,
      offset: 0,
    });
    expect(total).toBe(0);
  });

  it("deletes clips", async () => {
    const { catalog } = setup();
    const { clip } = await catalog.upsertClip(payload);

    await expect(catalog.deleteClip(clip.id)).resolves.toBe(true);
    await expect(catalog.getClip(clip.id)).resolves.toBeNull();
    await expect(catalog.deleteClip(clip.id)).resolves.toBe(false);
  });

  it("refuses clients from the wrong space", () => {
    const store = new InMemoryClipStore();
    expect(
      () =>
        new CatalogService({
          store,
          textEmbeddings: fakeEmbeddings("visual").client,
          visualEmbeddings: null,
        }),
    ).toThrow(ConfigurationError);
  });
});
