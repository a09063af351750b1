import { describe, expect, it } from "vitest";

import { semanticPlan } from "../search/plan.js";
import { InMemoryClipStore } from "../store/memory.js";
import type { ClipUpsert } from "../store/types.js";
import { makeClip, textVector } from "./helpers.js";

const upsertInput = (overrides: Partial<ClipUpsert> = {}): ClipUpsert => {
  const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...rest } = makeClip();
  return { ...rest, checksum: "sha-1", ...overrides };
};

describe("InMemoryClipStore", () => {
  it("creates on a new checksum and updates in place on a repeat", async () => {
    const times = [new Date("2024-01-01T00:00:00.000Z"), new Date("2024-02-01T00:00:00.000Z")];
    let call = 0;
    const store = new InMemoryClipStore([], () => times[call++] ?? new Date(0));

    const first = await store.upsertClip(upsertInput({ contentSummary: "first pass" }));
    const second = await store.upsertClip(upsertInput({ contentSummary: "second pass" }));

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.clip.id).toBe(first.clip.id);
    expect(second.clip.createdAt).toEqual(times[0]);
    expect(second.clip.updatedAt).toEqual(times[1]);
    expect(second.clip.contentSummary).toBe("second pass");

    const { total } = await store.listClips({
      sortBy: "created_at",
      sortOrder: "descending",
      limit: 10,
      offset: 0,
    });
    expect(total).toBe(1);
  });

  it("deletes by id and reports whether a row went away", async () => {
    const clip = makeClip();
    const store = new InMemoryClipStore([clip]);

    await expect(store.deleteClip(clip.id)).resolves.toBe(true);
    await expect(store.deleteClip(clip.id)).resolves.toBe(false);
    await expect(store.getClip(clip.id)).resolves.toBeNull();
  });

  it("skips unknown ids when fetching listings", async () => {
    const clip = makeClip();
    const store = new InMemoryClipStore([clip]);

    const listings = await store.getListingsByIds(["missing", clip.id]);

    expect(listings.map((listing) => listing.id)).toEqual([clip.id]);
    expect(listings[0]).not.toHaveProperty("summaryEmbedding");
  });

  it("sorts with missing values last and paginates", async () => {
    const short = makeClip({ fileName: "b.mp4", durationSeconds: 5 });
    const long = makeClip({ fileName: "a.mp4", durationSeconds: 50 });
    const unknown = makeClip({ fileName: "c.mp4", durationSeconds: null });
    const store = new InMemoryClipStore([short, unknown, long]);

    const descending = await store.listClips({
      sortBy: "duration_seconds",
      sortOrder: "descending",
      limit: 10,
      offset: 0,
    });
    expect(descending.clips.map((clip) => clip.fileName)).toEqual(["a.mp4", "b.mp4", "c.mp4"]);

    const ascending = await store.listClips({
      sortBy: "duration_seconds",
      sortOrder: "ascending",
      limit: 10,
      offset: 0,
    });
    expect(ascending.clips.map((clip) => clip.fileName)).toEqual(["b.mp4", "a.mp4", "c.mp4"]);

    const page = await store.listClips({
      sortBy: "file_name",
      sortOrder: "ascending",
      limit: 1,
      offset: 1,
    });
    expect(page.clips.map((clip) => clip.fileName)).toEqual(["b.mp4"]);
    expect(page.total).toBe(3);
  });

  it("filters listings", async () => {
    const sony = makeClip({ cameraMake: "Sony", durationSeconds: 12 });
    const canon = makeClip({ cameraMake: "Canon", durationSeconds: 12 });
    const longSony = makeClip({ cameraMake: "Sony", durationSeconds: 90 });
    const store = new InMemoryClipStore([sony, canon, longSony]);

    const { clips, total } = await store.listClips({
      sortBy: "created_at",
      sortOrder: "descending",
      limit: 10,
      offset: 0,
      filters: { cameraMake: "Sony", maxDurationSeconds: 60 },
    });

    expect(total).toBe(1);
    expect(clips.map((clip) => clip.id)).toEqual([sony.id]);
  });

  it("matches full-text queries regardless of case and punctuation", async () => {
    const clip = makeClip({ transcriptPreview: "Today we make fresh Pasta." });
    const store = new InMemoryClipStore([clip, makeClip()]);

    const results = await store.fulltextSearch("PASTA!", { limit: 5 });

    expect(results.map((result) => result.clip.id)).toEqual([clip.id]);
  });

  it("excludes the given id from plan rankings", async () => {
    const v = textVector({ 0: 1 });
    const source = makeClip({ summaryEmbedding: v });
    const other = makeClip({ summaryEmbedding: v });
    const store = new InMemoryClipStore([source, other]);
    const plan = semanticPlan({ summaryVector: v, summaryWeight: 1, keywordWeight: 0 });
    if (!plan) throw new Error("expected a plan");

    const results = await store.rankByPlan(plan, { limit: 10, threshold: 0, excludeId: source.id });

    expect(results.map((result) => result.clip.id)).toEqual([other.id]);
  });

  it("scores a zero-norm stored vector as 0, below real matches", async () => {
    const query = textVector({ 0: 1 });
    const zero = makeClip({ summaryEmbedding: textVector({}) });
    const match = makeClip({ summaryEmbedding: textVector({ 0: 1 }) });
    const store = new InMemoryClipStore([zero, match]);
    const plan = semanticPlan({ summaryVector: query, summaryWeight: 1, keywordWeight: 0 });
    if (!plan) throw new Error("expected a plan");

    const results = await store.rankByPlan(plan, { limit: 10, threshold: 0 });

    expect(results.map((result) => [result.clip.id, result.score])).toEqual([
      [match.id, 1],
      [zero.id, 0],
    ]);
    expect(results[1]?.fieldSimilarities).toEqual({ summaryEmbedding: 0 });
  });
});
