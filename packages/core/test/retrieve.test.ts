import test from "node:test";
import assert from "node:assert/strict";
import { InvalidQueryError } from "../src/errors";
import { Retriever, mergeNearby } from "../src/search/retrieve";
import type { VectorCandidate, VectorIndex } from "../src/vector/types";
import { makeChunk } from "./fakes";

function cand(videoId: string, start: number, end: number, score: number, text = `${videoId}@${start}`): VectorCandidate {
  return { chunk: makeChunk(videoId, start, end, text), score };
}

class FixedIndex implements VectorIndex {
  readonly requests: Array<{ k: number; model_id: string }> = [];

  constructor(private readonly candidates: VectorCandidate[]) {}

  async upsert(): Promise<void> {}

  async search(_vector: number[], k: number, opts: { model_id: string }): Promise<VectorCandidate[]> {
    this.requests.push({ k, model_id: opts.model_id });
    return [...this.candidates].sort((a, b) => b.score - a.score).slice(0, k);
  }

  async removeVideo(): Promise<number> {
    return 0;
  }
}

function retriever(candidates: VectorCandidate[], mergeGapMs = 1000): { r: Retriever; index: FixedIndex } {
  const index = new FixedIndex(candidates);
  return { r: new Retriever({ index, overfetchFactor: 3, mergeGapMs, modelId: "m1" }), index };
}

test("invalid top_k or min_score is an InvalidQueryError", async () => {
  const { r } = retriever([]);
  await assert.rejects(() => r.search([1], 0, 0.3), InvalidQueryError);
  await assert.rejects(() => r.search([1], 1.5, 0.3), InvalidQueryError);
  await assert.rejects(() => r.search([1], 5, 1.2), InvalidQueryError);
  await assert.rejects(() => r.search([1], 5, -0.1), InvalidQueryError);
});

test("asks the index for top_k times the overfetch factor under the embedder's model", async () => {
  const { r, index } = retriever([]);
  await r.search([1], 2, 0.3);
  assert.deepEqual(index.requests, [{ k: 6, model_id: "m1" }]);
});

test("nothing above the floor is an empty result, not an error", async () => {
  const { r } = retriever([cand("v1", 0, 10_000, 0.5), cand("v2", 0, 10_000, 0.4)]);
  assert.deepEqual(await r.search([1], 1, 0.9), []);
});

test("near or overlapping ranges of one video collapse into the best scorer", async () => {
  const { r } = retriever([
    cand("v1", 0, 10_000, 0.9, "padding keeps the output size"),
    cand("v1", 10_500, 20_000, 0.8),
    cand("v1", 40_000, 50_000, 0.7),
    cand("v2", 0, 10_000, 0.85),
  ]);

  const results = await r.search([1], 5, 0.3);
  assert.deepEqual(
    results.map((x) => [x.chunk.video_id, x.chunk.start_ms, x.chunk.end_ms, x.score, x.rank]),
    [
      ["v1", 0, 20_000, 0.9, 1],
      ["v2", 0, 10_000, 0.85, 2],
      ["v1", 40_000, 50_000, 0.7, 3],
    ]
  );
  assert.equal(results[0].chunk.text, "padding keeps the output size");
  assert.equal(results[0].chunk.id, makeChunk("v1", 0, 10_000).id);
});

test("grouping is transitive through a chain of near ranges", () => {
  const merged = mergeNearby(
    [cand("v1", 0, 5000, 0.6), cand("v1", 5500, 10_000, 0.9, "middle"), cand("v1", 10_800, 15_000, 0.7)],
    1000
  );
  assert.equal(merged.length, 1);
  assert.equal(merged[0].chunk.text, "middle");
  assert.deepEqual([merged[0].chunk.start_ms, merged[0].chunk.end_ms, merged[0].score], [0, 15_000, 0.9]);
});

test("ranges exactly one gap apart stay separate", () => {
  const merged = mergeNearby([cand("v1", 0, 5000, 0.6), cand("v1", 6000, 9000, 0.9)], 1000);
  assert.equal(merged.length, 2);
});

test("equal scores within a group keep the earlier start", () => {
  const merged = mergeNearby([cand("v1", 4000, 8000, 0.8, "later"), cand("v1", 0, 5000, 0.8, "earlier")], 1000);
  assert.equal(merged[0].chunk.text, "earlier");
  assert.deepEqual([merged[0].chunk.start_ms, merged[0].chunk.end_ms], [0, 8000]);
});

test("equal scores across videos rank the earlier start first and truncate to top_k", async () => {
  const { r } = retriever([cand("v1", 30_000, 40_000, 0.8), cand("v2", 10_000, 20_000, 0.8), cand("v3", 0, 5000, 0.5)]);
  const results = await r.search([1], 2, 0.3);
  assert.deepEqual(
    results.map((x) => [x.chunk.video_id, x.rank]),
    [
      ["v2", 1],
      ["v1", 2],
    ]
  );
});

test("no two results of one response overlap", async () => {
  const { r } = retriever([
    cand("v1", 0, 12_000, 0.95),
    cand("v1", 6000, 18_000, 0.9),
    cand("v1", 17_000, 25_000, 0.6),
    cand("v1", 60_000, 70_000, 0.5),
  ]);
  const results = await r.search([1], 5, 0.3);
  assert.deepEqual(
    results.map((x) => [x.chunk.start_ms, x.chunk.end_ms]),
    [
      [0, 25_000],
      [60_000, 70_000],
    ]
  );
});
