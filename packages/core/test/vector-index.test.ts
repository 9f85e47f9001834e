import test from "node:test";
import assert from "node:assert/strict";
import { hashText } from "../src/embeddings/cache";
import { MemoryVectorIndex } from "../src/vector/memory";
import { clampScore, cosineSimilarity, type VectorEntry } from "../src/vector/types";
import { makeChunk } from "./fakes";

function entry(videoId: string, start: number, end: number, vector: number[], modelId = "m1"): VectorEntry {
  const chunk = makeChunk(videoId, start, end);
  return {
    chunk,
    embedding: { chunk_id: chunk.id, model_id: modelId, dimensions: vector.length, vector, text_hash: hashText(chunk.text) },
  };
}

test("cosineSimilarity handles parallel, orthogonal and zero vectors", () => {
  assert.equal(cosineSimilarity([1, 0], [2, 0]), 1);
  assert.equal(cosineSimilarity([1, 0], [0, 1]), 0);
  assert.equal(cosineSimilarity([0, 0], [1, 0]), 0);
  assert.throws(() => cosineSimilarity([1], [1, 0]), /dimension mismatch/);
});

test("clampScore keeps scores within [0, 1]", () => {
  assert.equal(clampScore(-0.4), 0);
  assert.equal(clampScore(1.0000001), 1);
  assert.equal(clampScore(Number.NaN), 0);
  assert.equal(clampScore(0.42), 0.42);
});

test("search orders by score and only sees the requested model", async () => {
  const index = new MemoryVectorIndex();
  await index.upsert(entry("v1", 0, 10_000, [1, 0]));
  await index.upsert(entry("v1", 20_000, 30_000, [0, 1]));
  await index.upsert(entry("v2", 0, 10_000, [1, 1]));
  await index.upsert(entry("v3", 0, 10_000, [1, 0], "m2"));
  await index.upsert(entry("v4", 0, 10_000, [-1, 0]));

  const hits = await index.search([1, 0], 10, { model_id: "m1" });
  assert.deepEqual(
    hits.map((h) => [h.chunk.video_id, h.chunk.start_ms]),
    [
      ["v1", 0],
      ["v2", 0],
      ["v1", 20_000],
      ["v4", 0],
    ]
  );
  assert.equal(hits[0].score, 1);
  assert.equal(hits[3].score, 0);

  const top1 = await index.search([1, 0], 1, { model_id: "m1" });
  assert.equal(top1.length, 1);
});

test("search refuses to run once aborted", async () => {
  const index = new MemoryVectorIndex();
  const ac = new AbortController();
  ac.abort();
  await assert.rejects(() => index.search([1, 0], 1, { model_id: "m1", signal: ac.signal }), { name: "AbortError" });
});

test("removeVideo drops only that video's entries", async () => {
  const index = new MemoryVectorIndex();
  await index.upsert(entry("v1", 0, 10_000, [1, 0]));
  await index.upsert(entry("v1", 10_000, 20_000, [1, 0]));
  await index.upsert(entry("v2", 0, 10_000, [1, 0]));

  assert.equal(await index.removeVideo("v1"), 2);
  assert.equal(index.size, 1);
  assert.equal(await index.removeVideo("v1"), 0);
});
