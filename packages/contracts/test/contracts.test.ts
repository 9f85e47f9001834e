import test from "node:test";
import assert from "node:assert/strict";
import {
  AnswerOptionsSchema,
  ApiErrorSchema,
  QueryResultSchema,
  SearchResultSchema,
  TranscriptChunkSchema,
  VideoAssetSchema,
} from "../src/index";

const chunk = {
  id: "c1",
  video_id: "v1",
  idx: 0,
  start_ms: 0,
  end_ms: 12_000,
  text: "padding keeps the output size",
  cue_start_idx: 0,
  cue_end_idx: 1,
  frame: null,
  token_estimate: 8,
};

test("answer options fill in defaults", () => {
  assert.deepEqual(AnswerOptionsSchema.parse({}), { top_k: 5, min_score: 0.3, include_clip: true });
});

test("answer options reject top_k below 1 and min_score above 1", () => {
  assert.equal(AnswerOptionsSchema.safeParse({ top_k: 0 }).success, false);
  assert.equal(AnswerOptionsSchema.safeParse({ top_k: 1.5 }).success, false);
  assert.equal(AnswerOptionsSchema.safeParse({ min_score: 1.5 }).success, false);
  assert.equal(AnswerOptionsSchema.safeParse({ min_score: -0.1 }).success, false);
});

test("video title defaults to null", () => {
  const v = VideoAssetSchema.parse({ id: "v1", source_uri: "/videos/v1.mp4", duration_ms: 60_000, frame_interval_ms: 5000 });
  assert.equal(v.title, null);
});

test("chunks need text and a positive token estimate", () => {
  assert.equal(TranscriptChunkSchema.safeParse(chunk).success, true);
  assert.equal(TranscriptChunkSchema.safeParse({ ...chunk, text: "" }).success, false);
  assert.equal(TranscriptChunkSchema.safeParse({ ...chunk, token_estimate: 0 }).success, false);
});

test("search result scores stay within [0, 1] and ranks start at 1", () => {
  assert.equal(SearchResultSchema.safeParse({ chunk, score: 0.8, rank: 1 }).success, true);
  assert.equal(SearchResultSchema.safeParse({ chunk, score: 1.2, rank: 1 }).success, false);
  assert.equal(SearchResultSchema.safeParse({ chunk, score: 0.8, rank: 0 }).success, false);
});

test("query result accepts a partial result without answer or clip", () => {
  const parsed = QueryResultSchema.parse({
    query: "what is padding?",
    answer: null,
    citations: [],
    results: [{ chunk, score: 0.8, rank: 1 }],
    clip: null,
    status: "partial",
    degraded: ["answer"],
    latency_ms: 12,
    steps: [{ state: "received", duration_ms: 0, error: null }],
  });
  assert.equal(parsed.status, "partial");
  assert.deepEqual(parsed.degraded, ["answer"]);
});

test("query result rejects unknown degraded steps", () => {
  const res = QueryResultSchema.safeParse({
    query: "q",
    answer: null,
    citations: [],
    results: [],
    clip: null,
    status: "partial",
    degraded: ["embedding"],
    latency_ms: 0,
    steps: [],
  });
  assert.equal(res.success, false);
});

test("error envelope carries code and message", () => {
  assert.equal(ApiErrorSchema.safeParse({ error: { code: "invalid_query", message: "bad" } }).success, true);
  assert.equal(ApiErrorSchema.safeParse({ error: { code: "", message: "bad" } }).success, false);
});
