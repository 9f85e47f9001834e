import { z } from "zod";

export const IdSchema = z.string().min(1);
export type Id = z.infer<typeof IdSchema>;

export const MsSchema = z.number().int().nonnegative();
export type Ms = z.infer<typeof MsSchema>;

export const IsoDateTimeSchema = z.string().min(1);
export type IsoDateTime = z.infer<typeof IsoDateTimeSchema>;

export const ScoreSchema = z.number().min(0).max(1);

export const ApiErrorSchema = z.object({
  error: z.object({
    code: z.string().min(1),
    message: z.string().min(1),
    details: z.unknown().optional(),
  }),
});
export type ApiError = z.infer<typeof ApiErrorSchema>;

// ─── Ingestion records ───────────────────────────────────────────────────────

export const VideoAssetSchema = z.object({
  id: IdSchema,
  source_uri: z.string().min(1),
  duration_ms: MsSchema,
  frame_interval_ms: z.number().int().positive(),
  title: z.string().nullable().default(null),
});
export type VideoAsset = z.infer<typeof VideoAssetSchema>;

export const SubtitleCueSchema = z.object({
  video_id: IdSchema,
  idx: z.number().int().nonnegative(),
  start_ms: MsSchema,
  end_ms: MsSchema,
  text: z.string(),
});
export type SubtitleCue = z.infer<typeof SubtitleCueSchema>;

export const FrameSampleSchema = z.object({
  video_id: IdSchema,
  timestamp_ms: MsSchema,
  image_ref: z.string().min(1),
});
export type FrameSample = z.infer<typeof FrameSampleSchema>;

export const TranscriptChunkSchema = z.object({
  id: IdSchema,
  video_id: IdSchema,
  idx: z.number().int().nonnegative(),
  start_ms: MsSchema,
  end_ms: MsSchema,
  text: z.string().min(1),
  cue_start_idx: z.number().int().nonnegative(),
  cue_end_idx: z.number().int().nonnegative(),
  frame: FrameSampleSchema.nullable(),
  token_estimate: z.number().int().positive(),
});
export type TranscriptChunk = z.infer<typeof TranscriptChunkSchema>;

export const EmbeddingVectorSchema = z.object({
  chunk_id: IdSchema,
  model_id: z.string().min(1),
  dimensions: z.number().int().positive(),
  vector: z.array(z.number()),
  text_hash: z.string().min(1),
});
export type EmbeddingVector = z.infer<typeof EmbeddingVectorSchema>;

// ─── Query-time records ──────────────────────────────────────────────────────

export const SearchResultSchema = z.object({
  chunk: TranscriptChunkSchema,
  score: ScoreSchema,
  rank: z.number().int().positive(),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const ClipArtifactSchema = z.object({
  fingerprint: z.string().min(1),
  video_id: IdSchema,
  start_ms: MsSchema,
  end_ms: MsSchema,
  file_path: z.string().min(1),
  size_bytes: z.number().int().nonnegative(),
  created_at: IsoDateTimeSchema,
});
export type ClipArtifact = z.infer<typeof ClipArtifactSchema>;

export const AnswerOptionsSchema = z.object({
  top_k: z.number().int().min(1).default(5),
  min_score: z.number().min(0).max(1).default(0.3),
  include_clip: z.boolean().default(true),
});
export type AnswerOptions = z.infer<typeof AnswerOptionsSchema>;
export type AnswerOptionsInput = z.input<typeof AnswerOptionsSchema>;

export const QueryStateSchema = z.enum([
  "received",
  "embedding",
  "retrieving",
  "synthesizing",
  "composing",
  "assembled",
  "done",
  "failed",
]);
export type QueryState = z.infer<typeof QueryStateSchema>;

export const QueryStatusSchema = z.enum(["complete", "partial", "no_results"]);
export type QueryStatus = z.infer<typeof QueryStatusSchema>;

export const DegradedStepSchema = z.enum(["retrieval", "clip", "answer"]);
export type DegradedStep = z.infer<typeof DegradedStepSchema>;

export const QueryStepSchema = z.object({
  state: QueryStateSchema,
  duration_ms: z.number().nonnegative(),
  error: z.string().nullable(),
});
export type QueryStep = z.infer<typeof QueryStepSchema>;

export const QueryResultSchema = z.object({
  query: z.string().min(1),
  answer: z.string().nullable(),
  citations: z.array(z.string()),
  results: z.array(SearchResultSchema),
  clip: ClipArtifactSchema.nullable(),
  status: QueryStatusSchema,
  degraded: z.array(DegradedStepSchema),
  latency_ms: z.number().nonnegative(),
  steps: z.array(QueryStepSchema),
});
export type QueryResult = z.infer<typeof QueryResultSchema>;

// ─── Health ──────────────────────────────────────────────────────────────────

export const ProviderStatusSchema = z.object({
  enabled: z.boolean(),
  provider: z.string().nullable(),
  model_id: z.string().nullable(),
  reason: z.string().nullable(),
});
export type ProviderStatus = z.infer<typeof ProviderStatusSchema>;

export const HealthResponseSchema = z.object({
  ok: z.boolean(),
  service: z.string().min(1),
  embeddings: ProviderStatusSchema,
  generation: ProviderStatusSchema,
  clip_cache: z.object({
    entries: z.number().int().nonnegative(),
    bytes: z.number().int().nonnegative(),
    in_flight: z.number().int().nonnegative(),
  }),
  embedding_cache: z.object({
    entries: z.number().int().nonnegative(),
    hits: z.number().int().nonnegative(),
    misses: z.number().int().nonnegative(),
  }),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
