import type { EmbeddingVector, TranscriptChunk } from "@lens/contracts";

export type VectorEntry = {
  chunk: TranscriptChunk;
  embedding: EmbeddingVector;
};

export type VectorCandidate = {
  chunk: TranscriptChunk;
  /** Cosine similarity clamped to [0, 1]. */
  score: number;
};

/**
 * Nearest-neighbor service over chunk embeddings. Order among equal scores is
 * unspecified.
 */
export interface VectorIndex {
  /** Idempotent per chunk id; a different model_id replaces the stored vector. */
  upsert(entry: VectorEntry): Promise<void>;
  search(vector: number[], k: number, opts: { model_id: string; signal?: AbortSignal }): Promise<VectorCandidate[]>;
  /** Drop every chunk and vector of a video. Returns how many chunks went. */
  removeVideo(videoId: string): Promise<number>;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) throw new Error(`dimension mismatch: ${a.length} vs ${b.length}`);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function clampScore(s: number): number {
  if (!Number.isFinite(s)) return 0;
  return Math.min(1, Math.max(0, s));
}
