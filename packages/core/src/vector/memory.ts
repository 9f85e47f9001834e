import type { EmbeddingVector, TranscriptChunk } from "@lens/contracts";
import { throwIfAborted } from "../util/abort";
import { clampScore, cosineSimilarity, type VectorCandidate, type VectorEntry, type VectorIndex } from "./types";

/** Brute-force cosine index. Used by tests and the CLI's --memory mode. */
export class MemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, { chunk: TranscriptChunk; embedding: EmbeddingVector }>();

  async upsert(entry: VectorEntry): Promise<void> {
    // Replace the whole record so readers never see a chunk paired with a stale vector.
    this.entries.set(entry.chunk.id, {
      chunk: entry.chunk,
      embedding: { ...entry.embedding, vector: [...entry.embedding.vector] },
    });
  }

  async search(vector: number[], k: number, opts: { model_id: string; signal?: AbortSignal }): Promise<VectorCandidate[]> {
    throwIfAborted(opts.signal);
    const scored: VectorCandidate[] = [];
    for (const { chunk, embedding } of this.entries.values()) {
      if (embedding.model_id !== opts.model_id) continue;
      scored.push({ chunk, score: clampScore(cosineSimilarity(vector, embedding.vector)) });
    }
    scored.sort((a, b) => b.score - a.score || a.chunk.start_ms - b.chunk.start_ms);
    return scored.slice(0, Math.max(0, k));
  }

  async removeVideo(videoId: string): Promise<number> {
    let removed = 0;
    for (const [id, e] of this.entries) {
      if (e.chunk.video_id !== videoId) continue;
      this.entries.delete(id);
      removed++;
    }
    return removed;
  }

  get(chunkId: string): VectorEntry | null {
    return this.entries.get(chunkId) ?? null;
  }

  get size(): number {
    return this.entries.size;
  }
}
