import crypto from "node:crypto";
import type { Embedder } from "./provider";

export function hashText(text: string): string {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * Process-wide LRU of embeddings keyed by model and text hash. Created once at
 * startup and handed to whatever embeds query text; `clear()` on shutdown.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, readonly number[]>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxEntries: number) {
    if (!(maxEntries > 0)) throw new Error("EmbeddingCache maxEntries must be > 0");
  }

  static key(modelId: string, text: string): string {
    return `${modelId}:${hashText(text)}`;
  }

  get(modelId: string, text: string): number[] | null {
    const key = EmbeddingCache.key(modelId, text);
    const v = this.entries.get(key);
    if (!v) {
      this.misses++;
      return null;
    }
    // Refresh recency.
    this.entries.delete(key);
    this.entries.set(key, v);
    this.hits++;
    return [...v];
  }

  set(modelId: string, text: string, vector: number[]): void {
    const key = EmbeddingCache.key(modelId, text);
    this.entries.delete(key);
    this.entries.set(key, Object.freeze([...vector]));
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Drop every entry for a model, e.g. after the model version changed. */
  invalidateModel(modelId: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(`${modelId}:`)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

export function cachedEmbedder(embedder: Embedder, cache: EmbeddingCache): Embedder {
  return {
    provider: embedder.provider,
    model_id: embedder.model_id,
    dimensions: embedder.dimensions,
    async embed(text, opts) {
      const hit = cache.get(embedder.model_id, text);
      if (hit) return hit;
      const v = await embedder.embed(text, opts);
      cache.set(embedder.model_id, text, v);
      return v;
    },
  };
}
