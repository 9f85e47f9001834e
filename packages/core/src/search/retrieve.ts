import type { SearchResult } from "@lens/contracts";
import { InvalidQueryError } from "../errors";
import type { VectorCandidate, VectorIndex } from "../vector/types";

export type RetrieverOptions = {
  index: VectorIndex;
  /** Candidates requested per result slot, to survive dedup. */
  overfetchFactor: number;
  /** Ranges of one video closer than this are the same passage. */
  mergeGapMs: number;
  modelId: string;
};

function better(a: VectorCandidate, b: VectorCandidate): boolean {
  if (a.score !== b.score) return a.score > b.score;
  return a.chunk.start_ms < b.chunk.start_ms;
}

/**
 * Collapse one video's candidates whose ranges overlap or sit closer than `gapMs`.
 * Sweeping in start order makes grouping transitive, and the resulting unions
 * are pairwise further apart than the gap.
 */
export function mergeNearby(candidates: VectorCandidate[], gapMs: number): VectorCandidate[] {
  const sorted = [...candidates].sort((a, b) => a.chunk.start_ms - b.chunk.start_ms || a.chunk.end_ms - b.chunk.end_ms);
  const out: VectorCandidate[] = [];

  let best: VectorCandidate | null = null;
  let start = 0;
  let end = 0;

  const flush = () => {
    if (!best) return;
    out.push({ chunk: { ...best.chunk, start_ms: start, end_ms: end }, score: best.score });
  };

  for (const c of sorted) {
    if (best && c.chunk.start_ms - end < gapMs) {
      end = Math.max(end, c.chunk.end_ms);
      if (better(c, best)) best = c;
      continue;
    }
    flush();
    best = c;
    start = c.chunk.start_ms;
    end = c.chunk.end_ms;
  }
  flush();
  return out;
}

export class Retriever {
  constructor(private readonly opts: RetrieverOptions) {
    if (!Number.isInteger(opts.overfetchFactor) || opts.overfetchFactor < 1) {
      throw new Error("overfetchFactor must be an integer >= 1");
    }
    if (!(opts.mergeGapMs >= 0)) throw new Error("mergeGapMs must be >= 0");
  }

  /**
   * Top `topK` passages scoring at least `minScore`, deduplicated so that no
   * two results of one video overlap. Empty when nothing clears the floor.
   */
  async search(
    vector: number[],
    topK: number,
    minScore: number,
    opts?: { signal?: AbortSignal }
  ): Promise<SearchResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidQueryError("top_k must be an integer >= 1", { top_k: topK });
    }
    if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) {
      throw new InvalidQueryError("min_score must be within [0, 1]", { min_score: minScore });
    }
    if (vector.length === 0) throw new InvalidQueryError("query vector is empty");

    const candidates = await this.opts.index.search(vector, topK * this.opts.overfetchFactor, {
      model_id: this.opts.modelId,
      signal: opts?.signal,
    });

    const byVideo = new Map<string, VectorCandidate[]>();
    for (const c of candidates) {
      if (c.score < minScore) continue;
      const list = byVideo.get(c.chunk.video_id);
      if (list) list.push(c);
      else byVideo.set(c.chunk.video_id, [c]);
    }

    const merged: VectorCandidate[] = [];
    for (const list of byVideo.values()) merged.push(...mergeNearby(list, this.opts.mergeGapMs));

    merged.sort((a, b) => b.score - a.score || a.chunk.start_ms - b.chunk.start_ms);
    return merged.slice(0, topK).map((c, i) => ({ chunk: c.chunk, score: c.score, rank: i + 1 }));
  }
}
