import type { TranscriptChunk } from "@lens/contracts";
import { hashText } from "../embeddings/cache";
import type { Embedder } from "../embeddings/provider";
import { errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import { initMetrics, type Metrics } from "../metrics/metrics";
import { withRetry, type RetryOpts } from "../util/retry";
import type { VectorIndex } from "../vector/types";

export type IndexFailure = {
  chunk_id: string;
  error: string;
  attempts: number;
};

export type IndexSummary = {
  /** Vectors written. */
  written: number;
  failed: IndexFailure[];
};

export type IndexerDeps = {
  embedder: Embedder;
  index: VectorIndex;
  retry?: Omit<RetryOpts, "onRetry">;
  logger?: Logger;
  metrics?: Metrics;
};

export class Indexer {
  private readonly log: Logger;
  private readonly metrics: Metrics;

  constructor(private readonly deps: IndexerDeps) {
    this.log = (deps.logger ?? rootLogger).child({ component: "indexer" });
    this.metrics = deps.metrics ?? initMetrics();
  }

  /**
   * Embed and upsert every chunk. A chunk whose embedding keeps failing after
   * the bounded retries is reported in `failed`; the rest of the batch goes on.
   */
  async index(chunks: TranscriptChunk[]): Promise<IndexSummary> {
    const { embedder, index } = this.deps;
    const failed: IndexFailure[] = [];
    let written = 0;

    for (const chunk of chunks) {
      let attempts = 0;
      let embedded = false;
      try {
        const vector = await withRetry(
          (attempt) => {
            attempts = attempt + 1;
            return embedder.embed(chunk.text);
          },
          {
            ...this.deps.retry,
            onRetry: (attempt, err, delayMs) => {
              this.log.warn({ chunk_id: chunk.id, attempt, delayMs, err: err.message }, "Embedding failed, retrying");
            },
          }
        );
        if (vector.length !== embedder.dimensions) {
          throw new Error(`expected ${embedder.dimensions} dims, got ${vector.length}`);
        }
        this.metrics.embedRequestsTotal.inc({ status: "ok" });
        embedded = true;

        await index.upsert({
          chunk,
          embedding: {
            chunk_id: chunk.id,
            model_id: embedder.model_id,
            dimensions: vector.length,
            vector,
            text_hash: hashText(chunk.text),
          },
        });
        written++;
      } catch (err: unknown) {
        if (attempts > 0 && !embedded) this.metrics.embedRequestsTotal.inc({ status: "failed" });
        const message = errorMessage(err);
        failed.push({ chunk_id: chunk.id, error: message, attempts });
        this.log.error({ chunk_id: chunk.id, video_id: chunk.video_id, attempts, err: message }, "Chunk not indexed");
      }
    }

    this.log.info({ chunks: chunks.length, written, failed: failed.length }, "Index batch finished");
    return { written, failed };
  }

  /** Supersede a video's previous chunks with a fresh set. */
  async replaceVideo(videoId: string, chunks: TranscriptChunk[]): Promise<IndexSummary> {
    const foreign = chunks.find((c) => c.video_id !== videoId);
    if (foreign) throw new Error(`chunk ${foreign.id} belongs to ${foreign.video_id}, not ${videoId}`);
    const removed = await this.deps.index.removeVideo(videoId);
    this.log.info({ video_id: videoId, removed }, "Removed previous chunks");
    return this.index(chunks);
  }
}
