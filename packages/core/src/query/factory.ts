import { AnswerComposer } from "../chat/compose";
import { ClipCache } from "../clips/cache";
import { ClipSynthesizer } from "../clips/synthesize";
import type { EngineConfig } from "../config/engine";
import { EmbeddingCache } from "../embeddings/cache";
import type { Embedder } from "../embeddings/provider";
import { Indexer } from "../indexing/indexer";
import type { Generator } from "../llm/generator";
import { logger as rootLogger, type Logger } from "../logger";
import type { MediaStore } from "../media/store";
import { initMetrics, type Metrics } from "../metrics/metrics";
import { Retriever } from "../search/retrieve";
import type { VectorIndex } from "../vector/types";
import { QueryEngine } from "./engine";

export type LensRuntime = {
  engine: QueryEngine;
  indexer: Indexer;
  retriever: Retriever;
  synthesizer: ClipSynthesizer | null;
  clipCache: ClipCache;
  embeddingCache: EmbeddingCache;
  /**
   * Tear down the process-wide caches; call once at shutdown. Clip files are
   * removed unless `keepClipFiles` is set, leased ones on their last release.
   */
  shutdown: (opts?: { keepClipFiles?: boolean }) => void;
};

/**
 * Wire the engine's components from tunables and collaborators. The caches are
 * created here, once, and shared by everything the runtime hands out.
 */
export function createLensRuntime(
  config: EngineConfig,
  deps: {
    embedder: Embedder;
    index: VectorIndex;
    generator: Generator;
    media: MediaStore | null;
    clipsDir: string;
    logger?: Logger;
    metrics?: Metrics;
  }
): LensRuntime {
  const logger = deps.logger ?? rootLogger;
  const metrics = deps.metrics ?? initMetrics();

  const embeddingCache = new EmbeddingCache(config.embedCacheMaxEntries);
  const clipCache = new ClipCache({
    maxEntries: config.clipCacheMaxEntries,
    maxBytes: config.clipCacheMaxBytes,
    maxAgeMs: config.clipCacheMaxAgeMs,
    logger,
  });

  const retriever = new Retriever({
    index: deps.index,
    overfetchFactor: config.overfetchFactor,
    mergeGapMs: config.mergeGapMs,
    modelId: deps.embedder.model_id,
  });

  const synthesizer = deps.media
    ? new ClipSynthesizer({
        media: deps.media,
        cache: clipCache,
        clipsDir: deps.clipsDir,
        snapMs: config.snapMs,
        extractTimeoutMs: config.extractTimeoutMs,
        logger,
        metrics,
      })
    : null;

  const composer = new AnswerComposer({
    generator: deps.generator,
    maxContextChars: config.maxContextChars,
    timeoutMs: config.generateTimeoutMs,
  });

  const indexer = new Indexer({
    embedder: deps.embedder,
    index: deps.index,
    retry: {
      maxRetries: config.embedRetries,
      initialDelayMs: config.embedRetryBaseMs,
      maxDelayMs: config.embedRetryMaxMs,
    },
    logger,
    metrics,
  });

  const engine = new QueryEngine({
    embedder: deps.embedder,
    retriever,
    composer,
    clips: synthesizer,
    timeouts: {
      embedTimeoutMs: config.embedTimeoutMs,
      searchTimeoutMs: config.searchTimeoutMs,
      extractTimeoutMs: config.extractTimeoutMs,
    },
    embeddingCache,
    clipCache,
    generator: deps.generator,
    logger,
    metrics,
  });

  return {
    engine,
    indexer,
    retriever,
    synthesizer,
    clipCache,
    embeddingCache,
    shutdown: (opts) => {
      embeddingCache.clear();
      const cleared = clipCache.clear({ keepFiles: opts?.keepClipFiles });
      logger.debug({ clips: cleared, kept_files: opts?.keepClipFiles ?? false }, "Runtime caches cleared");
    },
  };
}
