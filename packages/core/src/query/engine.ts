import {
  AnswerOptionsSchema,
  type AnswerOptionsInput,
  type ClipArtifact,
  type DegradedStep,
  type HealthResponse,
  type QueryResult,
  type QueryState,
  type QueryStatus,
  type QueryStep,
  type SearchResult,
} from "@lens/contracts";
import type { AnswerComposer, ComposedAnswer } from "../chat/compose";
import type { ClipSynthesizer } from "../clips/synthesize";
import type { ClipCache, ClipLease } from "../clips/cache";
import { cachedEmbedder, type EmbeddingCache } from "../embeddings/cache";
import type { Embedder } from "../embeddings/provider";
import {
  EmbeddingFailure,
  InvalidQueryError,
  RetrievalTimeout,
  StepTimeoutError,
  errorMessage,
  isAbortError,
} from "../errors";
import type { Generator } from "../llm/generator";
import { logger as rootLogger, type Logger } from "../logger";
import { initMetrics, type Metrics } from "../metrics/metrics";
import type { Retriever } from "../search/retrieve";
import { abortError, withTimeout } from "../util/abort";

export type QueryEngineDeps = {
  embedder: Embedder;
  retriever: Retriever;
  composer: AnswerComposer;
  /** Null disables clips; queries asking for one come back without it. */
  clips: ClipSynthesizer | null;
  timeouts: { embedTimeoutMs: number; searchTimeoutMs: number; extractTimeoutMs: number };
  embeddingCache?: EmbeddingCache;
  clipCache?: ClipCache;
  generator?: Generator;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => number;
};

/**
 * A query result plus the pin on its clip file. Call `release()` once the
 * response has been consumed; until then eviction keeps the clip on disk.
 */
export type AnswerResult = QueryResult & { release: () => void };

class StepRecorder {
  readonly steps: QueryStep[] = [];

  constructor(
    private readonly metrics: Metrics,
    private readonly now: () => number
  ) {}

  mark(state: QueryState, error: string | null = null): void {
    this.steps.push({ state, duration_ms: 0, error });
  }

  async run<T>(state: QueryState, fn: () => Promise<T>): Promise<T> {
    const t0 = this.now();
    try {
      const v = await fn();
      this.record(state, t0, null);
      return v;
    } catch (err: unknown) {
      this.record(state, t0, errorMessage(err));
      throw err;
    }
  }

  private record(state: QueryState, t0: number, error: string | null): void {
    const duration = Math.max(0, this.now() - t0);
    this.steps.push({ state, duration_ms: duration, error });
    this.metrics.stepDurationMs.observe({ step: state, status: error ? "failed" : "ok" }, duration);
  }
}

/**
 * Runs one query end to end: embed, retrieve, then cut the top result's clip
 * and compose the answer side by side. Only bad parameters and a missing query
 * vector fail the query; every other failure comes back as a partial result.
 */
export class QueryEngine {
  private readonly embedder: Embedder;
  private readonly log: Logger;
  private readonly metrics: Metrics;
  private readonly now: () => number;

  constructor(private readonly deps: QueryEngineDeps) {
    this.embedder = deps.embeddingCache ? cachedEmbedder(deps.embedder, deps.embeddingCache) : deps.embedder;
    this.log = (deps.logger ?? rootLogger).child({ component: "query-engine" });
    this.metrics = deps.metrics ?? initMetrics();
    this.now = deps.now ?? Date.now;
  }

  async answer(queryText: string, options?: AnswerOptionsInput, ctx?: { signal?: AbortSignal }): Promise<AnswerResult> {
    const t0 = this.now();
    const signal = ctx?.signal;
    const rec = new StepRecorder(this.metrics, this.now);

    try {
      return await this.run(queryText, options, signal, rec, t0);
    } catch (err: unknown) {
      rec.mark("failed", errorMessage(err));
      this.metrics.queriesTotal.inc({ status: "failed" });
      this.log.warn({ err: errorMessage(err), latency_ms: this.now() - t0, steps: rec.steps.length }, "Query failed");
      throw err;
    }
  }

  private async run(
    queryText: string,
    options: AnswerOptionsInput | undefined,
    signal: AbortSignal | undefined,
    rec: StepRecorder,
    t0: number
  ): Promise<AnswerResult> {
    const query = typeof queryText === "string" ? queryText.trim() : "";
    if (!query) throw new InvalidQueryError("query text is empty");

    const parsed = AnswerOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
      throw new InvalidQueryError("invalid answer options", { issues: parsed.error.flatten().fieldErrors });
    }
    const opts = parsed.data;
    rec.mark("received");

    const { embedTimeoutMs, searchTimeoutMs, extractTimeoutMs } = this.deps.timeouts;
    const degraded: DegradedStep[] = [];

    const vector = await rec.run("embedding", async () => {
      try {
        const v = await withTimeout("embed", embedTimeoutMs, (s) => this.embedder.embed(query, { signal: s }), signal);
        this.metrics.embedRequestsTotal.inc({ status: "ok" });
        return v;
      } catch (err: unknown) {
        if (isAbortError(err)) throw err;
        this.metrics.embedRequestsTotal.inc({ status: "failed" });
        throw new EmbeddingFailure(`query embedding failed: ${errorMessage(err)}`, err);
      }
    });

    let results: SearchResult[] = [];
    try {
      results = await rec.run("retrieving", () =>
        withTimeout(
          "search",
          searchTimeoutMs,
          (s) => this.deps.retriever.search(vector, opts.top_k, opts.min_score, { signal: s }),
          signal
        )
      );
    } catch (err: unknown) {
      if (isAbortError(err) || err instanceof InvalidQueryError) throw err;
      const surfaced = err instanceof StepTimeoutError ? new RetrievalTimeout(err.timeoutMs) : err;
      this.log.warn({ err: errorMessage(surfaced) }, "Retrieval degraded to no results");
      degraded.push("retrieval");
    }

    const top = results[0];
    const clips = this.deps.clips;
    const clipTask: Promise<ClipLease | null> =
      opts.include_clip && top && clips
        ? rec.run("synthesizing", () =>
            withTimeout(
              "extract",
              extractTimeoutMs,
              (s) => clips.synthesize(top.chunk.video_id, top.chunk.start_ms, top.chunk.end_ms, { signal: s }),
              signal
            )
          )
        : Promise.resolve(null);
    const composeTask: Promise<ComposedAnswer> = rec.run("composing", () =>
      this.deps.composer.compose(query, results, { signal })
    );

    const [clipOutcome, composeOutcome] = await Promise.allSettled([clipTask, composeTask]);
    const lease = clipOutcome.status === "fulfilled" ? clipOutcome.value : null;
    if (signal?.aborted) {
      lease?.release();
      throw abortError();
    }

    const clip: ClipArtifact | null = lease ? lease.artifact : null;
    if (clipOutcome.status === "rejected") {
      this.log.warn({ err: errorMessage(clipOutcome.reason) }, "Clip degraded");
      degraded.push("clip");
    }

    let answer: string | null = null;
    let citations: string[] = [];
    if (composeOutcome.status === "fulfilled") {
      answer = composeOutcome.value.answer;
      citations = composeOutcome.value.citations;
    } else {
      this.log.warn({ err: errorMessage(composeOutcome.reason) }, "Answer degraded");
      degraded.push("answer");
    }

    rec.mark("assembled");
    const status: QueryStatus = degraded.length > 0 ? "partial" : results.length === 0 ? "no_results" : "complete";
    rec.mark("done");

    const latency = Math.max(0, this.now() - t0);
    this.metrics.queriesTotal.inc({ status });
    this.log.info({ status, degraded, results: results.length, clip: clip !== null, latency_ms: latency }, "Query answered");

    return {
      query,
      answer,
      citations,
      results,
      clip,
      status,
      degraded,
      latency_ms: latency,
      steps: rec.steps,
      release: () => lease?.release(),
    };
  }

  health(): HealthResponse {
    const gen = this.deps.generator;
    const clipStats = this.deps.clipCache?.stats();
    const embedStats = this.deps.embeddingCache?.stats();
    return {
      ok: true,
      service: "lens-core",
      embeddings: {
        enabled: true,
        provider: this.deps.embedder.provider,
        model_id: this.deps.embedder.model_id,
        reason: null,
      },
      generation: gen
        ? { enabled: true, provider: gen.provider, model_id: gen.model, reason: null }
        : { enabled: false, provider: null, model_id: null, reason: "no generator configured" },
      clip_cache: {
        entries: clipStats?.entries ?? 0,
        bytes: clipStats?.bytes ?? 0,
        in_flight: this.deps.clips?.inFlightCount ?? 0,
      },
      embedding_cache: {
        entries: embedStats?.entries ?? 0,
        hits: embedStats?.hits ?? 0,
        misses: embedStats?.misses ?? 0,
      },
    };
  }
}
