import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { ClipArtifact } from "@lens/contracts";
import { MediaExtractionError, errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { MediaStore } from "../media/store";
import { initMetrics, type Metrics } from "../metrics/metrics";
import { abandonOnAbort, throwIfAborted } from "../util/abort";
import type { ClipCache, ClipLease } from "./cache";
import { clipFingerprint, snapRange } from "./fingerprint";

export type ClipSynthesizerDeps = {
  media: MediaStore;
  cache: ClipCache;
  clipsDir: string;
  snapMs: number;
  /** Bound on one extraction, independent of any caller's wait. */
  extractTimeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
};

/** One caller waiting on an extraction; its lease is taken when the clip is published. */
type Waiter = { lease: ClipLease | null };

type Flight = { promise: Promise<ClipArtifact>; waiters: Set<Waiter> };

/**
 * Cuts playable clips for time ranges. Requests that snap to the same range
 * share one extraction; a caller that gives up stops waiting, but the
 * extraction finishes and is cached for the next request.
 *
 * Every clip is handed out leased: its file outlives eviction from the cache
 * until the caller calls `release()`.
 */
export class ClipSynthesizer {
  private readonly inFlight = new Map<string, Flight>();
  private readonly log: Logger;
  private readonly metrics: Metrics;

  constructor(private readonly deps: ClipSynthesizerDeps) {
    if (!(deps.snapMs >= 0)) throw new Error("snapMs must be >= 0");
    this.log = (deps.logger ?? rootLogger).child({ component: "clip-synthesizer" });
    this.metrics = deps.metrics ?? initMetrics();
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async synthesize(
    videoId: string,
    startMs: number,
    endMs: number,
    opts?: { signal?: AbortSignal }
  ): Promise<ClipLease> {
    throwIfAborted(opts?.signal);
    if (!videoId) throw new MediaExtractionError("video id is required");
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || startMs < 0 || endMs <= startMs) {
      throw new MediaExtractionError("invalid clip range", { details: { start_ms: startMs, end_ms: endMs } });
    }

    const snapped = snapRange(startMs, endMs, this.deps.snapMs);
    const fingerprint = clipFingerprint(videoId, snapped.start_ms, snapped.end_ms);

    const cached = this.deps.cache.acquire(fingerprint);
    if (cached) {
      this.metrics.clipCacheTotal.inc({ result: "hit" });
      return cached;
    }

    let flight = this.inFlight.get(fingerprint);
    if (flight) {
      this.metrics.clipCacheTotal.inc({ result: "coalesced" });
    } else {
      this.metrics.clipCacheTotal.inc({ result: "miss" });
      const waiters = new Set<Waiter>();
      const promise = this.extract(fingerprint, videoId, snapped.start_ms, snapped.end_ms, waiters).finally(() => {
        this.inFlight.delete(fingerprint);
      });
      flight = { promise, waiters };
      this.inFlight.set(fingerprint, flight);
      // Waiters may all abandon; the outcome is still observed here.
      promise.catch((err: unknown) => {
        this.log.debug({ fingerprint, err: errorMessage(err) }, "Extraction settled with an error");
      });
    }

    const waiter: Waiter = { lease: null };
    flight.waiters.add(waiter);
    try {
      await abandonOnAbort(flight.promise, opts?.signal);
    } catch (err: unknown) {
      flight.waiters.delete(waiter);
      waiter.lease?.release();
      throw err;
    }

    const lease = waiter.lease ?? this.deps.cache.acquire(fingerprint);
    if (!lease) {
      throw new MediaExtractionError(`clip ${fingerprint} was evicted before it could be leased`, {
        details: { video_id: videoId, fingerprint },
      });
    }
    return lease;
  }

  private async extract(
    fingerprint: string,
    videoId: string,
    startMs: number,
    endMs: number,
    waiters: Set<Waiter>
  ): Promise<ClipArtifact> {
    const { media, cache, clipsDir } = this.deps;
    const t0 = Date.now();
    const outPath = path.join(clipsDir, `${fingerprint}.mp4`);
    const tmpPath = path.join(clipsDir, `.${fingerprint}.${crypto.randomUUID()}.tmp.mp4`);
    const signal = this.deps.extractTimeoutMs ? AbortSignal.timeout(this.deps.extractTimeoutMs) : undefined;

    this.log.info({ fingerprint, video_id: videoId, start_ms: startMs, end_ms: endMs }, "Clip extraction started");
    try {
      const handle = await media.open(videoId);
      const start = startMs;
      const end = Math.min(endMs, handle.duration_ms);
      if (!(end > start)) {
        throw new MediaExtractionError(`clip range lies outside video ${videoId}`, {
          details: { video_id: videoId, start_ms: startMs, end_ms: endMs, duration_ms: handle.duration_ms },
        });
      }

      await fs.mkdir(clipsDir, { recursive: true });
      const size = await media.extract(handle, start, end, tmpPath, signal);
      await fs.rename(tmpPath, outPath);

      const artifact: ClipArtifact = {
        fingerprint,
        video_id: videoId,
        start_ms: start,
        end_ms: end,
        file_path: outPath,
        size_bytes: size,
        created_at: (this.deps.now?.() ?? new Date()).toISOString(),
      };
      cache.put(artifact);
      // Lease for every caller still waiting before anything else can evict the entry.
      for (const w of waiters) w.lease = cache.acquire(fingerprint);

      this.metrics.clipExtractionsTotal.inc({ status: "ok" });
      this.log.info({ fingerprint, size_bytes: size, ms: Date.now() - t0 }, "Clip extraction finished");
      return artifact;
    } catch (err: unknown) {
      this.metrics.clipExtractionsTotal.inc({ status: "failed" });
      await fs.rm(tmpPath, { force: true });
      this.log.error({ fingerprint, video_id: videoId, err: errorMessage(err) }, "Clip extraction failed");
      if (err instanceof MediaExtractionError) throw err;
      throw new MediaExtractionError(`clip extraction failed for ${videoId}: ${errorMessage(err)}`, {
        details: { video_id: videoId, start_ms: startMs, end_ms: endMs },
        cause: err,
      });
    }
  }
}
