import fs from "node:fs/promises";
import type { TranscriptChunk } from "@lens/contracts";
import type { Embedder } from "../src/embeddings/provider";
import type { Generator, GenerateRequest } from "../src/llm/generator";
import type { MediaHandle, MediaStore } from "../src/media/store";
import { estimateTokens } from "../src/text/normalize";
import { chunkId } from "../src/text/segment";

export function makeChunk(videoId: string, startMs: number, endMs: number, text = `text ${startMs}`, idx = 0): TranscriptChunk {
  return {
    id: chunkId(videoId, startMs, endMs),
    video_id: videoId,
    idx,
    start_ms: startMs,
    end_ms: endMs,
    text,
    cue_start_idx: idx,
    cue_end_idx: idx,
    frame: null,
    token_estimate: estimateTokens(text),
  };
}

/** Embeds by lookup; unknown text gets a fixed fallback vector. */
export class FakeEmbedder implements Embedder {
  readonly provider = "fake";
  readonly calls: string[] = [];
  failures = new Map<string, Error[]>();

  constructor(
    private readonly vectors: Map<string, number[]>,
    readonly model_id = "fake-embed",
    readonly dimensions = 3,
    private readonly fallback: number[] = [0, 0, 1]
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const queued = this.failures.get(text);
    const err = queued?.shift();
    if (err) throw err;
    return [...(this.vectors.get(text) ?? this.fallback)];
  }
}

/** Deterministic bag-of-words vectors: each word adds one to a hashed bucket. */
export class BagOfWordsEmbedder implements Embedder {
  readonly provider = "fake";
  readonly model_id = "bag-of-words";
  readonly calls: string[] = [];

  constructor(readonly dimensions = 32) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const v = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let h = 7;
      for (let i = 0; i < word.length; i++) h = (h * 31 + word.charCodeAt(i)) % 1_000_003;
      v[h % this.dimensions] += 1;
    }
    return v;
  }
}

export class FakeGenerator implements Generator {
  readonly provider = "fake";
  readonly model = "fake-chat";
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly reply: (req: GenerateRequest) => Promise<string>) {}

  generate(req: GenerateRequest): Promise<string> {
    this.requests.push(req);
    return this.reply(req);
  }
}

/** Resolves once `signal` aborts, rejecting like fetch does. */
export function hangUntilAborted<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_, reject) => {
    const fail = () => {
      const err = new Error("The operation was aborted");
      err.name = "AbortError";
      reject(err);
    };
    if (signal?.aborted) return fail();
    signal?.addEventListener("abort", fail, { once: true });
  });
}

export function deferred<T>(): { promise: Promise<T>; resolve: (v: T) => void; reject: (err: unknown) => void } {
  let resolve: (v: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Writes a small placeholder file per extraction; `gate` holds extractions back. */
export class FakeMedia implements MediaStore {
  readonly extracts: Array<{ start: number; end: number; outPath: string }> = [];
  gate: Promise<void> | null = null;
  failNext: Error | null = null;
  openError: Error | null = null;

  constructor(private readonly durationMs = 600_000) {}

  async open(videoId: string): Promise<MediaHandle> {
    if (this.openError) throw this.openError;
    return { video_id: videoId, path: `/videos/${videoId}.mp4`, duration_ms: this.durationMs };
  }

  async extract(_handle: MediaHandle, start: number, end: number, outPath: string): Promise<number> {
    this.extracts.push({ start, end, outPath });
    if (this.gate) await this.gate;
    const err = this.failNext;
    if (err) {
      this.failNext = null;
      throw err;
    }
    await fs.writeFile(outPath, "clip-bytes");
    return 10;
  }
}
