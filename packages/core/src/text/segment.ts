import crypto from "node:crypto";
import type { FrameSample, SubtitleCue, TranscriptChunk, VideoAsset } from "@lens/contracts";
import { MalformedInputError } from "../errors";
import { estimateTokens, normalizeCueText } from "./normalize";

export type SegmentOptions = {
  /** Upper bound on a chunk's end - start. */
  maxChunkDurationMs: number;
  /** A pause longer than this between two cues closes the open chunk. */
  silenceGapMs: number;
};

type OpenChunk = {
  startMs: number;
  endMs: number;
  cueStartIdx: number;
  cueEndIdx: number;
  parts: string[];
};

export function chunkId(videoId: string, startMs: number, endMs: number): string {
  return crypto.createHash("sha256").update(`${videoId}:${startMs}:${endMs}`, "utf8").digest("hex").slice(0, 32);
}

/** Frame closest to `atMs`; ties go to the earlier timestamp. */
export function nearestFrame(frames: FrameSample[], atMs: number): FrameSample | null {
  let best: FrameSample | null = null;
  let bestDist = Infinity;
  for (const f of frames) {
    const d = Math.abs(f.timestamp_ms - atMs);
    if (d < bestDist || (d === bestDist && best != null && f.timestamp_ms < best.timestamp_ms)) {
      best = f;
      bestDist = d;
    }
  }
  return best;
}

/**
 * Reject cues that run backwards or whose starts go back in time. The index in
 * the error is the position in `cues`, not the cue's own `idx`.
 */
export function validateCues(videoId: string, cues: SubtitleCue[]): void {
  for (let i = 0; i < cues.length; i++) {
    const c = cues[i];
    if (c.video_id !== videoId) {
      throw new MalformedInputError(`Cue ${i} belongs to video ${c.video_id}, expected ${videoId}`, { cue_index: i });
    }
    if (!Number.isFinite(c.start_ms) || !Number.isFinite(c.end_ms) || c.end_ms < c.start_ms) {
      throw new MalformedInputError(`Cue ${i} ends before it starts (${c.start_ms}..${c.end_ms})`, { cue_index: i });
    }
    if (i > 0 && c.start_ms < cues[i - 1].start_ms) {
      throw new MalformedInputError(
        `Cue ${i} starts at ${c.start_ms}ms, before cue ${i - 1} at ${cues[i - 1].start_ms}ms`,
        { cue_index: i }
      );
    }
  }
}

export function segmentCues(
  video: VideoAsset,
  cues: SubtitleCue[],
  frames: FrameSample[],
  opts: SegmentOptions
): TranscriptChunk[] {
  if (cues.length === 0) return [];
  if (!(opts.maxChunkDurationMs > 0)) throw new Error("maxChunkDurationMs must be > 0");
  validateCues(video.id, cues);

  const maxDur = opts.maxChunkDurationMs;
  const chunks: TranscriptChunk[] = [];
  let open: OpenChunk | null = null;
  // Chunks never start before the previous one ended, even when cues overlap.
  let floorMs = 0;

  const close = (c: OpenChunk) => {
    floorMs = Math.max(floorMs, c.endMs);
    const startMs = c.startMs;
    const endMs = Math.min(c.endMs, video.duration_ms);
    if (startMs >= endMs) return;
    const text = c.parts.join(" ").replace(/\s+/g, " ").trim();
    if (!text) return;
    chunks.push({
      id: chunkId(video.id, startMs, endMs),
      video_id: video.id,
      idx: chunks.length,
      start_ms: startMs,
      end_ms: endMs,
      text,
      cue_start_idx: c.cueStartIdx,
      cue_end_idx: c.cueEndIdx,
      frame: nearestFrame(frames, (startMs + endMs) / 2),
      token_estimate: estimateTokens(text),
    });
  };

  for (let i = 0; i < cues.length; i++) {
    const cue = cues[i];
    const text = normalizeCueText(cue.text);
    if (!text) continue;

    if (open) {
      const gap = cue.start_ms - open.endMs;
      const span = Math.max(open.endMs, cue.end_ms) - open.startMs;
      if (gap > opts.silenceGapMs || span > maxDur) {
        close(open);
        open = null;
      }
    }

    if (!open) {
      const startMs = Math.max(cue.start_ms, floorMs);
      // A lone cue longer than the limit is cut at the limit.
      const endMs = Math.min(Math.max(startMs, cue.end_ms), startMs + maxDur);
      open = { startMs, endMs, cueStartIdx: i, cueEndIdx: i, parts: [text] };
      continue;
    }

    open.endMs = Math.max(open.endMs, cue.end_ms);
    open.cueEndIdx = i;
    open.parts.push(text);
  }

  if (open) close(open);
  return chunks;
}
