import type { FrameSample, VideoAsset } from "@lens/contracts";
import { MalformedInputError, errorMessage } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";
import type { SubtitleSource } from "../subtitles/source";
import { segmentCues, type SegmentOptions } from "../text/segment";
import type { IndexFailure, Indexer } from "./indexer";

export type IngestItem = {
  video: VideoAsset;
  frames?: FrameSample[];
};

export type IngestReport = {
  video_id: string;
  cues: number;
  chunks: number;
  written: number;
  failed: IndexFailure[];
};

export type IngestBatchReport = {
  ingested: IngestReport[];
  /** Videos skipped because their input was malformed. */
  rejected: Array<{ video_id: string; error: string; details: Record<string, unknown> | null }>;
};

/** Subtitles to chunks to vectors for one video, superseding what was indexed before. */
export async function ingestVideo(
  item: IngestItem,
  deps: { subtitles: SubtitleSource; indexer: Indexer; segment: SegmentOptions }
): Promise<IngestReport> {
  const { video } = item;
  const cues = await deps.subtitles.listCues(video.id);
  const chunks = segmentCues(video, cues, item.frames ?? [], deps.segment);
  const summary = await deps.indexer.replaceVideo(video.id, chunks);
  return { video_id: video.id, cues: cues.length, chunks: chunks.length, ...summary };
}

/**
 * Ingest several videos. Malformed input rejects that video only; any other
 * error stops the batch.
 */
export async function ingestVideos(
  items: IngestItem[],
  deps: { subtitles: SubtitleSource; indexer: Indexer; segment: SegmentOptions; logger?: Logger }
): Promise<IngestBatchReport> {
  const log = (deps.logger ?? rootLogger).child({ component: "ingest" });
  const report: IngestBatchReport = { ingested: [], rejected: [] };

  for (const item of items) {
    try {
      const r = await ingestVideo(item, deps);
      report.ingested.push(r);
      log.info({ video_id: r.video_id, cues: r.cues, chunks: r.chunks, written: r.written }, "Video ingested");
    } catch (err: unknown) {
      if (!(err instanceof MalformedInputError)) throw err;
      report.rejected.push({ video_id: item.video.id, error: errorMessage(err), details: err.details ?? null });
      log.warn({ video_id: item.video.id, err: err.message, details: err.details }, "Video rejected");
    }
  }
  return report;
}
