import fs from "node:fs/promises";
import path from "node:path";
import { MediaExtractionError, errorMessage, isAbortError } from "../errors";
import { execTool, ffmpegBin, probeDurationMs, toFfmpegTime, type ExecFn } from "./ffmpeg";

export type MediaHandle = {
  video_id: string;
  path: string;
  duration_ms: number;
};

/** Source media for clip extraction. */
export interface MediaStore {
  open(videoId: string): Promise<MediaHandle>;
  /** Write `[startMs, endMs)` of the media to `outPath`; resolves with the bytes written. */
  extract(handle: MediaHandle, startMs: number, endMs: number, outPath: string, signal?: AbortSignal): Promise<number>;
}

export const VIDEO_EXTENSIONS = [".mp4", ".mkv", ".webm", ".mov", ".avi"] as const;

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** `<videosDir>/<videoId>.<ext>` on local disk, cut with ffmpeg stream copy. */
export class FfmpegMediaStore implements MediaStore {
  private readonly durations = new Map<string, number>();
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;

  constructor(
    private readonly videosDir: string,
    opts?: { exec?: ExecFn; timeoutMs?: number }
  ) {
    this.exec = opts?.exec ?? execTool;
    this.timeoutMs = opts?.timeoutMs ?? 120_000;
  }

  async resolvePath(videoId: string): Promise<string> {
    if (!videoId || videoId.includes("/") || videoId.includes("\\") || videoId.startsWith(".")) {
      throw new MediaExtractionError(`invalid video id: ${videoId}`, { details: { video_id: videoId } });
    }
    for (const ext of VIDEO_EXTENSIONS) {
      const p = path.join(this.videosDir, `${videoId}${ext}`);
      if (await exists(p)) return p;
    }
    throw new MediaExtractionError(`no media file for video ${videoId}`, {
      details: { video_id: videoId, dir: this.videosDir },
    });
  }

  async open(videoId: string): Promise<MediaHandle> {
    const p = await this.resolvePath(videoId);
    let duration = this.durations.get(p);
    if (duration === undefined) {
      try {
        duration = await probeDurationMs(p, { exec: this.exec, timeoutMs: this.timeoutMs });
      } catch (err: unknown) {
        throw new MediaExtractionError(`ffprobe failed for ${videoId}: ${errorMessage(err)}`, {
          details: { video_id: videoId },
          cause: err,
        });
      }
      this.durations.set(p, duration);
    }
    return { video_id: videoId, path: p, duration_ms: duration };
  }

  async extract(handle: MediaHandle, startMs: number, endMs: number, outPath: string, signal?: AbortSignal): Promise<number> {
    if (!(endMs > startMs)) {
      throw new MediaExtractionError("empty clip range", { details: { start_ms: startMs, end_ms: endMs } });
    }
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    const args = [
      "-hide_banner",
      "-loglevel", "error",
      "-y",
      "-ss", toFfmpegTime(startMs),
      "-to", toFfmpegTime(endMs),
      "-i", handle.path,
      "-c", "copy",
      "-avoid_negative_ts", "make_zero",
      "-f", "mp4",
      outPath,
    ];
    try {
      await this.exec(ffmpegBin(), args, { timeoutMs: this.timeoutMs, signal });
    } catch (err: unknown) {
      if (isAbortError(err)) throw err;
      throw new MediaExtractionError(`ffmpeg failed for ${handle.video_id}: ${errorMessage(err)}`, {
        details: { video_id: handle.video_id, start_ms: startMs, end_ms: endMs },
        cause: err,
      });
    }
    const stat = await fs.stat(outPath);
    if (stat.size === 0) {
      throw new MediaExtractionError(`ffmpeg wrote an empty clip for ${handle.video_id}`, {
        details: { video_id: handle.video_id, start_ms: startMs, end_ms: endMs },
      });
    }
    return stat.size;
  }
}
