import fs from "node:fs/promises";
import path from "node:path";
import type { SubtitleCue } from "@lens/contracts";
import { parseSubtitles, type SubtitleFormat } from "./parse";

/** Yields a video's cues in time order. */
export interface SubtitleSource {
  listCues(videoId: string): Promise<SubtitleCue[]>;
}

const CANDIDATES: Array<{ ext: string; format: SubtitleFormat }> = [
  { ext: ".vtt", format: "vtt" },
  { ext: ".srt", format: "srt" },
];

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** Reads `<dir>/<videoId>.vtt`, falling back to `<dir>/<videoId>.srt`. */
export class FileSubtitleSource implements SubtitleSource {
  constructor(private readonly baseDir: string) {}

  async listCues(videoId: string): Promise<SubtitleCue[]> {
    for (const c of CANDIDATES) {
      const file = path.join(this.baseDir, `${videoId}${c.ext}`);
      if (!(await exists(file))) continue;
      const text = await fs.readFile(file, "utf8");
      return parseSubtitles(text, videoId, c.format);
    }
    throw new Error(`No subtitle file for video ${videoId} in ${this.baseDir}`);
  }
}

export async function readSubtitleFile(filePath: string, videoId: string): Promise<SubtitleCue[]> {
  const text = await fs.readFile(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();
  const format: SubtitleFormat | undefined = ext === ".vtt" ? "vtt" : ext === ".srt" ? "srt" : undefined;
  return parseSubtitles(text, videoId, format);
}
