import type { SubtitleCue } from "@lens/contracts";
import { MalformedInputError } from "../errors";
import { normalizeCueText } from "../text/normalize";

export type SubtitleFormat = "vtt" | "srt";

const TIMESTAMP_RE = /^(?:(\d+):)?(\d{1,2}):(\d{2})(?:[.,](\d{1,3}))?$/;
const SKIPPED_VTT_BLOCKS = ["NOTE", "STYLE", "REGION"];

/**
 * Parse `HH:MM:SS.mmm`, `MM:SS.mmm` or the SRT form `HH:MM:SS,mmm` into ms.
 * Returns null when the string is not a timestamp.
 */
export function parseTimestamp(raw: string): number | null {
  const m = TIMESTAMP_RE.exec(raw.trim());
  if (!m) return null;
  const h = m[1] ? Number(m[1]) : 0;
  const min = Number(m[2]);
  const s = Number(m[3]);
  const frac = m[4] ? Number(m[4].padEnd(3, "0")) : 0;
  if (min > 59 || s > 59) return null;
  return ((h * 60 + min) * 60 + s) * 1000 + frac;
}

export function detectSubtitleFormat(text: string): SubtitleFormat {
  return text.replace(/^\uFEFF/, "").trimStart().startsWith("WEBVTT") ? "vtt" : "srt";
}

function splitBlocks(text: string): string[][] {
  return text
    .replace(/^\uFEFF/, "")
    .replace(/\r\n?/g, "\n")
    .split(/\n{2,}/)
    .map((b) => b.split("\n").filter((l) => l.trim().length > 0))
    .filter((lines) => lines.length > 0);
}

function parseBlocks(blocks: string[][], videoId: string, format: SubtitleFormat): SubtitleCue[] {
  const cues: SubtitleCue[] = [];

  blocks.forEach((lines, blockIdx) => {
    if (format === "vtt") {
      const head = lines[0].trim();
      if (blockIdx === 0 && head.startsWith("WEBVTT")) return;
      if (SKIPPED_VTT_BLOCKS.some((k) => head === k || head.startsWith(`${k} `))) return;
    }

    const timingIdx = lines.findIndex((l) => l.includes("-->"));
    if (timingIdx === -1) {
      throw new MalformedInputError(`Subtitle block ${blockIdx} has no timing line`, { block_index: blockIdx });
    }

    const [left, right = ""] = lines[timingIdx].split("-->");
    // VTT cue settings (align:, position:, ...) follow the end timestamp.
    const endToken = right.trim().split(/\s+/)[0] ?? "";
    const startMs = parseTimestamp(left);
    const endMs = parseTimestamp(endToken);
    if (startMs == null || endMs == null) {
      throw new MalformedInputError(`Subtitle block ${blockIdx} has an unparsable timing line`, {
        block_index: blockIdx,
        line: lines[timingIdx],
      });
    }

    const text = normalizeCueText(lines.slice(timingIdx + 1).join(" "));
    if (!text) return;

    cues.push({ video_id: videoId, idx: cues.length, start_ms: startMs, end_ms: endMs, text });
  });

  return cues;
}

export function parseWebVtt(text: string, videoId: string): SubtitleCue[] {
  return parseBlocks(splitBlocks(text), videoId, "vtt");
}

export function parseSrt(text: string, videoId: string): SubtitleCue[] {
  return parseBlocks(splitBlocks(text), videoId, "srt");
}

export function parseSubtitles(text: string, videoId: string, format?: SubtitleFormat): SubtitleCue[] {
  const f = format ?? detectSubtitleFormat(text);
  return f === "vtt" ? parseWebVtt(text, videoId) : parseSrt(text, videoId);
}
