import fs from "node:fs/promises";
import path from "node:path";
import type { FrameSample } from "@lens/contracts";
import { execTool, ffmpegBin, type ExecFn } from "../media/ffmpeg";

/**
 * Parse frame timestamps from ffmpeg showinfo filter stderr output.
 * The showinfo filter outputs lines like:
 *   [Parsed_showinfo_1 @ 0x...] n:   0 pts:  12345 pts_time:1.234
 */
const SHOWINFO_RE = /\bn:\s*(\d+)\b.*\bpts_time:\s*([\d.]+)/;

export function parseShowInfoLine(line: string): { n: number; timestampMs: number } | null {
  const match = SHOWINFO_RE.exec(line);
  if (!match) return null;
  const n = parseInt(match[1], 10);
  const ptsTime = parseFloat(match[2]);
  if (!Number.isFinite(n) || !Number.isFinite(ptsTime)) return null;
  return { n, timestampMs: Math.round(ptsTime * 1000) };
}

export function parseShowInfo(stderr: string): Array<{ n: number; timestampMs: number }> {
  const out: Array<{ n: number; timestampMs: number }> = [];
  for (const line of stderr.split("\n")) {
    const info = parseShowInfoLine(line);
    if (info) out.push(info);
  }
  return out.sort((a, b) => a.n - b.n);
}

/**
 * Sample one frame every `intervalMs` with ffmpeg's fps filter. Frame files are
 * written as `frame_%06d.jpg` under `outputDir`; timestamps come from showinfo
 * and fall back to `i * intervalMs` when ffmpeg printed fewer lines than files.
 */
export async function sampleFrames(
  videoId: string,
  videoPath: string,
  outputDir: string,
  opts: { intervalMs: number; maxWidth?: number; timeoutMs?: number; exec?: ExecFn }
): Promise<FrameSample[]> {
  const exec = opts.exec ?? execTool;
  const maxWidth = opts.maxWidth ?? 640;
  const intervalS = opts.intervalMs / 1000;

  await fs.mkdir(outputDir, { recursive: true });
  const outputPattern = path.join(outputDir, "frame_%06d.jpg");

  // format=yuvj420p converts to full-range YUV which mjpeg requires
  const vf = `fps=1/${intervalS},showinfo,scale=${maxWidth}:-2,format=yuvj420p`;
  const { stderr } = await exec(
    ffmpegBin(),
    ["-i", videoPath, "-vf", vf, "-fps_mode", "vfr", "-qscale:v", "4", "-y", outputPattern],
    { timeoutMs: opts.timeoutMs ?? 600_000 }
  );

  const infos = parseShowInfo(stderr);
  const files = (await fs.readdir(outputDir)).filter((f) => f.startsWith("frame_") && f.endsWith(".jpg")).sort();

  return files.map((file, i) => ({
    video_id: videoId,
    timestamp_ms: infos[i]?.timestampMs ?? i * opts.intervalMs,
    image_ref: path.join(outputDir, file),
  }));
}
