import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

export type ExecResult = { stdout: string; stderr: string };

/**
 * Runs a binary and resolves with its output. Non-zero exits reject with the
 * child_process error, whose message carries stderr.
 */
export type ExecFn = (
  file: string,
  args: string[],
  opts: { timeoutMs: number; signal?: AbortSignal }
) => Promise<ExecResult>;

export const execTool: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: opts.timeoutMs,
    maxBuffer: 50 * 1024 * 1024,
    signal: opts.signal,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

export function ffmpegBin(env: Record<string, string | undefined> = process.env): string {
  return (env.LENS_FFMPEG_BIN || "ffmpeg").trim() || "ffmpeg";
}

export function ffprobeBin(env: Record<string, string | undefined> = process.env): string {
  return (env.LENS_FFPROBE_BIN || "ffprobe").trim() || "ffprobe";
}

const FfprobeFormatSchema = z.object({
  format: z.object({
    duration: z.coerce.number().nonnegative(),
  }),
});

export async function probeDurationMs(videoPath: string, opts?: { exec?: ExecFn; timeoutMs?: number }): Promise<number> {
  const exec = opts?.exec ?? execTool;
  const { stdout } = await exec(
    ffprobeBin(),
    ["-v", "quiet", "-print_format", "json", "-show_format", videoPath],
    { timeoutMs: opts?.timeoutMs ?? 30_000 }
  );
  const parsed = FfprobeFormatSchema.parse(JSON.parse(stdout));
  return Math.round(parsed.format.duration * 1000);
}

/** `HH:MM:SS.mmm` form ffmpeg accepts for -ss / -to. */
export function toFfmpegTime(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const h = Math.floor(total / 3_600_000);
  const m = Math.floor((total % 3_600_000) / 60_000);
  const s = Math.floor((total % 60_000) / 1000);
  const frac = total % 1000;
  const pad = (n: number, w = 2) => String(n).padStart(w, "0");
  return `${pad(h)}:${pad(m)}:${pad(s)}.${pad(frac, 3)}`;
}
