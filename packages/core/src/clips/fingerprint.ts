import crypto from "node:crypto";

/** Round both ends to the nearest `snapMs`; a range that collapses keeps one step. */
export function snapRange(startMs: number, endMs: number, snapMs: number): { start_ms: number; end_ms: number } {
  if (!(snapMs > 0)) return { start_ms: Math.round(startMs), end_ms: Math.round(endMs) };
  const start = Math.max(0, Math.round(startMs / snapMs) * snapMs);
  let end = Math.round(endMs / snapMs) * snapMs;
  if (end <= start) end = start + snapMs;
  return { start_ms: start, end_ms: end };
}

export function clipFingerprint(videoId: string, startMs: number, endMs: number): string {
  return crypto.createHash("sha256").update(`${videoId}|${startMs}|${endMs}`, "utf8").digest("hex");
}
