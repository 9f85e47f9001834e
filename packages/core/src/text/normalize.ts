const SOUND_TAG_RE = /\[(music|applause|laughter)\]/gi;
const INLINE_TAG_RE = /<[^>]*>/g;

export function normalizeCueText(text: string): string {
  return text
    .replace(INLINE_TAG_RE, "")
    .replace(SOUND_TAG_RE, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function estimateTokens(text: string): number {
  // Rough heuristic used for context budgeting.
  return Math.max(1, Math.ceil(text.length / 4));
}

export function formatHms(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor((totalSeconds % 3600) / 60);
  const s = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(h)}:${pad(m)}:${pad(s)}`;
}
