import type { QueryResult } from "@lens/contracts";

export function formatMs(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const s = Math.floor(total / 1000);
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  if (h > 0) return `${h}:${String(m).padStart(2, "0")}:${String(ss).padStart(2, "0")}`;
  return `${m}:${String(ss).padStart(2, "0")}`;
}

export function padRight(s: string, n: number): string {
  if (s.length >= n) return s;
  return s + " ".repeat(n - s.length);
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  if (n <= 3) return s.slice(0, Math.max(0, n));
  return s.slice(0, Math.max(0, n - 3)) + "...";
}

export function parseCsvList(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

type TableValue = string | number | boolean | null | undefined;

function asCell(value: TableValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/** Header, separator and one line per row; columns come from the first row. */
export function renderTable(rows: Array<Record<string, TableValue>>): string[] {
  if (rows.length === 0) return [];
  const cols = Object.keys(rows[0] ?? {});
  const widths = new Map<string, number>();
  for (const c of cols) widths.set(c, c.length);
  for (const r of rows) {
    for (const c of cols) widths.set(c, Math.max(widths.get(c) ?? 0, asCell(r[c]).length));
  }
  const lines = [
    cols.map((c) => padRight(c, widths.get(c) ?? c.length)).join("  "),
    cols.map((c) => "-".repeat(widths.get(c) ?? c.length)).join("  "),
  ];
  for (const r of rows) lines.push(cols.map((c) => padRight(asCell(r[c]), widths.get(c) ?? 0)).join("  "));
  return lines.map((l) => l.trimEnd());
}

export function printTable(rows: Array<Record<string, TableValue>>): void {
  for (const line of renderTable(rows)) console.log(line);
}

export function resultRows(result: QueryResult): Array<Record<string, TableValue>> {
  return result.results.map((r) => ({
    ref: `S${r.rank}`,
    at: `${formatMs(r.chunk.start_ms)}-${formatMs(r.chunk.end_ms)}`,
    video_id: r.chunk.video_id,
    score: r.score.toFixed(3),
    text: truncate(r.chunk.text, 60),
  }));
}

/** Plain-text rendering of a query result for the terminal. */
export function renderQueryResult(result: QueryResult): string[] {
  const lines: string[] = [];
  lines.push(result.answer ?? "(no answer)");
  lines.push("");
  const table = renderTable(resultRows(result));
  if (table.length) lines.push(...table, "");
  lines.push(`clip: ${result.clip ? result.clip.file_path : "none"}`);
  const degraded = result.degraded.length ? ` (degraded: ${result.degraded.join(", ")})` : "";
  lines.push(`status: ${result.status}${degraded} in ${Math.round(result.latency_ms)}ms`);
  return lines;
}
