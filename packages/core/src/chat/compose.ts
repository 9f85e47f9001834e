import type { SearchResult } from "@lens/contracts";
import { GenerationFailure, GenerationTimeout, StepTimeoutError, errorMessage, isAbortError } from "../errors";
import type { Generator } from "../llm/generator";
import { formatHms } from "../text/normalize";
import { withTimeout } from "../util/abort";

export const INSUFFICIENT_GROUNDING_ANSWER =
  "I could not find anything in the indexed lectures that answers this question.";

export const SYSTEM_PROMPT = [
  "You answer questions about recorded lectures.",
  "Use ONLY the SOURCES given with the question; do not add facts beyond them.",
  "When you use a source, cite it inline with its bracket ref, like [S1] or [S2].",
  "If the SOURCES do not answer the question, say so plainly.",
].join("\n");

export type ComposedAnswer = {
  answer: string;
  /** Refs like `S1` the answer cites, in first-use order. */
  citations: string[];
  /** Results that made it into the context. */
  context_results: SearchResult[];
};

export function extractCitedRefs(answer: string): string[] {
  const matches = answer.match(/\[S\d+\]/g) ?? [];
  return Array.from(new Set(matches.map((m) => m.slice(1, -1))));
}

export function formatSourceLine(r: SearchResult): string {
  const t = `${formatHms(r.chunk.start_ms)}-${formatHms(r.chunk.end_ms)}`;
  return `[S${r.rank}|${t}|video=${r.chunk.video_id}] ${r.chunk.text}`;
}

/**
 * Source lines in rank order that fit `maxChars`. The lowest ranked go first;
 * the top source alone is cut to the budget.
 */
export function buildContext(results: SearchResult[], maxChars: number): { text: string; included: SearchResult[] } {
  const ordered = [...results].sort((a, b) => a.rank - b.rank);
  const lines = ordered.map(formatSourceLine);

  let total = lines.reduce((n, l) => n + l.length, 0) + Math.max(0, lines.length - 1);
  while (lines.length > 1 && total > maxChars) {
    const dropped = lines.pop();
    total -= (dropped?.length ?? 0) + 1;
  }

  if (lines.length === 1 && lines[0].length > maxChars) {
    lines[0] = `${lines[0].slice(0, Math.max(0, maxChars - 3))}...`;
  }

  return { text: lines.join("\n"), included: ordered.slice(0, lines.length) };
}

export type AnswerComposerDeps = {
  generator: Generator;
  maxContextChars: number;
  timeoutMs: number;
};

export class AnswerComposer {
  constructor(private readonly deps: AnswerComposerDeps) {
    if (!(deps.maxContextChars > 0)) throw new Error("maxContextChars must be > 0");
  }

  async compose(query: string, results: SearchResult[], opts?: { signal?: AbortSignal }): Promise<ComposedAnswer> {
    if (results.length === 0) {
      return { answer: INSUFFICIENT_GROUNDING_ANSWER, citations: [], context_results: [] };
    }

    const { text, included } = buildContext(results, this.deps.maxContextChars);
    const prompt = ["SOURCES:", text, "", `QUESTION: ${query}`].join("\n");

    let raw: string;
    try {
      raw = await withTimeout(
        "generate",
        this.deps.timeoutMs,
        (signal) => this.deps.generator.generate({ system: SYSTEM_PROMPT, prompt, signal }),
        opts?.signal
      );
    } catch (err: unknown) {
      if (err instanceof StepTimeoutError) throw new GenerationTimeout(err.timeoutMs);
      if (isAbortError(err)) throw err;
      throw new GenerationFailure(`answer generation failed: ${errorMessage(err)}`, err);
    }

    const answer = raw.trim();
    if (!answer) throw new GenerationFailure("generator returned an empty answer");

    const known = new Set(included.map((r) => `S${r.rank}`));
    return {
      answer,
      citations: extractCitedRefs(answer).filter((ref) => known.has(ref)),
      context_results: included,
    };
  }
}
