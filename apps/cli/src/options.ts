import type { AnswerOptionsInput } from "@lens/contracts";

export type AskFlags = {
  topK: string;
  minScore: string;
  clip: boolean;
};

/**
 * Map `ask` flags to engine options without defaulting bad input: a value that
 * is not a number becomes NaN, which the engine rejects as an invalid query.
 */
export function askOptions(flags: AskFlags): AnswerOptionsInput {
  return {
    top_k: Number(flags.topK),
    min_score: Number(flags.minScore),
    include_clip: flags.clip,
  };
}
