import type { ApiError } from "@lens/contracts";

export type LensErrorCode =
  | "malformed_input"
  | "invalid_query"
  | "embedding_failed"
  | "retrieval_timeout"
  | "media_extraction_failed"
  | "generation_timeout"
  | "generation_failed"
  | "step_timeout"
  | "internal";

export class LensError extends Error {
  readonly code: LensErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: LensErrorCode, message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = opts?.details;
  }
}

/** Bad ingestion data. Fatal to the single item being ingested, never to the batch. */
export class MalformedInputError extends LensError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("malformed_input", message, { details });
  }
}

/** Bad caller parameters. Fatal to the query. */
export class InvalidQueryError extends LensError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("invalid_query", message, { details });
  }
}

/** No query vector could be produced. Fatal to the query. */
export class EmbeddingFailure extends LensError {
  constructor(message: string, cause?: unknown) {
    super("embedding_failed", message, { cause });
  }
}

export class RetrievalTimeout extends LensError {
  constructor(timeoutMs: number) {
    super("retrieval_timeout", `Vector search timed out after ${timeoutMs}ms`, { details: { timeout_ms: timeoutMs } });
  }
}

export class MediaExtractionError extends LensError {
  constructor(message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super("media_extraction_failed", message, opts);
  }
}

export class GenerationTimeout extends LensError {
  constructor(timeoutMs: number) {
    super("generation_timeout", `Answer generation timed out after ${timeoutMs}ms`, { details: { timeout_ms: timeoutMs } });
  }
}

export class GenerationFailure extends LensError {
  constructor(message: string, cause?: unknown) {
    super("generation_failed", message, { cause });
  }
}

export class StepTimeoutError extends LensError {
  readonly step: string;
  readonly timeoutMs: number;

  constructor(step: string, timeoutMs: number) {
    super("step_timeout", `${step} timed out after ${timeoutMs}ms`, { details: { step, timeout_ms: timeoutMs } });
    this.step = step;
    this.timeoutMs = timeoutMs;
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function toErrorEnvelope(err: unknown): ApiError {
  if (err instanceof LensError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : null),
      },
    };
  }
  return { error: { code: "internal", message: errorMessage(err) || "internal error" } };
}
