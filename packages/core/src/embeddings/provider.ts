import type { ProviderStatus } from "@lens/contracts";
import { embedWithOllama } from "./ollama";
import { embedWithOpenAI } from "./openai";
import { getLensDefault } from "../config/defaults";

export type EmbeddingsProvider = "ollama" | "openai" | "disabled";

/** The index's vector column width. */
export const INDEX_DIMENSIONS = 768;

export type EmbeddingsStatus = ProviderStatus & {
  dimensions: number | null;
};

/** Text to fixed-length vector. Deterministic for a fixed `model_id`. */
export type Embedder = {
  provider: string;
  model_id: string;
  dimensions: number;
  embed: (text: string, opts?: { signal?: AbortSignal }) => Promise<number[]>;
};

function clean(s: unknown): string {
  return typeof s === "string" ? s.trim() : "";
}

export function getEmbeddingsStatus(env: Record<string, string | undefined> = process.env): EmbeddingsStatus {
  const providerRaw = clean(env.LENS_EMBED_PROVIDER).toLowerCase();
  const provider: EmbeddingsProvider =
    providerRaw === "openai" || providerRaw === "ollama" || providerRaw === "disabled" ? providerRaw : "ollama";

  if (provider === "disabled") {
    return { enabled: false, provider: "disabled", model_id: null, dimensions: null, reason: "embeddings disabled" };
  }

  if (provider === "openai") {
    const apiKey = clean(env.OPENAI_API_KEY);
    if (!apiKey) {
      return { enabled: false, provider: "openai", model_id: null, dimensions: null, reason: "OPENAI_API_KEY not set" };
    }

    const model = clean(env.LENS_OPENAI_EMBED_MODEL) || "text-embedding-3-small";
    const dimsRaw = clean(env.LENS_OPENAI_EMBED_DIMENSIONS);
    const dims = dimsRaw ? Number(dimsRaw) : INDEX_DIMENSIONS;
    if (!Number.isFinite(dims) || dims <= 0) {
      return {
        enabled: false,
        provider: "openai",
        model_id: null,
        dimensions: null,
        reason: "invalid LENS_OPENAI_EMBED_DIMENSIONS",
      };
    }

    // The pgvector column is fixed-width; keep this loud.
    if (dims !== INDEX_DIMENSIONS) {
      return {
        enabled: false,
        provider: "openai",
        model_id: null,
        dimensions: null,
        reason: `index expects ${INDEX_DIMENSIONS}-dim vectors; got dimensions=${dims}`,
      };
    }

    return { enabled: true, provider: "openai", model_id: `openai:${model}:${dims}`, dimensions: dims, reason: null };
  }

  const model = clean(env.OLLAMA_EMBED_MODEL) || "nomic-embed-text";
  return { enabled: true, provider: "ollama", model_id: model, dimensions: INDEX_DIMENSIONS, reason: null };
}

export function createEmbedderFromEnv(env: Record<string, string | undefined> = process.env): Embedder {
  const status = getEmbeddingsStatus(env);
  if (!status.enabled || !status.provider || !status.model_id || !status.dimensions) {
    throw new Error(status.reason || "embeddings disabled");
  }
  const modelId = status.model_id;
  const dims = status.dimensions;

  if (status.provider === "openai") {
    const apiKey = clean(env.OPENAI_API_KEY);
    const model = clean(env.LENS_OPENAI_EMBED_MODEL) || "text-embedding-3-small";
    const baseUrl = getLensDefault("OPENAI_BASE_URL", env);
    return {
      provider: "openai",
      model_id: modelId,
      dimensions: dims,
      embed: (text, opts) => embedWithOpenAI({ apiKey, model, input: text, dimensions: dims, baseUrl, signal: opts?.signal }),
    };
  }

  const baseUrl = getLensDefault("OLLAMA_BASE_URL", env);
  const model = clean(env.OLLAMA_EMBED_MODEL) || "nomic-embed-text";
  return {
    provider: "ollama",
    model_id: modelId,
    dimensions: dims,
    embed: (text, opts) => embedWithOllama({ baseUrl, model, prompt: text, signal: opts?.signal }),
  };
}
