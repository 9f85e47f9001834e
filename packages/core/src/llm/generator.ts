import type { ProviderStatus } from "@lens/contracts";
import { getLensDefault } from "../config/defaults";
import { chatWithOllama } from "./ollama";
import { chatWithOpenAI } from "./openai";

export type GenerationProvider = "ollama" | "openai" | "disabled";

export type GenerateRequest = {
  system: string;
  prompt: string;
  signal?: AbortSignal;
};

/** Prompt in, answer text out. */
export type Generator = {
  provider: string;
  model: string;
  generate: (req: GenerateRequest) => Promise<string>;
};

function clean(s: unknown): string {
  return typeof s === "string" ? s.trim() : "";
}

function parseTemperature(raw: string): number | undefined {
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 && n <= 2 ? n : undefined;
}

export function getGenerationStatus(env: Record<string, string | undefined> = process.env): ProviderStatus {
  const providerRaw = clean(env.LENS_GEN_PROVIDER).toLowerCase();
  const provider: GenerationProvider =
    providerRaw === "openai" || providerRaw === "ollama" || providerRaw === "disabled" ? providerRaw : "ollama";

  if (provider === "disabled") {
    return { enabled: false, provider: "disabled", model_id: null, reason: "generation disabled" };
  }

  if (provider === "openai") {
    if (!clean(env.OPENAI_API_KEY)) {
      return { enabled: false, provider: "openai", model_id: null, reason: "OPENAI_API_KEY not set" };
    }
    const model = clean(env.LENS_OPENAI_CHAT_MODEL) || "gpt-4o-mini";
    return { enabled: true, provider: "openai", model_id: model, reason: null };
  }

  const model = clean(env.OLLAMA_CHAT_MODEL) || "llama3.1";
  return { enabled: true, provider: "ollama", model_id: model, reason: null };
}

export function createGeneratorFromEnv(env: Record<string, string | undefined> = process.env): Generator {
  const status = getGenerationStatus(env);
  if (!status.enabled || !status.provider || !status.model_id) {
    throw new Error(status.reason || "generation disabled");
  }
  const model = status.model_id;
  const temperature = parseTemperature(clean(env.LENS_GEN_TEMPERATURE));

  if (status.provider === "openai") {
    const apiKey = clean(env.OPENAI_API_KEY);
    const baseUrl = getLensDefault("OPENAI_BASE_URL", env);
    return {
      provider: "openai",
      model,
      generate: ({ system, prompt, signal }) =>
        chatWithOpenAI({
          apiKey,
          model,
          baseUrl,
          temperature,
          signal,
          messages: [
            { role: "system", content: system },
            { role: "user", content: prompt },
          ],
        }),
    };
  }

  const baseUrl = getLensDefault("OLLAMA_BASE_URL", env);
  return {
    provider: "ollama",
    model,
    generate: ({ system, prompt, signal }) =>
      chatWithOllama({
        baseUrl,
        model,
        temperature,
        signal,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
      }),
  };
}
