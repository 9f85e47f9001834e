import { z } from "zod";
import { linkAbort } from "../util/abort";

const OllamaEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

export async function embedWithOllama(opts: {
  baseUrl: string;
  model: string;
  prompt: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}): Promise<number[]> {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const { signal, cleanup, timedOut } = linkAbort(timeoutMs, opts.signal);

  try {
    const url = `${opts.baseUrl.replace(/\/$/, "")}/api/embeddings`;
    const res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ model: opts.model, prompt: opts.prompt }),
      signal,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new Error(`Ollama embeddings failed: ${res.status} ${txt}`);
    }
    const json = OllamaEmbeddingResponseSchema.parse(await res.json());
    if (!json.embedding.length) throw new Error("Ollama embeddings missing embedding vector");
    return json.embedding;
  } catch (err: unknown) {
    if (timedOut()) throw new Error(`Ollama embeddings timed out after ${timeoutMs}ms`);
    throw err;
  } finally {
    cleanup();
  }
}
