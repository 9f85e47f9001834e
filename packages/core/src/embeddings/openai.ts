import { z } from "zod";
import { linkAbort } from "../util/abort";

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
    })
  ),
});

export async function embedWithOpenAI(opts: {
  apiKey: string;
  model: string;
  input: string;
  dimensions?: number;
  baseUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}): Promise<number[]> {
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const { signal, cleanup, timedOut } = linkAbort(timeoutMs, opts.signal);
  const baseUrl = (opts.baseUrl || "https://api.openai.com").replace(/\/$/, "");

  try {
    const res = await fetch(`${baseUrl}/v1/embeddings`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${opts.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: opts.model,
        input: opts.input,
        ...(typeof opts.dimensions === "number" ? { dimensions: opts.dimensions } : null),
      }),
      signal,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new Error(`OpenAI embeddings failed: ${res.status} ${txt}`);
    }

    const json = OpenAIEmbeddingResponseSchema.parse(await res.json());
    const emb = json.data[0]?.embedding;
    if (!emb || !emb.length) throw new Error("OpenAI embeddings missing embedding vector");
    return emb;
  } catch (err: unknown) {
    if (timedOut()) throw new Error(`OpenAI embeddings timed out after ${timeoutMs}ms`);
    throw err;
  } finally {
    cleanup();
  }
}
