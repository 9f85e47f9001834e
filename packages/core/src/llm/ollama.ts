import { z } from "zod";
import { linkAbort } from "../util/abort";

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

const OllamaChatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

export async function chatWithOllama(opts: {
  baseUrl: string;
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
}): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 120_000;
  const { signal, cleanup, timedOut } = linkAbort(timeoutMs, opts.signal);

  try {
    const url = `${opts.baseUrl.replace(/\/$/, "")}/api/chat`;
    const res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        model: opts.model,
        messages: opts.messages,
        stream: false,
        ...(typeof opts.temperature === "number" ? { options: { temperature: opts.temperature } } : null),
      }),
      signal,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new Error(`Ollama chat failed: ${res.status} ${txt}`);
    }
    const json = OllamaChatResponseSchema.parse(await res.json());
    return json.message.content;
  } catch (err: unknown) {
    if (timedOut()) throw new Error(`Ollama chat timed out after ${timeoutMs}ms`);
    throw err;
  } finally {
    cleanup();
  }
}
