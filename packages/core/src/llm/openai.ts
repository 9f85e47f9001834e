import { z } from "zod";
import { linkAbort } from "../util/abort";
import type { ChatMessage } from "./ollama";

const OpenAIChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export async function chatWithOpenAI(opts: {
  apiKey: string;
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  baseUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 120_000;
  const { signal, cleanup, timedOut } = linkAbort(timeoutMs, opts.signal);
  const baseUrl = (opts.baseUrl || "https://api.openai.com").replace(/\/$/, "");

  try {
    const res = await fetch(`${baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        authorization: `Bearer ${opts.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: opts.model,
        messages: opts.messages,
        ...(typeof opts.temperature === "number" ? { temperature: opts.temperature } : null),
      }),
      signal,
    });
    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new Error(`OpenAI chat failed: ${res.status} ${txt}`);
    }
    const json = OpenAIChatResponseSchema.parse(await res.json());
    return json.choices[0].message.content ?? "";
  } catch (err: unknown) {
    if (timedOut()) throw new Error(`OpenAI chat timed out after ${timeoutMs}ms`);
    throw err;
  } finally {
    cleanup();
  }
}
