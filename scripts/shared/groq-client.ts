import { z } from "zod";

import type { ChatMessage } from "@/lib/session";
import { fail, ok, type Result } from "@/lib/result";

const GROQ_CHAT_URL = "https://api.groq.com/openai/v1/chat/completions";

export interface GroqConfig {
  apiKey: string | null;
  model: string;
  timeoutMs: number;
}

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export async function chatCompletion(
  config: GroqConfig,
  messages: ChatMessage[],
  options?: {
    temperature?: number;
    maxTokens?: number;
  },
): Promise<Result<string>> {
  if (!config.apiKey) {
    return fail(
      "unavailable",
      "Generative text is not configured. Set GROQ_API_KEY to enable it.",
    );
  }

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${config.apiKey}`,
  };

  const body: Record<string, unknown> = {
    model: config.model,
    messages,
  };

  if (options?.temperature !== undefined)
    body.temperature = options.temperature;
  if (options?.maxTokens) body.max_tokens = options.maxTokens;

  let response: Response;
  try {
    response = await fetch(GROQ_CHAT_URL, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("fetch-error", `Groq request failed: ${message}`);
  }

  if (!response.ok) {
    const errorText = await response.text();
    return fail("fetch-error", `Groq API error ${response.status}: ${errorText}`);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("invalid-response", `Groq response is not JSON: ${message}`);
  }

  const parsed = chatResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return fail("invalid-response", `Groq response: ${parsed.error.message}`);
  }

  const content = parsed.data.choices[0]?.message.content?.trim();
  if (!content) {
    return fail("invalid-response", "Groq returned an empty response");
  }

  return ok(content);
}

/** Single user prompt with the default sampling settings. */
export function generateText(
  config: GroqConfig,
  prompt: string,
  options: { temperature?: number; maxTokens?: number } = {},
): Promise<Result<string>> {
  return chatCompletion(config, [{ role: "user", content: prompt }], {
    temperature: options.temperature ?? 0.7,
    maxTokens: options.maxTokens ?? 600,
  });
}
