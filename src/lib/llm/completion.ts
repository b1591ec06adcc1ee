/**
 * Text completion over an OpenAI-compatible chat completions endpoint
 * (llama.cpp server, vLLM, Ollama's /v1 shim, ...).
 * Configure via environment variables:
 *   - CONSULTA_LLM_ENDPOINT: Full URL of the chat completions route
 *   - CONSULTA_LLM_API_KEY: Bearer token (optional for local servers)
 *   - CONSULTA_LLM_MODEL: Model name sent with each request
 *   - CONSULTA_LLM_TIMEOUT_MS: Per-request timeout
 */

import { z } from "zod";
import { LLM } from "../../config";
import { createDebugLog } from "../utils/debug";
import { CompletionFailedError, describeError } from "../utils/errors";

const log = createDebugLog("llm");

export interface CompletionPrompt {
  system: string;
  user: string;
}

export interface TextCompletion {
  complete(prompt: CompletionPrompt): Promise<string>;
}

export interface ChatCompletionOptions {
  endpoint: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

const chatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export class ChatCompletionClient implements TextCompletion {
  private readonly options: ChatCompletionOptions;

  constructor(options: Partial<ChatCompletionOptions> = {}) {
    this.options = { ...LLM, ...options };
  }

  async complete({ system, user }: CompletionPrompt): Promise<string> {
    const { endpoint, apiKey, model, timeoutMs, temperature, maxTokens } =
      this.options;
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (apiKey) headers.Authorization = `Bearer ${apiKey}`;

    log(`requesting completion from ${endpoint} (model=${model})`);

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model,
          temperature,
          max_tokens: maxTokens,
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new CompletionFailedError(
        `Completion request failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new CompletionFailedError(
        `Completion API error (${response.status}): ${errorText}`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new CompletionFailedError("Completion API returned invalid JSON", {
        cause: error,
      });
    }
    const parsed = chatCompletionResponse.safeParse(body);
    if (!parsed.success) {
      throw new CompletionFailedError(
        `Unexpected completion payload: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return (parsed.data.choices[0].message.content ?? "").trim();
  }
}
