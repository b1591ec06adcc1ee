import { z } from "zod";
import { fillPath, matchEndpoint } from "../catalog/endpoints";
import type { TextCompletion } from "../llm/completion";
import type { BuildError, Intent, QueryRequest } from "../router/types";
import { describeError } from "../utils/errors";
import { buildSystemPrompt } from "./prompt";
import { buildRuleRequest } from "./rule-builder";
import type { RequestBuilder } from "./types";

const modelRequest = z.object({
  method: z.string().min(1),
  path: z.string().min(1),
  description: z.string().default(""),
});

const modelError = z.object({ error: z.string().min(1) });

/**
 * Removes a surrounding ``` / ```json fence, if any.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/.exec(trimmed);
  return (fenced ? fenced[1] : trimmed.replace(/```[a-zA-Z]*/g, "")).trim();
}

export type ModelReply =
  | { type: "request"; method: string; path: string; description: string }
  | { type: "error"; message: string }
  | { type: "invalid"; reason: string };

export function parseModelReply(text: string): ModelReply {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(text));
  } catch (err) {
    return { type: "invalid", reason: describeError(err) };
  }

  const error = modelError.safeParse(json);
  if (error.success) return { type: "error", message: error.data.error };

  const request = modelRequest.safeParse(json);
  if (request.success) return { type: "request", ...request.data };

  return { type: "invalid", reason: "reply matches neither request nor error shape" };
}

/**
 * Generative builder: asks a text model to pick the endpoint. Unusable
 * replies fall back to the deterministic rule binding.
 */
export class ModelRequestBuilder implements RequestBuilder {
  readonly kind = "model" as const;

  constructor(
    private readonly completion: TextCompletion,
    private readonly fallback: (intent: Intent) => QueryRequest | BuildError = buildRuleRequest,
  ) {}

  async buildRequest(intent: Intent): Promise<QueryRequest | BuildError> {
    let reply: ModelReply;
    try {
      const text = await this.completion.complete({
        system: buildSystemPrompt(intent.domain),
        user: intent.question,
      });
      reply = parseModelReply(text);
    } catch (err) {
      console.error(
        "[builder] completion failed, using rule binding:",
        describeError(err),
      );
      return this.fallback(intent);
    }

    if (reply.type === "invalid") {
      console.error(
        `[builder] unusable model reply (${reply.reason}), using rule binding`,
      );
      return this.fallback(intent);
    }

    if (reply.type === "error") {
      return { kind: "ambiguous-endpoint", message: reply.message };
    }

    const match = matchEndpoint(intent.domain, reply.method, reply.path);
    if (!match) {
      return {
        kind: "no-endpoint",
        message: `No se encontró un endpoint para ${reply.method.toUpperCase()} ${reply.path}.`,
      };
    }

    const hasQuery = Object.keys(match.query).length > 0;
    return {
      endpointId: match.spec.id,
      method: match.spec.method,
      path: fillPath(match.spec, match.pathParams),
      ...(hasQuery ? { query: match.query } : {}),
      description: reply.description || match.spec.description,
      origin: "model",
    };
  }
}
