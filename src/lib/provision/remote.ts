import { z } from "zod";
import { CONFIG } from "../../config";
import type { ProvisionResponse } from "../router/types";
import { createDebugLog } from "../utils/debug";
import {
  BackendUnavailableError,
  describeError,
  MalformedBackendPayloadError,
} from "../utils/errors";

const log = createDebugLog("provision");

export const provisionRequestSchema = z.object({
  query: z.string(),
  history: z.array(z.string()).optional(),
});

const provisionResponseSchema = z.object({
  chunks: z.array(
    z.object({
      type: z.literal("text").optional(),
      text: z.string(),
      source: z.string(),
    }),
  ),
  provenance: z.string(),
});

/**
 * Client for a remote provision service: POST {query} → {chunks, provenance}.
 */
export class ProvisionClient {
  constructor(
    readonly baseUrl: string,
    private readonly timeoutMs: number = CONFIG.BACKEND_TIMEOUT_MS,
  ) {}

  async provide(query: string, history?: string[]): Promise<ProvisionResponse> {
    const url = `${this.baseUrl}/provision`;
    log(`POST ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ query, ...(history ? { history } : {}) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new BackendUnavailableError(url, describeError(error), undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new BackendUnavailableError(
        url,
        `HTTP ${response.status}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new MalformedBackendPayloadError(url, "respuesta no es JSON", {
        cause: error,
      });
    }
    const parsed = provisionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedBackendPayloadError(url, "forma inesperada");
    }
    return {
      chunks: parsed.data.chunks.map(({ text, source }) => ({ text, source })),
      provenance: parsed.data.provenance,
    };
  }

  async manifest(): Promise<unknown> {
    const url = `${this.baseUrl}/manifest`;
    try {
      const response = await fetch(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new BackendUnavailableError(url, `HTTP ${response.status}`, response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof BackendUnavailableError) throw error;
      throw new BackendUnavailableError(url, describeError(error), undefined, {
        cause: error,
      });
    }
  }
}
