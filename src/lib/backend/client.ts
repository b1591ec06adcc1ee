import { CONFIG } from "../../config";
import type { QueryRequest } from "../router/types";
import { createDebugLog } from "../utils/debug";
import {
  BackendUnavailableError,
  describeError,
  MalformedBackendPayloadError,
} from "../utils/errors";

const log = createDebugLog("backend");

export type BackendTarget = Pick<QueryRequest, "method" | "path" | "query">;

/**
 * One-attempt JSON client for a domain backend. Every call carries a fixed
 * timeout; failures surface as BackendUnavailableError.
 */
export class BackendClient {
  constructor(
    readonly baseUrl: string,
    private readonly timeoutMs: number = CONFIG.BACKEND_TIMEOUT_MS,
  ) {}

  url({ path, query }: BackendTarget): string {
    const url = new URL(`${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async fetchJson(target: BackendTarget): Promise<unknown> {
    let url: string;
    try {
      url = this.url(target);
    } catch (error) {
      throw new BackendUnavailableError(this.baseUrl, "URL inválida", undefined, {
        cause: error,
      });
    }
    log(`${target.method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method: target.method,
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError");
      throw new BackendUnavailableError(
        url,
        timedOut
          ? `no respondió en ${this.timeoutMs} ms`
          : describeError(error),
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new BackendUnavailableError(
        url,
        `HTTP ${response.status}`,
        response.status,
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new BackendUnavailableError(url, describeError(error), response.status, {
        cause: error,
      });
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new MalformedBackendPayloadError(url, "respuesta no es JSON", {
        cause: error,
      });
    }
  }
}
