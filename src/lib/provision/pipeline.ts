import { BackendClient } from "../backend/client";
import type { RequestBuilder } from "../builder/types";
import { extractIntents } from "../router/extractor";
import {
  isBuildError,
  type BuildError,
  type Domain,
  type Intent,
  type ProvisionResponse,
  type QueryRequest,
  type ResultChunk,
} from "../router/types";
import { createDebugLog } from "../utils/debug";
import type { RandomSource } from "../utils/sample";
import { executeIntent } from "./executor";

const log = createDebugLog("pipeline");

export const PROVENANCE: Record<Domain, string> = {
  library: "biblioteca_api",
  purchases: "compras_api",
};

export const DOMAIN_LABEL: Record<Domain, string> = {
  library: "biblioteca",
  purchases: "compras",
};

export interface PlannedRequest {
  intent: Intent;
  request: QueryRequest;
}

export type BuildOutcome =
  | { ok: true; planned: PlannedRequest[] }
  | { ok: false; error: BuildError };

export interface ExecutionOutcome {
  chunks: ResultChunk[];
  /** Set when a later call failed after earlier ones produced chunks. */
  failure?: unknown;
}

const requestKey = (r: QueryRequest) =>
  `${r.method} ${r.path} ${JSON.stringify(r.query ?? {})}`;

export function describeBuildError(error: BuildError): string {
  return error.kind === "ambiguous-endpoint"
    ? `⚠️ ${error.message}`
    : error.message;
}

/**
 * extract → build → execute for a single domain.
 */
export class ProvisionPipeline {
  constructor(
    readonly domain: Domain,
    private readonly builder: RequestBuilder,
    readonly client: BackendClient,
    private readonly random?: RandomSource,
  ) {}

  extract(question: string): Intent[] {
    const intents = extractIntents(question, this.domain);
    log(
      `${this.domain}: ${intents.map((i) => `${i.ruleId}${JSON.stringify(i.params)}`).join(", ")}`,
    );
    return intents;
  }

  async build(intents: Intent[]): Promise<BuildOutcome> {
    const planned: PlannedRequest[] = [];
    const seen = new Set<string>();
    for (const intent of intents) {
      const built = await this.builder.buildRequest(intent);
      if (isBuildError(built)) return { ok: false, error: built };
      const key = requestKey(built);
      if (seen.has(key)) continue;
      seen.add(key);
      planned.push({ intent, request: built });
    }
    return { ok: true, planned };
  }

  /**
   * Runs planned requests in order. A failure with nothing collected yet is
   * rethrown; after a partial result it is reported alongside the chunks.
   */
  async execute(planned: PlannedRequest[]): Promise<ExecutionOutcome> {
    const chunks: ResultChunk[] = [];
    for (const { intent, request } of planned) {
      try {
        chunks.push(
          ...(await executeIntent(intent, request, {
            client: this.client,
            random: this.random,
          })),
        );
      } catch (failure) {
        if (chunks.length === 0) throw failure;
        return { chunks, failure };
      }
    }
    return { chunks };
  }

  async provide(question: string): Promise<ProvisionResponse> {
    const built = await this.build(this.extract(question));
    if (!built.ok) {
      return {
        chunks: [{ text: describeBuildError(built.error), source: "builder" }],
        provenance: PROVENANCE[this.domain],
      };
    }
    const { chunks } = await this.execute(built.planned);
    return { chunks, provenance: PROVENANCE[this.domain] };
  }
}
