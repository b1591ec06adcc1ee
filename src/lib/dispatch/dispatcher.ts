import {
  BACKENDS,
  CONFIG,
  LLM,
  PROVISION_SERVICES,
  type BuilderMode,
  type DelegateMode,
} from "../../config";
import { BackendClient } from "../backend/client";
import { ModelRequestBuilder } from "../builder/model-builder";
import { RuleRequestBuilder } from "../builder/rule-builder";
import type { RequestBuilder } from "../builder/types";
import { ChatCompletionClient } from "../llm/completion";
import { formatChunks, type PrettifyOptions } from "../output/prettify";
import {
  describeBuildError,
  DOMAIN_LABEL,
  ProvisionPipeline,
  type PlannedRequest,
} from "../provision/pipeline";
import { ProvisionClient } from "../provision/remote";
import { classifyDomain, domainsFor } from "../router/classifier";
import type {
  BuildError,
  Classification,
  Domain,
  Intent,
  ResultChunk,
} from "../router/types";
import { createDebugLog } from "../utils/debug";
import {
  AmbiguousEndpointError,
  BackendUnavailableError,
  EmptyQueryError,
  MalformedBackendPayloadError,
  NoDomainMatchError,
  NoEndpointFoundError,
} from "../utils/errors";
import type { RandomSource } from "../utils/sample";

const log = createDebugLog("dispatch");

export type DispatchState =
  | "RECEIVED"
  | "CLASSIFIED"
  | "EXTRACTED"
  | "REQUESTED"
  | "RESULT_READY"
  | "FORMATTED"
  | "FAILED";

const TRANSITIONS: Record<DispatchState, readonly DispatchState[]> = {
  RECEIVED: ["CLASSIFIED", "FAILED"],
  CLASSIFIED: ["EXTRACTED", "FORMATTED", "FAILED"],
  EXTRACTED: ["REQUESTED", "FORMATTED", "FAILED"],
  REQUESTED: ["RESULT_READY", "FAILED"],
  RESULT_READY: ["FORMATTED", "FAILED"],
  FORMATTED: [],
  FAILED: [],
};

// Delegated questions skip local extraction.
const DELEGATED_TRANSITIONS: Record<DispatchState, readonly DispatchState[]> = {
  ...TRANSITIONS,
  CLASSIFIED: [...TRANSITIONS.CLASSIFIED, "REQUESTED"],
};

export const MESSAGES = {
  emptyQuery: "La pregunta no puede estar vacía.",
  noDomain: "No se pudo determinar el dominio de la consulta.",
  unexpected: "Ocurrió un error inesperado al procesar la pregunta.",
  unavailable: (label: string) =>
    `Lo siento, el servicio de ${label} no está disponible en este momento.`,
  malformed: (label: string) =>
    `La respuesta del servicio de ${label} no tiene el formato esperado.`,
  degraded: (label: string) =>
    `Nota: el servicio de ${label} no respondió; la respuesta puede estar incompleta.`,
};

export class IllegalTransitionError extends Error {
  constructor(from: DispatchState, to: DispatchState) {
    super(`Illegal dispatch transition ${from} → ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export interface AnswerOutcome {
  text: string;
  state: "FORMATTED" | "FAILED";
  trace: DispatchState[];
  classification: Classification;
  intents: Intent[];
  error?: Error;
}

class DispatchRun {
  readonly trace: DispatchState[] = ["RECEIVED"];
  classification: Classification = "none";
  intents: Intent[] = [];

  constructor(
    private readonly transitions: Record<DispatchState, readonly DispatchState[]>,
  ) {}

  get state(): DispatchState {
    return this.trace[this.trace.length - 1];
  }

  advance(to: DispatchState): void {
    if (!this.transitions[this.state].includes(to)) {
      throw new IllegalTransitionError(this.state, to);
    }
    this.trace.push(to);
  }

  finish(
    state: "FORMATTED" | "FAILED",
    text: string,
    error?: Error,
  ): AnswerOutcome {
    this.advance(state);
    return {
      text,
      state,
      trace: [...this.trace],
      classification: this.classification,
      intents: this.intents,
      ...(error ? { error } : {}),
    };
  }
}

interface DomainFailure {
  domain: Domain;
  error: unknown;
}

interface Collected {
  chunks: ResultChunk[];
  failures: DomainFailure[];
}

export interface DispatcherOptions {
  builder?: RequestBuilder;
  delegate?: DelegateMode;
  clients?: Partial<Record<Domain, BackendClient>>;
  provisionClients?: Partial<Record<Domain, ProvisionClient>>;
  random?: RandomSource;
  prettify?: PrettifyOptions;
}

function buildErrorToException(error: BuildError): Error {
  return error.kind === "ambiguous-endpoint"
    ? new AmbiguousEndpointError(error.message)
    : new NoEndpointFoundError(error.message);
}

function failureMessage(failure: DomainFailure): string {
  const label = DOMAIN_LABEL[failure.domain];
  if (failure.error instanceof MalformedBackendPayloadError) {
    return MESSAGES.malformed(label);
  }
  if (failure.error instanceof BackendUnavailableError) {
    return MESSAGES.unavailable(label);
  }
  return MESSAGES.unexpected;
}

const asError = (value: unknown) =>
  value instanceof Error ? value : new Error(String(value));

/**
 * Answers one question end to end. Every failure is turned into text here;
 * nothing thrown below escapes `run` or `answer`.
 */
export class Dispatcher {
  private readonly pipelines: Record<Domain, ProvisionPipeline>;
  private readonly provisionClients: Record<Domain, ProvisionClient>;
  private readonly delegate: DelegateMode;
  private readonly prettify: PrettifyOptions;

  constructor(options: DispatcherOptions = {}) {
    const builder = options.builder ?? new RuleRequestBuilder();
    const pipeline = (domain: Domain) =>
      new ProvisionPipeline(
        domain,
        builder,
        options.clients?.[domain] ?? new BackendClient(BACKENDS[domain]),
        options.random,
      );
    const provision = (domain: Domain) =>
      options.provisionClients?.[domain] ??
      new ProvisionClient(PROVISION_SERVICES[domain]);

    this.pipelines = { library: pipeline("library"), purchases: pipeline("purchases") };
    this.provisionClients = {
      library: provision("library"),
      purchases: provision("purchases"),
    };
    this.delegate = options.delegate ?? CONFIG.DELEGATE;
    this.prettify = options.prettify ?? {};
  }

  pipeline(domain: Domain): ProvisionPipeline {
    return this.pipelines[domain];
  }

  async answer(question: string): Promise<string> {
    return (await this.run(question)).text;
  }

  async run(question: string): Promise<AnswerOutcome> {
    const run = new DispatchRun(
      this.delegate === "provision" ? DELEGATED_TRANSITIONS : TRANSITIONS,
    );
    try {
      return await this.dispatch(question, run);
    } catch (err) {
      console.error("[dispatch] unexpected failure:", err);
      const error = asError(err);
      if (run.state === "FORMATTED" || run.state === "FAILED") {
        return {
          text: MESSAGES.unexpected,
          state: "FAILED",
          trace: [...run.trace],
          classification: run.classification,
          intents: run.intents,
          error,
        };
      }
      return run.finish("FAILED", MESSAGES.unexpected, error);
    }
  }

  private async dispatch(question: string, run: DispatchRun): Promise<AnswerOutcome> {
    if (!question.trim()) {
      return run.finish("FAILED", MESSAGES.emptyQuery, new EmptyQueryError());
    }

    run.classification = classifyDomain(question);
    run.advance("CLASSIFIED");
    log(`classification: ${run.classification}`);

    const domains = domainsFor(run.classification);
    if (domains.length === 0) {
      return run.finish("FORMATTED", MESSAGES.noDomain, new NoDomainMatchError());
    }

    let collected: Collected;
    if (this.delegate === "provision") {
      run.advance("REQUESTED");
      collected = await this.delegateTo(domains, question);
    } else {
      const planned: { domain: Domain; requests: PlannedRequest[] }[] = [];
      for (const domain of domains) {
        run.intents.push(...this.pipelines[domain].extract(question));
      }
      run.advance("EXTRACTED");

      for (const domain of domains) {
        const intents = run.intents.filter((i) => i.domain === domain);
        const built = await this.pipelines[domain].build(intents);
        if (!built.ok) {
          return run.finish(
            "FORMATTED",
            describeBuildError(built.error),
            buildErrorToException(built.error),
          );
        }
        planned.push({ domain, requests: built.planned });
      }
      run.advance("REQUESTED");
      collected = await this.executeAll(planned);
    }

    const { chunks, failures } = collected;
    if (chunks.length === 0 && failures.length > 0) {
      const [first] = failures;
      return run.finish("FAILED", failureMessage(first), asError(first.error));
    }

    run.advance("RESULT_READY");
    const text = formatChunks(chunks, this.prettify);
    const notes = failures.map((f) => MESSAGES.degraded(DOMAIN_LABEL[f.domain]));
    return run.finish(
      "FORMATTED",
      [text, ...notes].join("\n"),
      failures.length ? asError(failures[0].error) : undefined,
    );
  }

  private async executeAll(
    planned: { domain: Domain; requests: PlannedRequest[] }[],
  ): Promise<Collected> {
    const chunks: ResultChunk[] = [];
    const failures: DomainFailure[] = [];
    for (const { domain, requests } of planned) {
      try {
        const outcome = await this.pipelines[domain].execute(requests);
        chunks.push(...outcome.chunks);
        if (outcome.failure !== undefined) {
          console.error(`[dispatch] ${domain} partially failed:`, outcome.failure);
          failures.push({ domain, error: outcome.failure });
        }
      } catch (error) {
        console.error(`[dispatch] ${domain} failed:`, error);
        failures.push({ domain, error });
      }
    }
    return { chunks, failures };
  }

  private async delegateTo(domains: Domain[], question: string): Promise<Collected> {
    const chunks: ResultChunk[] = [];
    const failures: DomainFailure[] = [];
    for (const domain of domains) {
      try {
        const response = await this.provisionClients[domain].provide(question);
        chunks.push(...response.chunks);
      } catch (error) {
        console.error(`[dispatch] provision for ${domain} failed:`, error);
        failures.push({ domain, error });
      }
    }
    return { chunks, failures };
  }
}

export function createBuilder(mode: BuilderMode = CONFIG.BUILDER): RequestBuilder {
  if (mode === "model") {
    return new ModelRequestBuilder(
      new ChatCompletionClient({
        endpoint: LLM.endpoint,
        apiKey: LLM.apiKey,
        model: LLM.model,
        timeoutMs: LLM.timeoutMs,
        temperature: LLM.temperature,
        maxTokens: LLM.maxTokens,
      }),
    );
  }
  return new RuleRequestBuilder();
}

export function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
  return new Dispatcher({ builder: createBuilder(), ...options });
}
