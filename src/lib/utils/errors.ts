export type ErrorKind =
  | "EmptyQuery"
  | "NoDomainMatch"
  | "BackendUnavailable"
  | "MalformedBackendPayload"
  | "AmbiguousEndpoint"
  | "NoEndpointFound"
  | "CompletionFailed";

export class ConsultaError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = `${kind}Error`;
  }
}

export class EmptyQueryError extends ConsultaError {
  constructor() {
    super("EmptyQuery", "query no puede estar vacía");
  }
}

export class NoDomainMatchError extends ConsultaError {
  constructor() {
    super("NoDomainMatch", "No se pudo determinar el dominio de la consulta.");
  }
}

export class AmbiguousEndpointError extends ConsultaError {
  constructor(message: string) {
    super("AmbiguousEndpoint", message);
  }
}

export class NoEndpointFoundError extends ConsultaError {
  constructor(message: string) {
    super("NoEndpointFound", message);
  }
}

export class BackendUnavailableError extends ConsultaError {
  constructor(
    readonly url: string,
    detail: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("BackendUnavailable", `${url}: ${detail}`, options);
  }
}

export class MalformedBackendPayloadError extends ConsultaError {
  constructor(
    readonly url: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super("MalformedBackendPayload", `${url}: ${detail}`, options);
  }
}

export class CompletionFailedError extends ConsultaError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("CompletionFailed", detail, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
