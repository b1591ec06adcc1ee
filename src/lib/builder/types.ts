import type { BuildError, Intent, QueryRequest } from "../router/types";

/**
 * Turns a matched intent into a concrete backend request, or an explicit
 * error value when no endpoint fits.
 */
export interface RequestBuilder {
  readonly kind: "rules" | "model";
  buildRequest(intent: Intent): Promise<QueryRequest | BuildError>;
}
