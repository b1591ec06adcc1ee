export type Domain = "library" | "purchases";

export type Classification = Domain | "ambiguous" | "none";

export const DOMAINS: readonly Domain[] = ["library", "purchases"];

export type LibraryRuleId =
  | "count-works-by-author"
  | "sample-authors"
  | "books-by-year"
  | "authors-by-nationality"
  | "books-by-title"
  | "top-authors-by-works"
  | "books-in-year-range"
  | "book-extremum"
  | "library-stats";

export type PurchasesRuleId =
  | "count-purchases-by-client"
  | "sample-products"
  | "products-by-year"
  | "top-products"
  | "clients-by-country"
  | "most-active-client"
  | "out-of-stock"
  | "products-in-year-range"
  | "purchase-stats";

export type RuleId = LibraryRuleId | PurchasesRuleId;

export type ParamValue = string | number;
export type IntentParams = Record<string, ParamValue>;

export interface Intent {
  ruleId: RuleId;
  domain: Domain;
  params: IntentParams;
  /** False only for the statistics fallback. */
  confident: boolean;
  question: string;
}

export interface Rule {
  id: RuleId;
  domain: Domain;
  /** Terminal rules end extraction; the others accumulate intents. */
  terminal: boolean;
  match(lower: string, raw: string): IntentParams | null;
}

export type HttpMethod = "GET" | "POST";

export interface QueryRequest {
  endpointId: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  description: string;
  origin: "rules" | "model";
}

export type BuildErrorKind = "no-endpoint" | "ambiguous-endpoint";

export interface BuildError {
  kind: BuildErrorKind;
  message: string;
}

export interface ResultChunk {
  text: string;
  source: string;
}

export interface ProvisionResponse {
  chunks: ResultChunk[];
  provenance: string;
}

export function isBuildError(
  value: QueryRequest | BuildError,
): value is BuildError {
  return "kind" in value;
}
