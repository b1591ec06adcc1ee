import { fillPath, getEndpoint } from "../catalog/endpoints";
import type { BuildError, Intent, QueryRequest } from "../router/types";
import { describeError } from "../utils/errors";
import { RULE_BINDINGS } from "./bindings";
import type { RequestBuilder } from "./types";

export function buildRuleRequest(intent: Intent): QueryRequest | BuildError {
  try {
    const binding = RULE_BINDINGS[intent.ruleId](intent.params);
    const spec = getEndpoint(intent.domain, binding.endpointId);
    if (!spec) {
      return {
        kind: "no-endpoint",
        message: `No se encontró un endpoint para la regla ${intent.ruleId}.`,
      };
    }
    return {
      endpointId: spec.id,
      method: spec.method,
      path: fillPath(spec, binding.pathParams ?? {}),
      ...(binding.query ? { query: binding.query } : {}),
      description: binding.description,
      origin: "rules",
    };
  } catch (err) {
    return {
      kind: "no-endpoint",
      message: `No se pudo construir la consulta (${describeError(err)}).`,
    };
  }
}

/**
 * Deterministic builder: every rule maps to one catalog endpoint.
 */
export class RuleRequestBuilder implements RequestBuilder {
  readonly kind = "rules" as const;

  async buildRequest(intent: Intent): Promise<QueryRequest | BuildError> {
    return buildRuleRequest(intent);
  }
}
