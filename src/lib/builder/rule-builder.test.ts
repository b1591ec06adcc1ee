import { describe, expect, it } from "vitest";
import type { Intent } from "../router/types";
import { buildRuleRequest, RuleRequestBuilder } from "./rule-builder";

const intent = (overrides: Partial<Intent>): Intent => ({
  ruleId: "library-stats",
  domain: "library",
  params: {},
  confident: true,
  question: "q",
  ...overrides,
});

describe("buildRuleRequest", () => {
  it("binds path parameters", () => {
    expect(
      buildRuleRequest(intent({ ruleId: "books-by-year", params: { year: 1982 } })),
    ).toEqual({
      endpointId: "libros.byYear",
      method: "GET",
      path: "/libros/buscar/por-anio/1982",
      description: "Libros publicados en 1982",
      origin: "rules",
    });
  });

  it("encodes captured text", () => {
    const built = buildRuleRequest(
      intent({ ruleId: "books-by-title", params: { term: "La casa" } }),
    );
    expect(built).toMatchObject({ path: "/libros/buscar/titulo/La%20casa" });
  });

  it("turns a year into a date span query", () => {
    const built = buildRuleRequest(
      intent({ ruleId: "products-by-year", domain: "purchases", params: { year: 2022 } }),
    );
    expect(built).toMatchObject({
      endpointId: "productos.purchasedBetween",
      path: "/productos/comprados",
      query: { desde: "2022-01-01", hasta: "2022-12-31" },
    });
  });

  it("returns no-endpoint when a parameter is missing", () => {
    const built = buildRuleRequest(intent({ ruleId: "books-by-year" }));
    expect(built).toEqual({
      kind: "no-endpoint",
      message: 'No se pudo construir la consulta (Missing intent parameter "year").',
    });
  });

  it("returns no-endpoint when the rule's endpoint is in another domain", () => {
    const built = buildRuleRequest(intent({ ruleId: "out-of-stock", domain: "library" }));
    expect(built).toEqual({
      kind: "no-endpoint",
      message: "No se encontró un endpoint para la regla out-of-stock.",
    });
  });
});

describe("RuleRequestBuilder", () => {
  it("resolves asynchronously to the same request", async () => {
    const builder = new RuleRequestBuilder();
    expect(builder.kind).toBe("rules");
    await expect(builder.buildRequest(intent({}))).resolves.toMatchObject({
      endpointId: "library.stats",
      path: "/stats",
    });
  });
});
