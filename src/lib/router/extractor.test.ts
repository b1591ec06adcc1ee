import { describe, expect, it } from "vitest";
import { EmptyQueryError } from "../utils/errors";
import { extractIntents } from "./extractor";
import type { Rule } from "./types";

const summary = (question: string, domain: "library" | "purchases") =>
  extractIntents(question, domain).map((i) => ({ rule: i.ruleId, params: i.params }));

describe("extractIntents (library)", () => {
  it("captures the author of a works count", () => {
    expect(summary("¿Cuántos libros ha escrito Gabriel García Márquez?", "library")).toEqual([
      { rule: "count-works-by-author", params: { author: "gabriel garcía márquez" } },
    ]);
  });

  it("reads the sample size, defaulting to three", () => {
    expect(summary("Muéstrame 4 autores", "library")).toEqual([
      { rule: "sample-authors", params: { count: 4 } },
    ]);
    expect(summary("lista autores", "library")).toEqual([
      { rule: "sample-authors", params: { count: 3 } },
    ]);
  });

  it("binds the exact publication year", () => {
    expect(summary("Libros publicados en 1982", "library")).toEqual([
      { rule: "books-by-year", params: { year: 1982 } },
    ]);
  });

  it("sorts a year range and does not read it as a single year", () => {
    expect(summary("libros entre 2020 y 2010", "library")).toEqual([
      { rule: "books-in-year-range", params: { from: 2010, to: 2020 } },
    ]);
  });

  it("keeps the case of a quoted title", () => {
    expect(summary("libros con el título “Paula”", "library")).toEqual([
      { rule: "books-by-title", params: { term: "Paula" } },
    ]);
  });

  it("accumulates year and nationality intents", () => {
    expect(summary("Libros de 1967 de autores chilenos", "library")).toEqual([
      { rule: "books-by-year", params: { year: 1967 } },
      { rule: "authors-by-nationality", params: { nationality: "Chile" } },
    ]);
  });

  it("keeps a year range after an accumulated nationality", () => {
    expect(summary("libros publicados entre 2000 y 1960 de autores chilenos", "library")).toEqual([
      { rule: "authors-by-nationality", params: { nationality: "Chile" } },
      { rule: "books-in-year-range", params: { from: 1960, to: 2000 } },
    ]);
  });

  it("keeps a year range after a quoted title", () => {
    expect(summary('libros con título "amor" publicados entre 1960 y 1990', "library")).toEqual([
      { rule: "books-by-title", params: { term: "amor" } },
      { rule: "books-in-year-range", params: { from: 1960, to: 1990 } },
    ]);
  });

  it("ranks authors with an optional limit", () => {
    expect(summary("top 2 autores", "library")).toEqual([
      { rule: "top-authors-by-works", params: { limit: 2 } },
    ]);
    expect(summary("autores con más obras", "library")).toEqual([
      { rule: "top-authors-by-works", params: { limit: 3 } },
    ]);
  });

  it("picks the oldest or newest book", () => {
    expect(summary("¿Cuál es el libro más antiguo?", "library")).toEqual([
      { rule: "book-extremum", params: { order: "oldest" } },
    ]);
    expect(summary("el último libro publicado", "library")).toEqual([
      { rule: "book-extremum", params: { order: "newest" } },
    ]);
  });

  it("falls back to statistics with low confidence", () => {
    const [intent] = extractIntents("¿Qué hay en la biblioteca?", "library");
    expect(intent.ruleId).toBe("library-stats");
    expect(intent.confident).toBe(false);
    expect(intent.question).toBe("¿Qué hay en la biblioteca?");
  });

  it("rejects blank input", () => {
    expect(() => extractIntents("  \n", "library")).toThrow(EmptyQueryError);
  });
});

describe("extractIntents (purchases)", () => {
  it.each([
    [
      "¿Cuántas compras ha realizado Lucía Fernández?",
      "count-purchases-by-client",
      { client: "lucía fernández" },
    ],
    ["Top 2 productos más comprados", "top-products", { limit: 2 }],
    ["los 4 productos más comprados", "top-products", { limit: 4 }],
    ["productos comprados en 2022", "products-by-year", { year: 2022 }],
    ["¿Cuántos clientes hay en el país Chile?", "clients-by-country", { country: "Chile" }],
    ["número de clientes del país uruguay", "clients-by-country", { country: "Uruguay" }],
    ["¿Quién es el cliente más activo?", "most-active-client", {}],
    ["productos fuera de stock", "out-of-stock", {}],
    ["productos comprados entre 2022 y 2021", "products-in-year-range", { from: 2021, to: 2022 }],
    ["muestra 2 productos", "sample-products", { count: 2 }],
    ["dame info de compras", "purchase-stats", {}],
  ])("%s → %s", (question, rule, params) => {
    expect(summary(question, "purchases")).toEqual([{ rule, params }]);
  });
});

describe("extractIntents walk", () => {
  const rule = (id: Rule["id"], terminal: boolean, hit: boolean): Rule => ({
    id,
    domain: "library",
    terminal,
    match: () => (hit ? {} : null),
  });

  it("skips terminal rules once something has accumulated", () => {
    const rules = [
      rule("books-by-year", false, true),
      rule("top-authors-by-works", true, true),
      rule("books-by-title", false, true),
    ];
    expect(extractIntents("x", "library", rules).map((i) => i.ruleId)).toEqual([
      "books-by-year",
      "books-by-title",
    ]);
  });

  it("stops at a terminal match before anything accumulated", () => {
    const rules = [
      rule("sample-authors", true, true),
      rule("books-by-title", false, true),
    ];
    expect(extractIntents("x", "library", rules).map((i) => i.ruleId)).toEqual([
      "sample-authors",
    ]);
  });
});
