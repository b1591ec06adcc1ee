import { CONFIG } from "../../config";
import { resolveNationality } from "../catalog/nationalities";
import type { Domain, IntentParams, Rule, RuleId } from "./types";

const NAME_CHARS = "[\\w\\sáéíóúüñ.'-]+";

export const YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/;
export const YEAR_RANGE_PATTERN = /entre\s*(\d{4})\s*y\s*(\d{4})/;
const QUOTED_PATTERN = /["“«]([^"”»]+)["”»]/;

const countOr = (raw: string | undefined, fallback: number) =>
  raw === undefined ? fallback : Number.parseInt(raw, 10);

function yearRange(lower: string): IntentParams | null {
  const m = YEAR_RANGE_PATTERN.exec(lower);
  if (!m) return null;
  const [from, to] = [Number(m[1]), Number(m[2])].sort((a, b) => a - b);
  return { from, to };
}

const cleanName = (captured: string | undefined) =>
  captured?.trim().replace(/[.'-]+$/, "").trim();

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export const LIBRARY_RULES: readonly Rule[] = [
  {
    id: "count-works-by-author",
    domain: "library",
    terminal: true,
    match(lower) {
      const m = new RegExp(
        `cu[aá]ntos\\s+(?:libros|obras)\\s+ha\\s+escrito\\s+(${NAME_CHARS})`,
      ).exec(lower);
      const author = cleanName(m?.[1]);
      return author ? { author } : null;
    },
  },
  {
    id: "sample-authors",
    domain: "library",
    terminal: true,
    match(lower) {
      const m =
        /(?:list(?:a|ame|ar)?|mu[eé]stra(?:me)?)\s*(\d+)?\s*autores/.exec(lower);
      if (!m) return null;
      return { count: countOr(m[1], CONFIG.DEFAULT_SAMPLE_SIZE) };
    },
  },
  {
    id: "books-by-year",
    domain: "library",
    terminal: false,
    match(lower) {
      // A range reads as two years; the accumulating range rule owns it.
      if (YEAR_RANGE_PATTERN.test(lower)) return null;
      const m = YEAR_PATTERN.exec(lower);
      return m ? { year: Number(m[1]) } : null;
    },
  },
  {
    id: "authors-by-nationality",
    domain: "library",
    terminal: false,
    match(lower) {
      const nationality = resolveNationality(lower);
      return nationality ? { nationality } : null;
    },
  },
  {
    id: "books-by-title",
    domain: "library",
    terminal: false,
    match(_lower, raw) {
      const term = QUOTED_PATTERN.exec(raw)?.[1].trim();
      return term ? { term } : null;
    },
  },
  {
    id: "top-authors-by-works",
    domain: "library",
    terminal: true,
    match(lower) {
      const top = /\btop\s*(\d+)?\s*(?:de\s+)?autores/.exec(lower);
      if (top) return { limit: countOr(top[1], CONFIG.DEFAULT_TOP_N) };
      const most =
        /(?:(\d+)\s+)?autores\s+(?:con|que\s+tienen)\s+m[aá]s\s+(?:libros|obras)/.exec(
          lower,
        );
      if (most) return { limit: countOr(most[1], CONFIG.DEFAULT_TOP_N) };
      return null;
    },
  },
  {
    id: "books-in-year-range",
    domain: "library",
    terminal: false,
    match: yearRange,
  },
  {
    id: "book-extremum",
    domain: "library",
    terminal: true,
    match(lower) {
      if (/m[aá]s\s+(?:reciente|nuevo)|[uú]ltimo\s+libro/.test(lower)) {
        return { order: "newest" };
      }
      if (/m[aá]s\s+(?:antiguo|viejo)|primer\s+libro/.test(lower)) {
        return { order: "oldest" };
      }
      return null;
    },
  },
];

export const PURCHASES_RULES: readonly Rule[] = [
  {
    id: "count-purchases-by-client",
    domain: "purchases",
    terminal: true,
    match(lower) {
      const m = new RegExp(
        `cu[aá]ntas\\s+compras\\s+ha\\s+(?:hecho|realizado)\\s+(${NAME_CHARS})`,
      ).exec(lower);
      const client = cleanName(m?.[1]);
      return client ? { client } : null;
    },
  },
  {
    id: "sample-products",
    domain: "purchases",
    terminal: true,
    match(lower) {
      const m = /(?:lista|mu[eé]stra)(?:me)?\s*(\d+)?\s*productos/.exec(lower);
      if (!m) return null;
      return { count: countOr(m[1], CONFIG.DEFAULT_SAMPLE_SIZE) };
    },
  },
  {
    id: "products-by-year",
    domain: "purchases",
    terminal: true,
    match(lower) {
      const m = /(?:comprados|compras).*\ben\s+(\d{4})\b/.exec(lower);
      return m ? { year: Number(m[1]) } : null;
    },
  },
  {
    id: "top-products",
    domain: "purchases",
    terminal: true,
    match(lower) {
      const m =
        /(?:top|m[aá]s)\s*(\d+)?\s*(?:productos|art[ií]culos).*comprados/.exec(
          lower,
        ) ??
        /(\d+)?\s*(?:productos|art[ií]culos)\s+m[aá]s\s+comprados/.exec(lower);
      if (!m) return null;
      return { limit: countOr(m[1], CONFIG.DEFAULT_TOP_N) };
    },
  },
  {
    id: "clients-by-country",
    domain: "purchases",
    terminal: true,
    match(lower) {
      const m = new RegExp(
        `(?:cu[aá]ntos|n[uú]mero\\s+de)\\s+clientes.*pa[ií]s\\s+(${NAME_CHARS})`,
      ).exec(lower);
      const captured = cleanName(m?.[1]);
      if (!captured) return null;
      return { country: resolveNationality(captured) ?? capitalize(captured) };
    },
  },
  {
    id: "most-active-client",
    domain: "purchases",
    terminal: true,
    match(lower) {
      return /cliente\s+m[aá]s\s+activo|cliente\s+que\s+m[aá]s\s+ha\s+comprado/.test(
        lower,
      )
        ? {}
        : null;
    },
  },
  {
    id: "out-of-stock",
    domain: "purchases",
    terminal: true,
    match(lower) {
      return /(?:sin|fuera\s+de)\s+stock/.test(lower) ? {} : null;
    },
  },
  {
    id: "products-in-year-range",
    domain: "purchases",
    terminal: true,
    match: yearRange,
  },
];

export const RULES: Record<Domain, readonly Rule[]> = {
  library: LIBRARY_RULES,
  purchases: PURCHASES_RULES,
};

export const FALLBACK_RULE: Record<Domain, RuleId> = {
  library: "library-stats",
  purchases: "purchase-stats",
};

export function capabilities(domain: Domain): RuleId[] {
  return [...RULES[domain].map((r) => r.id), FALLBACK_RULE[domain]];
}
