import type { Classification, Domain } from "./types";

export const DOMAIN_KEYWORDS: Record<Domain, readonly string[]> = {
  library: [
    "libro",
    "autor",
    "editorial",
    "publicación",
    "publicacion",
    "publicad",
    "novela",
    "obra",
    "título",
    "titulo",
  ],
  purchases: [
    "producto",
    "cliente",
    "compra",
    "stock",
    "artículo",
    "articulo",
    "pedido",
  ],
};

const mentions = (text: string, domain: Domain) =>
  DOMAIN_KEYWORDS[domain].some((word) => text.includes(word));

export function classifyDomain(question: string): Classification {
  const normalized = question.toLowerCase();
  const library = mentions(normalized, "library");
  const purchases = mentions(normalized, "purchases");

  if (library && purchases) return "ambiguous";
  if (library) return "library";
  if (purchases) return "purchases";
  return "none";
}

export function domainsFor(classification: Classification): Domain[] {
  switch (classification) {
    case "ambiguous":
      return ["library", "purchases"];
    case "none":
      return [];
    default:
      return [classification];
  }
}
