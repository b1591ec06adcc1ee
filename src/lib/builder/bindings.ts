import type { IntentParams, RuleId } from "../router/types";

export interface EndpointBinding {
  endpointId: string;
  pathParams?: Record<string, string | number>;
  query?: Record<string, string>;
  description: string;
}

export function param(params: IntentParams, name: string): string | number {
  const value = params[name];
  if (value === undefined) throw new Error(`Missing intent parameter "${name}"`);
  return value;
}

export function numberParam(params: IntentParams, name: string): number {
  const value = Number(param(params, name));
  if (!Number.isFinite(value)) {
    throw new Error(`Intent parameter "${name}" is not a number`);
  }
  return value;
}

const yearSpan = (from: number, to: number) => ({
  desde: `${from}-01-01`,
  hasta: `${to}-12-31`,
});

/** Primary endpoint each rule reads from. */
export const RULE_BINDINGS: Record<RuleId, (p: IntentParams) => EndpointBinding> = {
  "count-works-by-author": (p) => ({
    endpointId: "autores.list",
    description: `Libros escritos por "${param(p, "author")}"`,
  }),
  "sample-authors": (p) => ({
    endpointId: "autores.list",
    description: `${numberParam(p, "count")} autores al azar`,
  }),
  "books-by-year": (p) => ({
    endpointId: "libros.byYear",
    pathParams: { anio: numberParam(p, "year") },
    description: `Libros publicados en ${numberParam(p, "year")}`,
  }),
  "authors-by-nationality": (p) => ({
    endpointId: "autores.byNationality",
    pathParams: { nacionalidad: param(p, "nationality") },
    description: `Autores de ${param(p, "nationality")}`,
  }),
  "books-by-title": (p) => ({
    endpointId: "libros.byTitle",
    pathParams: { termino: param(p, "term") },
    description: `Libros con '${param(p, "term")}'`,
  }),
  "top-authors-by-works": (p) => ({
    endpointId: "libros.list",
    description: `Top ${numberParam(p, "limit")} autores con más libros`,
  }),
  "books-in-year-range": (p) => ({
    endpointId: "libros.list",
    description: `Libros publicados entre ${numberParam(p, "from")} y ${numberParam(p, "to")}`,
  }),
  "book-extremum": (p) => ({
    endpointId: "libros.list",
    description:
      param(p, "order") === "oldest" ? "Libro más antiguo" : "Libro más reciente",
  }),
  "library-stats": () => ({
    endpointId: "library.stats",
    description: "Estadísticas biblioteca",
  }),
  "count-purchases-by-client": (p) => ({
    endpointId: "clientes.list",
    description: `Compras realizadas por "${param(p, "client")}"`,
  }),
  "sample-products": (p) => ({
    endpointId: "productos.list",
    description: `${numberParam(p, "count")} productos al azar`,
  }),
  "products-by-year": (p) => ({
    endpointId: "productos.purchasedBetween",
    query: yearSpan(numberParam(p, "year"), numberParam(p, "year")),
    description: `Productos comprados en ${numberParam(p, "year")}`,
  }),
  "top-products": (p) => ({
    endpointId: "productos.mostPurchased",
    description: `Top ${numberParam(p, "limit")} productos más comprados`,
  }),
  "clients-by-country": (p) => ({
    endpointId: "clientes.byCountry",
    pathParams: { pais: param(p, "country") },
    description: `Clientes de ${param(p, "country")}`,
  }),
  "most-active-client": () => ({
    endpointId: "clientes.activity",
    description: "Cliente más activo",
  }),
  "out-of-stock": () => ({
    endpointId: "productos.outOfStock",
    description: "Productos sin stock",
  }),
  "products-in-year-range": (p) => ({
    endpointId: "productos.purchasedBetween",
    query: yearSpan(numberParam(p, "from"), numberParam(p, "to")),
    description: `Productos comprados entre ${numberParam(p, "from")} y ${numberParam(p, "to")}`,
  }),
  "purchase-stats": () => ({
    endpointId: "purchases.stats",
    description: "Estadísticas compras",
  }),
};
