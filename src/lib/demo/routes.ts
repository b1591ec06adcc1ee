import { matchEndpoint, type EndpointMatch } from "../catalog/endpoints";
import type { Domain } from "../router/types";
import type { LibraryRepository, PurchasesRepository } from "./repository";

export interface RouteResponse {
  status: number;
  body: unknown;
}

type RouteHandler = (match: EndpointMatch) => RouteResponse;

const ok = (body: unknown): RouteResponse => ({ status: 200, body });
const notFound = (detail: string): RouteResponse => ({
  status: 404,
  body: { detail },
});
const badRequest = (detail: string): RouteResponse => ({
  status: 422,
  body: { detail },
});

function intParam(
  match: EndpointMatch,
  name: string,
  handle: (value: number) => RouteResponse,
): RouteResponse {
  const value = Number(match.pathParams[name]);
  if (!Number.isInteger(value)) {
    return badRequest(`${name} debe ser un número entero`);
  }
  return handle(value);
}

export function libraryRoutes(repo: LibraryRepository): Record<string, RouteHandler> {
  return {
    "autores.list": () => ok(repo.authors()),
    "autores.get": (m) =>
      intParam(m, "autor_id", (id) => {
        const author = repo.author(id);
        return author ? ok(author) : notFound(`Autor con ID ${id} no encontrado`);
      }),
    "autores.byNationality": (m) =>
      ok(repo.authorsByNationality(m.pathParams.nacionalidad ?? "")),
    "libros.list": () => ok(repo.books()),
    "libros.get": (m) =>
      intParam(m, "libro_id", (id) => {
        const book = repo.book(id);
        return book ? ok(book) : notFound(`Libro con ID ${id} no encontrado`);
      }),
    "libros.byAuthor": (m) => intParam(m, "autor_id", (id) => ok(repo.booksByAuthor(id))),
    "libros.byYear": (m) => intParam(m, "anio", (year) => ok(repo.booksByYear(year))),
    "libros.byTitle": (m) => ok(repo.booksByTitle(m.pathParams.termino ?? "")),
    "library.stats": () => ok(repo.stats()),
  };
}

export function purchasesRoutes(
  repo: PurchasesRepository,
): Record<string, RouteHandler> {
  return {
    "clientes.list": () => ok(repo.clients()),
    "clientes.byCountry": (m) => ok(repo.clientsByCountry(m.pathParams.pais ?? "")),
    "clientes.activity": () => ok(repo.clientActivity()),
    "productos.list": () => ok(repo.products()),
    "productos.outOfStock": () => ok(repo.outOfStock()),
    "productos.mostPurchased": () => ok(repo.mostPurchased()),
    "productos.purchasedBetween": (m) => {
      const { desde, hasta } = m.query;
      if (!desde || !hasta) return badRequest("desde y hasta son obligatorios");
      return ok(repo.purchasedBetween(desde, hasta));
    },
    "compras.list": () => ok(repo.purchases()),
    "compras.byClient": (m) => ok(repo.purchasesByClient(m.pathParams.dni ?? "")),
    "purchases.stats": () => ok(repo.stats()),
  };
}

/**
 * Fixture-backed stand-in for one domain's REST API. Paths are resolved
 * through the endpoint catalog, so it answers exactly what the catalog lists.
 */
export class DemoBackend {
  constructor(
    readonly domain: Domain,
    private readonly routes: Record<string, RouteHandler>,
  ) {}

  handle(method: string, rawPath: string): RouteResponse {
    const match = matchEndpoint(this.domain, method, rawPath);
    if (!match) return notFound("Not Found");
    const route = this.routes[match.spec.id];
    if (!route) return notFound("Not Found");
    return route(match);
  }
}

export function createDemoBackends(repos: {
  library: LibraryRepository;
  purchases: PurchasesRepository;
}): Record<Domain, DemoBackend> {
  return {
    library: new DemoBackend("library", libraryRoutes(repos.library)),
    purchases: new DemoBackend("purchases", purchasesRoutes(repos.purchases)),
  };
}
