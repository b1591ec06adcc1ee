import type { Domain, HttpMethod } from "../router/types";

export interface EndpointSpec {
  id: string;
  domain: Domain;
  method: HttpMethod;
  pathTemplate: string;
  parameterNames: readonly string[];
  description: string;
}

const endpoint = (
  domain: Domain,
  id: string,
  pathTemplate: string,
  description: string,
  queryNames: readonly string[] = [],
): EndpointSpec => ({
  id,
  domain,
  method: "GET",
  pathTemplate,
  parameterNames: [
    ...Array.from(pathTemplate.matchAll(/\{(\w+)\}/g), (m) => m[1]),
    ...queryNames,
  ],
  description,
});

export const LIBRARY_ENDPOINTS: readonly EndpointSpec[] = Object.freeze([
  endpoint("library", "autores.list", "/autores/", "Lista todos los autores"),
  endpoint(
    "library",
    "autores.get",
    "/autores/{autor_id}",
    "Obtiene un autor por su ID",
  ),
  endpoint(
    "library",
    "autores.byNationality",
    "/autores/buscar/por-nacionalidad/{nacionalidad}",
    "Busca autores por nacionalidad (nombre de país)",
  ),
  endpoint("library", "libros.list", "/libros/", "Lista todos los libros"),
  endpoint(
    "library",
    "libros.get",
    "/libros/{libro_id}",
    "Obtiene un libro por su ID",
  ),
  endpoint(
    "library",
    "libros.byAuthor",
    "/libros/autor/{autor_id}",
    "Libros escritos por un autor",
  ),
  endpoint(
    "library",
    "libros.byYear",
    "/libros/buscar/por-anio/{anio}",
    "Libros publicados en un año",
  ),
  endpoint(
    "library",
    "libros.byTitle",
    "/libros/buscar/titulo/{termino}",
    "Libros cuyo título contiene un término",
  ),
  endpoint("library", "library.stats", "/stats", "Estadísticas de la biblioteca"),
]);

export const PURCHASES_ENDPOINTS: readonly EndpointSpec[] = Object.freeze([
  endpoint("purchases", "clientes.list", "/clientes/", "Lista todos los clientes"),
  endpoint(
    "purchases",
    "clientes.byCountry",
    "/clientes/buscar/por-pais/{pais}",
    "Clientes de un país",
  ),
  endpoint(
    "purchases",
    "clientes.activity",
    "/clientes/actividad",
    "Número de compras por cliente",
  ),
  endpoint("purchases", "productos.list", "/productos/", "Lista todos los productos"),
  endpoint(
    "purchases",
    "productos.outOfStock",
    "/productos/sin-stock",
    "Productos con stock agotado",
  ),
  endpoint(
    "purchases",
    "productos.mostPurchased",
    "/productos/mas-comprados",
    "Cantidad total comprada por producto",
  ),
  endpoint(
    "purchases",
    "productos.purchasedBetween",
    "/productos/comprados",
    "Productos comprados entre dos fechas (desde, hasta en formato AAAA-MM-DD)",
    ["desde", "hasta"],
  ),
  endpoint("purchases", "compras.list", "/compras/", "Lista todas las compras"),
  endpoint(
    "purchases",
    "compras.byClient",
    "/compras/cliente/{dni}",
    "Compras realizadas por un cliente",
  ),
  endpoint("purchases", "purchases.stats", "/stats", "Estadísticas de compras"),
]);

export const ENDPOINT_CATALOG: Record<Domain, readonly EndpointSpec[]> = {
  library: LIBRARY_ENDPOINTS,
  purchases: PURCHASES_ENDPOINTS,
};

export function getEndpoint(domain: Domain, id: string): EndpointSpec | undefined {
  return ENDPOINT_CATALOG[domain].find((e) => e.id === id);
}

/**
 * Fills `{name}` placeholders with URL-encoded values.
 */
export function fillPath(
  spec: EndpointSpec,
  params: Record<string, string | number>,
): string {
  return spec.pathTemplate.replace(/\{(\w+)\}/g, (_m, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing path parameter "${name}" for ${spec.id}`);
    }
    return encodeURIComponent(String(value));
  });
}

export interface EndpointMatch {
  spec: EndpointSpec;
  pathParams: Record<string, string>;
  query: Record<string, string>;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function templateToRegExp(template: string): RegExp {
  const pattern = template
    .replace(/\/+$/, "")
    .split(/(\{\w+\})/)
    .map((part) =>
      /^\{\w+\}$/.test(part)
        ? "([^/]+)"
        : part.replace(/[.*+?^$()|[\]\\]/g, "\\$&"),
    )
    .join("");
  return new RegExp(`^${pattern}/?$`);
}

/**
 * Resolves a concrete method + path (optionally with a query string) to the
 * catalog entry it addresses.
 */
export function matchEndpoint(
  domain: Domain,
  method: string,
  rawPath: string,
): EndpointMatch | null {
  const [pathPart, queryPart = ""] = rawPath.split("?", 2);
  const path = pathPart.startsWith("/") ? pathPart : `/${pathPart}`;
  const query = Object.fromEntries(new URLSearchParams(queryPart));

  for (const spec of ENDPOINT_CATALOG[domain]) {
    if (spec.method !== method.toUpperCase()) continue;
    const m = templateToRegExp(spec.pathTemplate).exec(path);
    if (!m) continue;
    const names = Array.from(spec.pathTemplate.matchAll(/\{(\w+)\}/g), (x) => x[1]);
    const pathParams: Record<string, string> = {};
    names.forEach((name, i) => {
      pathParams[name] = safeDecode(m[i + 1]);
    });
    return { spec, pathParams, query };
  }
  return null;
}

export function describeCatalog(domain: Domain): string {
  return ENDPOINT_CATALOG[domain]
    .map((e) => {
      const params = e.parameterNames.length
        ? ` (parámetros: ${e.parameterNames.join(", ")})`
        : "";
      return `- ${e.method} ${e.pathTemplate}: ${e.description}${params}`;
    })
    .join("\n");
}
