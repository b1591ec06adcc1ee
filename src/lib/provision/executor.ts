import { z } from "zod";
import type { BackendClient, BackendTarget } from "../backend/client";
import {
  authorSchema,
  bookSchema,
  clientActivitySchema,
  clientSchema,
  libraryStatsSchema,
  productSchema,
  productTotalSchema,
  purchaseSchema,
  purchaseStatsSchema,
  type Book,
  type Client,
} from "../backend/schemas";
import { param, numberParam, RULE_BINDINGS } from "../builder/bindings";
import { fillPath, getEndpoint } from "../catalog/endpoints";
import type {
  Domain,
  Intent,
  QueryRequest,
  ResultChunk,
  RuleId,
} from "../router/types";
import { MalformedBackendPayloadError } from "../utils/errors";
import { sampleWithoutReplacement, type RandomSource } from "../utils/sample";

export interface ExecutionContext {
  client: BackendClient;
  random?: RandomSource;
}

type Handler = (
  intent: Intent,
  request: QueryRequest,
  ctx: ExecutionContext,
) => Promise<ResultChunk[]>;

async function fetchAs<T>(
  ctx: ExecutionContext,
  target: BackendTarget,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const payload = await ctx.client.fetchJson(target);
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedBackendPayloadError(
      ctx.client.url(target),
      `forma inesperada (${issue ? `${issue.path.join(".")}: ${issue.message}` : "inválida"})`,
    );
  }
  return parsed.data;
}

function endpointTarget(
  domain: Domain,
  endpointId: string,
  pathParams: Record<string, string | number> = {},
): BackendTarget {
  const spec = getEndpoint(domain, endpointId);
  if (!spec) throw new Error(`Unknown endpoint ${endpointId}`);
  return { method: spec.method, path: fillPath(spec, pathParams) };
}

const chunk = (
  ctx: ExecutionContext,
  target: BackendTarget,
  text: string,
): ResultChunk[] => [{ text, source: ctx.client.url(target) }];

const json = (value: unknown) => JSON.stringify(value);

const fullName = (c: Client) => `${c.nombre} ${c.apellidos}`.trim();

/** First element with the highest key; input order breaks ties. */
function extremum<T>(items: readonly T[], key: (item: T) => number): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (best === undefined || key(item) > key(best)) best = item;
  }
  return best;
}

/** Descending by count; Array.prototype.sort is stable, so ties keep input order. */
export function rankByCount<T>(
  items: readonly T[],
  count: (item: T) => number,
  limit: number,
): T[] {
  return items
    .slice()
    .sort((a, b) => count(b) - count(a))
    .slice(0, Math.max(0, limit));
}

const books = z.array(bookSchema);
const authors = z.array(authorSchema);

const HANDLERS: Record<RuleId, Handler> = {
  "count-works-by-author": async (intent, request, ctx) => {
    const name = String(param(intent.params, "author")).toLowerCase();
    const all = await fetchAs(ctx, request, authors);
    const author = all.find((a) => a.nombre.toLowerCase().includes(name));
    if (!author) {
      return chunk(ctx, request, `No se encontró al autor "${name}".`);
    }
    const worksTarget = endpointTarget("library", "libros.byAuthor", {
      autor_id: author.id,
    });
    const works = await fetchAs(ctx, worksTarget, books);
    return chunk(
      ctx,
      worksTarget,
      `${author.nombre} escribió ${works.length} libro(s). Detalle: ${json(works)}`,
    );
  },

  "sample-authors": async (intent, request, ctx) => {
    const all = await fetchAs(ctx, request, authors);
    const picked = sampleWithoutReplacement(
      all,
      numberParam(intent.params, "count"),
      ctx.random,
    );
    const names = picked.map((a) => a.nombre).join(", ");
    return chunk(ctx, request, `Autores al azar: ${names || "Ninguno"}`);
  },

  "books-by-year": async (intent, request, ctx) => {
    const found = await fetchAs(ctx, request, books);
    const year = numberParam(intent.params, "year");
    return chunk(ctx, request, `Libros publicados en ${year}: ${json(found)}`);
  },

  "authors-by-nationality": async (intent, request, ctx) => {
    const found = await fetchAs(ctx, request, authors);
    const country = String(param(intent.params, "nationality"));
    return chunk(ctx, request, `Autores de ${country}: ${json(found)}`);
  },

  "books-by-title": async (intent, request, ctx) => {
    const found = await fetchAs(ctx, request, books);
    const term = String(param(intent.params, "term"));
    return chunk(ctx, request, `Libros con '${term}': ${json(found)}`);
  },

  "top-authors-by-works": async (intent, request, ctx) => {
    const all = await fetchAs(ctx, request, books);
    const authorsTarget = endpointTarget("library", "autores.list");
    const people = await fetchAs(ctx, authorsTarget, authors);

    const works = new Map<number, number>();
    for (const book of all) {
      works.set(book.autor_id, (works.get(book.autor_id) ?? 0) + 1);
    }
    const ranked = rankByCount(
      people.map((a) => ({ nombre: a.nombre, total: works.get(a.id) ?? 0 })),
      (a) => a.total,
      numberParam(intent.params, "limit"),
    );
    return chunk(ctx, request, `Autores con más libros: ${json(ranked)}`);
  },

  "books-in-year-range": async (intent, request, ctx) => {
    const from = numberParam(intent.params, "from");
    const to = numberParam(intent.params, "to");
    const all = await fetchAs(ctx, request, books);
    const found = all.filter(
      (b) => b.anio_publicacion >= from && b.anio_publicacion <= to,
    );
    return chunk(
      ctx,
      request,
      `Libros publicados entre ${from} y ${to}: ${json(found)}`,
    );
  },

  "book-extremum": async (intent, request, ctx) => {
    const oldest = param(intent.params, "order") === "oldest";
    const all = await fetchAs(ctx, request, books);
    const book: Book | undefined = extremum(all, (b) =>
      oldest ? -b.anio_publicacion : b.anio_publicacion,
    );
    if (!book) return chunk(ctx, request, "No hay libros registrados.");
    const label = oldest ? "Libro más antiguo" : "Libro más reciente";
    return chunk(ctx, request, `${label}: ${json(book)}`);
  },

  "library-stats": async (_intent, request, ctx) => {
    const stats = await fetchAs(ctx, request, libraryStatsSchema);
    return chunk(ctx, request, `Estadísticas biblioteca: ${json(stats)}`);
  },

  "count-purchases-by-client": async (intent, request, ctx) => {
    const name = String(param(intent.params, "client")).toLowerCase();
    const clients = await fetchAs(ctx, request, z.array(clientSchema));
    const client = clients.find((c) =>
      fullName(c).toLowerCase().includes(name),
    );
    if (!client) {
      return chunk(ctx, request, `No se encontró al cliente "${name}".`);
    }
    const purchasesTarget = endpointTarget("purchases", "compras.byClient", {
      dni: client.dni,
    });
    const purchases = await fetchAs(ctx, purchasesTarget, z.array(purchaseSchema));
    return chunk(
      ctx,
      purchasesTarget,
      `${fullName(client)} ha realizado ${purchases.length} compra(s).`,
    );
  },

  "sample-products": async (intent, request, ctx) => {
    const all = await fetchAs(ctx, request, z.array(productSchema));
    const picked = sampleWithoutReplacement(
      all,
      numberParam(intent.params, "count"),
      ctx.random,
    );
    const names = picked.map((p) => p.nombre).join(", ");
    return chunk(ctx, request, `Productos al azar: ${names || "Ninguno"}`);
  },

  "products-by-year": async (intent, request, ctx) => {
    const found = await fetchAs(ctx, request, z.array(productSchema));
    const year = numberParam(intent.params, "year");
    return chunk(ctx, request, `Productos comprados en ${year}: ${json(found)}`);
  },

  "top-products": async (intent, request, ctx) => {
    const totals = await fetchAs(ctx, request, z.array(productTotalSchema));
    const ranked = rankByCount(
      totals,
      (p) => p.total,
      numberParam(intent.params, "limit"),
    ).map((p) => ({ nombre: p.nombre, total: p.total }));
    return chunk(ctx, request, `Top productos más comprados: ${json(ranked)}`);
  },

  "clients-by-country": async (intent, request, ctx) => {
    const clients = await fetchAs(ctx, request, z.array(clientSchema));
    const country = String(param(intent.params, "country"));
    return chunk(ctx, request, `Clientes de ${country}: ${clients.length}`);
  },

  "most-active-client": async (_intent, request, ctx) => {
    const activity = await fetchAs(ctx, request, z.array(clientActivitySchema));
    const top = extremum(activity, (c) => c.total);
    if (!top || top.total === 0) {
      return chunk(ctx, request, "No hay compras registradas.");
    }
    return chunk(
      ctx,
      request,
      `El cliente más activo es ${fullName(top)} con ${top.total} compras.`,
    );
  },

  "out-of-stock": async (_intent, request, ctx) => {
    const found = await fetchAs(ctx, request, z.array(productSchema));
    return chunk(ctx, request, `Productos sin stock: ${json(found)}`);
  },

  "products-in-year-range": async (intent, request, ctx) => {
    const found = await fetchAs(ctx, request, z.array(productSchema));
    const from = numberParam(intent.params, "from");
    const to = numberParam(intent.params, "to");
    return chunk(
      ctx,
      request,
      `Productos comprados entre ${from} y ${to}: ${json(found)}`,
    );
  },

  "purchase-stats": async (_intent, request, ctx) => {
    const stats = await fetchAs(ctx, request, purchaseStatsSchema);
    return chunk(ctx, request, `Estadísticas compras: ${json(stats)}`);
  },
};

function expectedEndpoint(intent: Intent): string | undefined {
  try {
    return RULE_BINDINGS[intent.ruleId](intent.params).endpointId;
  } catch {
    return undefined;
  }
}

/**
 * Runs a built request. When the request addresses the endpoint the rule
 * expects, the rule's handler post-processes the data (follow-up calls,
 * sampling, ranking); any other endpoint is fetched and reported as-is.
 */
export async function executeIntent(
  intent: Intent,
  request: QueryRequest,
  ctx: ExecutionContext,
): Promise<ResultChunk[]> {
  if (request.endpointId === expectedEndpoint(intent)) {
    return HANDLERS[intent.ruleId](intent, request, ctx);
  }
  const data = await ctx.client.fetchJson(request);
  return chunk(ctx, request, `${request.description}: ${json(data)}`);
}
