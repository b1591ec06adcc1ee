import * as http from "node:http";
import { z } from "zod";
import { CONFIG } from "../../config";
import type { Dispatcher } from "../dispatch/dispatcher";
import { DOMAIN_LABEL } from "../provision/pipeline";
import { provisionRequestSchema } from "../provision/remote";
import { capabilities } from "../router/rules";
import type { Domain } from "../router/types";
import {
  BackendUnavailableError,
  describeError,
  EmptyQueryError,
  MalformedBackendPayloadError,
} from "../utils/errors";
import { packageVersion } from "../utils/version";

export interface ServiceResponse {
  status: number;
  body: unknown;
}

const answerRequestSchema = z.object({ question: z.string() });

const SERVICE_DOMAINS: Record<string, Domain> = {
  [DOMAIN_LABEL.library]: "library",
  [DOMAIN_LABEL.purchases]: "purchases",
};

const DESCRIPTIONS: Record<Domain, string> = {
  library: "Contexto sobre libros y autores de la biblioteca",
  purchases: "Contexto sobre clientes, productos y compras",
};

const json = (status: number, body: unknown): ServiceResponse => ({ status, body });

function parseBody(raw: string): unknown {
  if (!raw.trim()) return {};
  return JSON.parse(raw);
}

/**
 * HTTP surface over a dispatcher: `/answer` for full answers and one
 * provision service per domain under `/{biblioteca|compras}`.
 */
export class ServiceApp {
  constructor(private readonly dispatcher: Dispatcher) {}

  manifest(domain: Domain) {
    return {
      name: DOMAIN_LABEL[domain],
      description: DESCRIPTIONS[domain],
      version: packageVersion(),
      capabilities: capabilities(domain),
    };
  }

  async handle(method: string, url: string, rawBody = ""): Promise<ServiceResponse> {
    const path = url.split("?", 1)[0].replace(/\/+$/, "") || "/";

    if (method === "GET" && path === "/health") {
      return json(200, {
        status: "ok",
        builder: CONFIG.BUILDER,
        delegate: CONFIG.DELEGATE,
      });
    }

    let body: unknown;
    if (method === "POST") {
      try {
        body = parseBody(rawBody);
      } catch {
        return json(400, { detail: "invalid_json" });
      }
    }

    if (method === "POST" && path === "/answer") {
      const parsed = answerRequestSchema.safeParse(body);
      if (!parsed.success) return json(400, { detail: "question es obligatorio" });
      const outcome = await this.dispatcher.run(parsed.data.question);
      return json(outcome.error instanceof EmptyQueryError ? 400 : 200, {
        answer: outcome.text,
        state: outcome.state,
        classification: outcome.classification,
      });
    }

    const m = /^\/([a-z]+)\/(manifest|provision)$/.exec(path);
    const domain = m ? SERVICE_DOMAINS[m[1]] : undefined;
    if (!m || !domain) return json(404, { detail: "not_found" });

    if (m[2] === "manifest" && method === "GET") {
      return json(200, this.manifest(domain));
    }
    if (m[2] === "provision" && method === "POST") {
      return this.provision(domain, body);
    }
    return json(405, { detail: "method_not_allowed" });
  }

  private async provision(domain: Domain, body: unknown): Promise<ServiceResponse> {
    const parsed = provisionRequestSchema.safeParse(body);
    if (!parsed.success) return json(400, { detail: "query es obligatorio" });
    if (!parsed.data.query.trim()) {
      return json(400, { detail: "query no puede estar vacía" });
    }
    try {
      const response = await this.dispatcher
        .pipeline(domain)
        .provide(parsed.data.query);
      return json(200, {
        chunks: response.chunks.map((c) => ({ type: "text", ...c })),
        provenance: response.provenance,
      });
    } catch (err) {
      console.error(`[serve] provision for ${domain} failed:`, err);
      if (
        err instanceof BackendUnavailableError ||
        err instanceof MalformedBackendPayloadError
      ) {
        return json(502, { detail: describeError(err) });
      }
      return json(500, { detail: "internal_error" });
    }
  }
}

export function readBody(
  req: http.IncomingMessage,
  limit: number = CONFIG.MAX_BODY_BYTES,
): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        resolve(null);
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!tooLarge) resolve(Buffer.concat(chunks).toString("utf-8"));
    });
    req.on("error", reject);
  });
}

export function createServiceServer(app: ServiceApp): http.Server {
  return http.createServer(async (req, res) => {
    const send = (status: number, body: unknown) => {
      res.statusCode = status;
      res.setHeader("Content-Type", "application/json");
      res.end(JSON.stringify(body));
    };
    try {
      const method = req.method ?? "GET";
      const raw = method === "POST" ? await readBody(req) : "";
      if (raw === null) {
        send(413, { detail: "payload_too_large" });
        req.destroy();
        return;
      }
      const { status, body } = await app.handle(method, req.url ?? "/", raw);
      send(status, body);
    } catch (err) {
      console.error("[serve] request handler error:", err);
      if (!res.headersSent) send(500, { detail: "internal_error" });
    }
  });
}
