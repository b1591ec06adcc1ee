import * as http from "node:http";
import type { DemoBackend } from "./routes";

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

export function createDemoServer(backend: DemoBackend): http.Server {
  return http.createServer((req, res) => {
    try {
      const { status, body } = backend.handle(req.method ?? "GET", req.url ?? "/");
      sendJson(res, status, body);
    } catch (err) {
      console.error(`[demo:${backend.domain}] request failed:`, err);
      if (!res.headersSent) {
        sendJson(res, 500, { detail: "internal_error" });
      }
    }
  });
}

export function listen(server: http.Server, port: number, host = "127.0.0.1") {
  return new Promise<number>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    });
  });
}

export function close(server: http.Server) {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
