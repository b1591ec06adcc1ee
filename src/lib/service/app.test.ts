import { describe, expect, it } from "vitest";
import { fixtureClients, stubFixtureFetch } from "../../../tests/helpers/fixture-fetch";
import { Dispatcher } from "../dispatch/dispatcher";
import { ServiceApp } from "./app";

const app = new ServiceApp(new Dispatcher({ delegate: "direct", clients: fixtureClients() }));

describe("ServiceApp", () => {
  it("reports health", async () => {
    const res = await app.handle("GET", "/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok" });
  });

  it("answers a question", async () => {
    stubFixtureFetch();
    await expect(
      app.handle("POST", "/answer", JSON.stringify({ question: "¿Quién es el cliente más activo?" })),
    ).resolves.toEqual({
      status: 200,
      body: {
        answer: "El cliente más activo es Lucía Fernández Soto con 3 compras.",
        state: "FORMATTED",
        classification: "purchases",
      },
    });
  });

  it("rejects a blank question with 400", async () => {
    const res = await app.handle("POST", "/answer", JSON.stringify({ question: " " }));
    expect(res).toEqual({
      status: 400,
      body: {
        answer: "La pregunta no puede estar vacía.",
        state: "FAILED",
        classification: "none",
      },
    });
  });

  it("rejects bodies that are not JSON", async () => {
    expect(await app.handle("POST", "/answer", "{")).toEqual({
      status: 400,
      body: { detail: "invalid_json" },
    });
  });

  it("publishes a manifest per domain", async () => {
    const res = await app.handle("GET", "/compras/manifest");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      name: "compras",
      capabilities: expect.arrayContaining(["out-of-stock", "purchase-stats"]),
    });
  });

  it("provides chunks for a domain", async () => {
    stubFixtureFetch();
    const res = await app.handle(
      "POST",
      "/biblioteca/provision",
      JSON.stringify({ query: "libros de 1944" }),
    );
    expect(res).toEqual({
      status: 200,
      body: {
        chunks: [
          {
            type: "text",
            text: 'Libros publicados en 1944: [{"id":4,"titulo":"Ficciones","autor_id":4,"anio_publicacion":1944}]',
            source: "http://library.test/libros/buscar/por-anio/1944",
          },
        ],
        provenance: "biblioteca_api",
      },
    });
  });

  it("refuses a blank provision query", async () => {
    expect(
      await app.handle("POST", "/biblioteca/provision", JSON.stringify({ query: "" })),
    ).toEqual({ status: 400, body: { detail: "query no puede estar vacía" } });
  });

  it("maps an unreachable backend to 502", async () => {
    stubFixtureFetch({ down: ["purchases"] });
    const res = await app.handle("POST", "/compras/provision", JSON.stringify({ query: "stock" }));
    expect(res.status).toBe(502);
  });

  it("answers 404 and 405 for other routes", async () => {
    expect((await app.handle("GET", "/otros/manifest")).status).toBe(404);
    expect((await app.handle("GET", "/biblioteca/provision")).status).toBe(405);
  });
});
