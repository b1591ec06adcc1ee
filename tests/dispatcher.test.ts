import { describe, expect, it, vi } from "vitest";
import { BackendClient } from "../src/lib/backend/client";
import { ModelRequestBuilder } from "../src/lib/builder/model-builder";
import {
    InMemoryLibraryRepository,
    InMemoryPurchasesRepository,
    loadLibraryFixture,
    loadPurchasesFixture,
} from "../src/lib/demo/repository";
import { createDemoBackends } from "../src/lib/demo/routes";
import { Dispatcher, MESSAGES } from "../src/lib/dispatch/dispatcher";
import { ProvisionClient } from "../src/lib/provision/remote";
import {
    BackendUnavailableError,
    EmptyQueryError,
    MalformedBackendPayloadError,
} from "../src/lib/utils/errors";
import { fixtureClients, stubFixtureFetch } from "./helpers/fixture-fetch";

const LIBRARY_STATS =
    "Estadísticas biblioteca: 7 autores y 8 libros, de 5 nacionalidades, publicados entre 1924 y 1994";

function directDispatcher(options: ConstructorParameters<typeof Dispatcher>[0] = {}) {
    return new Dispatcher({
        delegate: "direct",
        clients: fixtureClients(),
        random: () => 0,
        ...options,
    });
}

describe("Dispatcher", () => {
    it("counts an author's works through the dependent lookup", async () => {
        const { calls } = stubFixtureFetch();
        const outcome = await directDispatcher().run(
            "¿Cuántos libros ha escrito Isabel Allende?",
        );

        expect(outcome.text).toBe(
            "Isabel Allende escribió 2 libro(s). Detalle: 2 encontrado(s): La casa de los espíritus, Paula",
        );
        expect(outcome.state).toBe("FORMATTED");
        expect(outcome.trace).toEqual([
            "RECEIVED",
            "CLASSIFIED",
            "EXTRACTED",
            "REQUESTED",
            "RESULT_READY",
            "FORMATTED",
        ]);
        expect(outcome.intents.map((i) => i.ruleId)).toEqual(["count-works-by-author"]);
        expect(calls).toEqual(["/autores/", "/libros/autor/2"]);
    });

    it("rejects a blank question without touching the network", async () => {
        const { fetchMock } = stubFixtureFetch();
        const outcome = await directDispatcher().run("   ");

        expect(outcome.text).toBe(MESSAGES.emptyQuery);
        expect(outcome.state).toBe("FAILED");
        expect(outcome.trace).toEqual(["RECEIVED", "FAILED"]);
        expect(outcome.error).toBeInstanceOf(EmptyQueryError);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it("answers with a fixed message when no domain matches", async () => {
        const { fetchMock } = stubFixtureFetch();
        const outcome = await directDispatcher().run("¿Qué tiempo hace hoy?");

        expect(outcome.text).toBe("No se pudo determinar el dominio de la consulta.");
        expect(outcome.state).toBe("FORMATTED");
        expect(outcome.classification).toBe("none");
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it("renders an empty out-of-stock list as Ninguno", async () => {
        const purchases = loadPurchasesFixture();
        stubFixtureFetch({
            backends: createDemoBackends({
                library: new InMemoryLibraryRepository(loadLibraryFixture()),
                purchases: new InMemoryPurchasesRepository({
                    ...purchases,
                    productos: purchases.productos.map((p) => ({ ...p, stock: 5 })),
                }),
            }),
        });

        const text = await directDispatcher().answer("¿Qué productos hay sin stock?");
        expect(text).toBe("Productos sin stock: Ninguno");
    });

    it("lists out-of-stock products from the fixtures", async () => {
        stubFixtureFetch();
        const text = await directDispatcher().answer("¿Qué productos hay sin stock?");
        expect(text).toBe("Productos sin stock: 2 encontrado(s): Mochila, Regla");
    });

    it("broadcasts an ambiguous question to both domains, library first", async () => {
        stubFixtureFetch();
        const outcome = await directDispatcher().run("¿Cuántos libros y productos hay?");

        expect(outcome.classification).toBe("ambiguous");
        expect(outcome.intents.map((i) => [i.ruleId, i.confident])).toEqual([
            ["library-stats", false],
            ["purchase-stats", false],
        ]);
        expect(outcome.text).toBe(
            `1. ${LIBRARY_STATS}\n2. Estadísticas compras: 5 clientes, 6 productos y 6 compras`,
        );
    });

    it("runs every accumulated intent in order", async () => {
        stubFixtureFetch();
        const text = await directDispatcher().answer(
            "Libros de 1967 de autores chilenos",
        );
        expect(text).toBe(
            "1. Libros publicados en 1967: 1 encontrado(s): Cien años de soledad\n" +
                "2. Autores de Chile: 2 encontrado(s): Isabel Allende, Pablo Neruda",
        );
    });

    it("answers a year range next to an accumulated nationality", async () => {
        stubFixtureFetch();
        const text = await directDispatcher().answer(
            "Libros publicados entre 1970 y 1960 de autores chilenos",
        );
        expect(text).toBe(
            "1. Autores de Chile: 2 encontrado(s): Isabel Allende, Pablo Neruda\n" +
                "2. Libros publicados entre 1960 y 1970: 3 encontrado(s): Cien años de soledad, La ciudad y los perros, Conversación en La Catedral",
        );
    });

    it("samples authors with the injected random source", async () => {
        stubFixtureFetch();
        const text = await directDispatcher().answer("Lista 2 autores");
        expect(text).toBe("Autores al azar: Gabriel García Márquez, Isabel Allende.");
    });

    it("fails with a service message when the only backend is down", async () => {
        stubFixtureFetch({ down: ["purchases"] });
        const outcome = await directDispatcher().run("¿Qué productos hay sin stock?");

        expect(outcome.state).toBe("FAILED");
        expect(outcome.text).toBe(
            "Lo siento, el servicio de compras no está disponible en este momento.",
        );
        expect(outcome.error).toBeInstanceOf(BackendUnavailableError);
        expect(outcome.trace.at(-1)).toBe("FAILED");
    });

    it("treats a malformed base URL as an unavailable service", async () => {
        const { fetchMock } = stubFixtureFetch();
        const outcome = await directDispatcher({
            clients: { ...fixtureClients(), library: new BackendClient("not a url", 1000) },
        }).run("¿Cuántos libros hay?");

        expect(outcome.state).toBe("FAILED");
        expect(outcome.text).toBe(
            "Lo siento, el servicio de biblioteca no está disponible en este momento.",
        );
        expect(outcome.error).toBeInstanceOf(BackendUnavailableError);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it("formats a partial result with a degraded-service note", async () => {
        stubFixtureFetch({ down: ["purchases"] });
        const outcome = await directDispatcher().run("¿Cuántos libros y productos hay?");

        expect(outcome.state).toBe("FORMATTED");
        expect(outcome.text).toBe(
            `${LIBRARY_STATS}\nNota: el servicio de compras no respondió; la respuesta puede estar incompleta.`,
        );
    });

    it("reports a payload of the wrong shape", async () => {
        stubFixtureFetch({
            override: (url) =>
                url.pathname === "/stats"
                    ? new Response(JSON.stringify({ libros: "muchos" }), { status: 200 })
                    : undefined,
        });
        const outcome = await directDispatcher().run("¿Cuántos libros hay?");

        expect(outcome.state).toBe("FAILED");
        expect(outcome.text).toBe(
            "La respuesta del servicio de biblioteca no tiene el formato esperado.",
        );
        expect(outcome.error).toBeInstanceOf(MalformedBackendPayloadError);
    });

    it("surfaces a model's ambiguity as a warning without calling backends", async () => {
        const { fetchMock } = stubFixtureFetch();
        const builder = new ModelRequestBuilder({
            complete: vi.fn(async () => '{"error": "No está claro qué autor buscas."}'),
        });
        const outcome = await directDispatcher({ builder }).run(
            "¿Cuántos libros ha escrito Isabel Allende?",
        );

        expect(outcome.text).toBe("⚠️ No está claro qué autor buscas.");
        expect(outcome.state).toBe("FORMATTED");
        expect(outcome.trace).toEqual(["RECEIVED", "CLASSIFIED", "EXTRACTED", "FORMATTED"]);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it("delegates to the provision service when configured", async () => {
        const fetchMock = vi.fn(
            async () =>
                new Response(
                    JSON.stringify({
                        chunks: [
                            {
                                type: "text",
                                text: 'Autores de Chile: [{"id": 2, "nombre": "Isabel Allende", "nacionalidad": "Chile"}]',
                                source: "http://library.test/autores/buscar/por-nacionalidad/Chile",
                            },
                        ],
                        provenance: "biblioteca_api",
                    }),
                    { status: 200 },
                ),
        );
        vi.stubGlobal("fetch", fetchMock);

        const dispatcher = new Dispatcher({
            delegate: "provision",
            provisionClients: {
                library: new ProvisionClient("http://provision.test/biblioteca", 1000),
            },
        });
        const outcome = await dispatcher.run("autores chilenos");

        expect(outcome.text).toBe("Autores de Chile: 1 encontrado(s): Isabel Allende");
        expect(outcome.trace).toEqual([
            "RECEIVED",
            "CLASSIFIED",
            "REQUESTED",
            "RESULT_READY",
            "FORMATTED",
        ]);
        expect(outcome.intents).toEqual([]);
        expect(fetchMock).toHaveBeenCalledWith(
            "http://provision.test/biblioteca/provision",
            expect.objectContaining({
                method: "POST",
                body: JSON.stringify({ query: "autores chilenos" }),
            }),
        );
    });
});
