/**
 * Environment handling in src/config.ts. Each test re-imports the module
 * after adjusting process.env.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

describe("configuration", () => {
    const originalEnv = { ...process.env };

    beforeEach(() => {
        vi.resetModules();
    });

    afterEach(() => {
        process.env = { ...originalEnv };
    });

    it("uses local defaults when nothing is set", async () => {
        delete process.env.BIBLIOTECA_API;
        delete process.env.COMPRAS_API;
        delete process.env.CONSULTA_BUILDER;
        delete process.env.CONSULTA_DELEGATE;
        delete process.env.CONSULTA_BACKEND_TIMEOUT_MS;

        const { BACKENDS, CONFIG } = await import("../src/config");

        expect(BACKENDS.library).toBe("http://127.0.0.1:8000");
        expect(BACKENDS.purchases).toBe("http://127.0.0.1:8200");
        expect(CONFIG.BUILDER).toBe("rules");
        expect(CONFIG.DELEGATE).toBe("direct");
        expect(CONFIG.BACKEND_TIMEOUT_MS).toBe(10_000);
    });

    it("reads backend URLs and strips trailing slashes", async () => {
        process.env.BIBLIOTECA_API = "http://biblioteca.internal:9000/";
        process.env.MCP_COMPRAS = "http://mcp.internal/compras//";

        const { BACKENDS, PROVISION_SERVICES } = await import("../src/config");

        expect(BACKENDS.library).toBe("http://biblioteca.internal:9000");
        expect(PROVISION_SERVICES.purchases).toBe("http://mcp.internal/compras");
    });

    it("accepts known modes case-insensitively and ignores unknown ones", async () => {
        process.env.CONSULTA_BUILDER = " Model ";
        process.env.CONSULTA_DELEGATE = "remote";

        const { CONFIG } = await import("../src/config");

        expect(CONFIG.BUILDER).toBe("model");
        expect(CONFIG.DELEGATE).toBe("direct");
    });

    it("falls back on invalid numbers", async () => {
        process.env.CONSULTA_BACKEND_TIMEOUT_MS = "-5";
        process.env.CONSULTA_LLM_TIMEOUT_MS = "abc";
        process.env.CONSULTA_PORT = "5050";

        const { CONFIG, LLM } = await import("../src/config");

        expect(CONFIG.BACKEND_TIMEOUT_MS).toBe(10_000);
        expect(LLM.timeoutMs).toBe(30_000);
        expect(CONFIG.PORT).toBe(5050);
    });

    it("reads model settings", async () => {
        process.env.CONSULTA_LLM_API_KEY = "test-secret";
        process.env.CONSULTA_LLM_MODEL = "tiny-test";

        const { LLM } = await import("../src/config");

        expect(LLM.apiKey).toBe("test-secret");
        expect(LLM.model).toBe("tiny-test");
    });
});
