const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
  const fromEnv = Number.parseInt(raw ?? "", 10);
  if (Number.isFinite(fromEnv) && fromEnv > 0) return fromEnv;
  return fallback;
};

function pickMode<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  const normalized = (raw ?? "").trim().toLowerCase();
  return allowed.find((mode) => mode === normalized) ?? fallback;
}

const stripTrailingSlash = (url: string) => url.replace(/\/+$/, "");

export const BACKENDS = {
  library: stripTrailingSlash(
    process.env.BIBLIOTECA_API || "http://127.0.0.1:8000",
  ),
  purchases: stripTrailingSlash(
    process.env.COMPRAS_API || "http://127.0.0.1:8200",
  ),
};

// Provision services answer `{query}` with context chunks for one domain.
export const PROVISION_SERVICES = {
  library: stripTrailingSlash(
    process.env.MCP_BIBLIOTECA || "http://127.0.0.1:4444/biblioteca",
  ),
  purchases: stripTrailingSlash(
    process.env.MCP_COMPRAS || "http://127.0.0.1:4444/compras",
  ),
};

export const BUILDER_MODES = ["rules", "model"] as const;
export type BuilderMode = (typeof BUILDER_MODES)[number];

export const DELEGATE_MODES = ["direct", "provision"] as const;
export type DelegateMode = (typeof DELEGATE_MODES)[number];

export const CONFIG = {
  BACKEND_TIMEOUT_MS: parsePositiveInt(
    process.env.CONSULTA_BACKEND_TIMEOUT_MS,
    10_000,
  ),
  PREVIEW_CAP: 5,
  DEFAULT_SAMPLE_SIZE: 3,
  DEFAULT_TOP_N: 3,
  MAX_BODY_BYTES: 1_000_000,
  BUILDER: pickMode(process.env.CONSULTA_BUILDER, BUILDER_MODES, "rules"),
  DELEGATE: pickMode(process.env.CONSULTA_DELEGATE, DELEGATE_MODES, "direct"),
  PORT: parsePositiveInt(process.env.CONSULTA_PORT, 4444),
};

export const LLM = {
  endpoint:
    process.env.CONSULTA_LLM_ENDPOINT ||
    "http://127.0.0.1:8080/v1/chat/completions",
  apiKey: process.env.CONSULTA_LLM_API_KEY || "",
  model: process.env.CONSULTA_LLM_MODEL || "tinyllama-1.1b-chat",
  timeoutMs: parsePositiveInt(process.env.CONSULTA_LLM_TIMEOUT_MS, 30_000),
  temperature: 0,
  maxTokens: 256,
};

export const DEBUG =
  process.env.CONSULTA_DEBUG === "1" || process.env.CONSULTA_DEBUG === "true";
