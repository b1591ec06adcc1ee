import { CONFIG } from "../../config";
import type { ResultChunk } from "../router/types";
import { lenientLiteralParser, tryParseJson, type LiteralParser } from "./literal";

export const NO_INFORMATION = "No se encontró información.";
export const EMPTY_LIST = "Ninguno";

const TITLE_KEYS = ["titulo", "title"];
const NAME_KEYS = ["nombre", "name"];

type Row = Record<string, unknown>;

const isRecord = (value: unknown): value is Row =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCollection = (value: unknown): value is unknown[] | Row =>
  Array.isArray(value) || isRecord(value);

export interface PrettifyOptions {
  previewCap?: number;
  parser?: LiteralParser;
}

function formatScalar(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "-";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function preview(labels: string[], cap: number): string {
  const shown = labels.slice(0, cap).join(", ");
  return labels.length > cap ? `${shown}, ...` : shown;
}

function dominantKey(rows: Row[]): string | undefined {
  return [...TITLE_KEYS, ...NAME_KEYS].find((key) =>
    rows.every((row) => typeof row[key] === "string"),
  );
}

function personName(row: Row, key: string): string {
  const surname = row.apellidos;
  return typeof surname === "string" && surname
    ? `${formatScalar(row[key])} ${surname}`
    : formatScalar(row[key]);
}

function rowLabel(row: Row, key: string): string {
  const label = NAME_KEYS.includes(key) ? personName(row, key) : formatScalar(row[key]);
  return typeof row.total === "number" ? `${label} (${row.total})` : label;
}

export function summarizeList(
  items: readonly unknown[],
  cap: number = CONFIG.PREVIEW_CAP,
): string {
  if (items.length === 0) return EMPTY_LIST;

  const rows = items.filter(isRecord);
  let labels: string[];
  if (rows.length === items.length) {
    const key = dominantKey(rows);
    if (!key) return `${items.length} registro(s)`;
    labels = rows.map((row) => rowLabel(row, key));
  } else {
    labels = items.map(formatScalar);
  }
  return `${items.length} encontrado(s): ${preview(labels, cap)}`;
}

export function describeRecord(row: Row): string {
  if (typeof row.total_autores === "number" && typeof row.total_libros === "number") {
    const parts = [`${row.total_autores} autores y ${row.total_libros} libros`];
    if (typeof row.nacionalidades_autores === "number") {
      parts.push(`de ${row.nacionalidades_autores} nacionalidades`);
    }
    const range = row["rango_años_publicacion"];
    if (
      isRecord(range) &&
      typeof range["año_mas_antiguo"] === "number" &&
      typeof range["año_mas_reciente"] === "number"
    ) {
      parts.push(
        `publicados entre ${range["año_mas_antiguo"]} y ${range["año_mas_reciente"]}`,
      );
    }
    return parts.join(", ");
  }

  if (
    typeof row.clientes === "number" &&
    typeof row.productos === "number" &&
    typeof row.compras === "number"
  ) {
    return `${row.clientes} clientes, ${row.productos} productos y ${row.compras} compras`;
  }

  const titleKey = TITLE_KEYS.find((key) => typeof row[key] === "string");
  if (titleKey) {
    const year = row.anio_publicacion ?? row.year;
    return typeof year === "number"
      ? `"${formatScalar(row[titleKey])}" (${year})`
      : `"${formatScalar(row[titleKey])}"`;
  }

  const nameKey = NAME_KEYS.find((key) => typeof row[key] === "string");
  if (nameKey) {
    const origin = row.nacionalidad ?? row.pais;
    const name = personName(row, nameKey);
    return typeof origin === "string" ? `${name} (${origin})` : name;
  }

  const pairs = Object.entries(row).map(
    ([key, value]) => `${key}: ${formatScalar(value)}`,
  );
  return pairs.length ? pairs.join(", ") : EMPTY_LIST;
}

export function summarize(value: unknown, cap: number = CONFIG.PREVIEW_CAP): string {
  if (Array.isArray(value)) return summarizeList(value, cap);
  if (isRecord(value)) return describeRecord(value);
  return formatScalar(value);
}

interface EmbeddedLiteral {
  prefix: string;
  value: unknown[] | Row;
}

/**
 * Finds the first `: [...]` or `: {...}` tail that the parser can read.
 */
export function findEmbeddedLiteral(
  text: string,
  parser: LiteralParser = lenientLiteralParser,
): EmbeddedLiteral | undefined {
  for (const m of text.matchAll(/:\s*(?=[[{])/g)) {
    const at = m.index ?? 0;
    const candidate = text.slice(at + m[0].length).trim().replace(/\.$/, "");
    const value = parser.parse(candidate);
    if (isCollection(value)) {
      return { prefix: text.slice(0, at).trim(), value };
    }
  }
  return undefined;
}

const LIST_OF_QUOTED = /\[\s*['"]/;

export function cleanupText(text: string): string {
  let cleaned = text.trim();
  if (LIST_OF_QUOTED.test(cleaned)) {
    cleaned = cleaned
      .replace(/\[\s*['"]/g, "")
      .replace(/['"]\s*\]/g, "")
      .replace(/['"]\s*,\s*['"]/g, ", ")
      .trim();
  }
  if (!cleaned) return cleaned;
  return /[.!?…]$/.test(cleaned) ? cleaned : `${cleaned}.`;
}

const capitalizeFirst = (text: string) =>
  text.charAt(0).toUpperCase() + text.slice(1);

/**
 * Renders one chunk of backend text as a readable sentence.
 */
export function prettifyText(text: string, options: PrettifyOptions = {}): string {
  const cap = options.previewCap ?? CONFIG.PREVIEW_CAP;
  const parser = options.parser ?? lenientLiteralParser;
  const trimmed = text.trim();
  if (!trimmed) return "Sin datos.";

  const parsed = tryParseJson(trimmed);
  if (isCollection(parsed)) return capitalizeFirst(summarize(parsed, cap));
  if (parsed !== undefined && parsed !== null) {
    return cleanupText(formatScalar(parsed));
  }

  const embedded = findEmbeddedLiteral(trimmed, parser);
  if (embedded) {
    const summary = summarize(embedded.value, cap);
    return embedded.prefix
      ? `${embedded.prefix}: ${summary}`
      : capitalizeFirst(summary);
  }

  return cleanupText(trimmed);
}

/**
 * Renders chunks as one string: unnumbered for a single chunk, a numbered
 * list otherwise, and a fixed message when there is nothing to show.
 */
export function formatChunks(
  chunks: readonly ResultChunk[],
  options: PrettifyOptions = {},
): string {
  if (chunks.length === 0) return NO_INFORMATION;
  const lines = chunks.map((c) => prettifyText(c.text, options));
  if (lines.length === 1) return lines[0];
  return lines.map((line, i) => `${i + 1}. ${line}`).join("\n");
}
