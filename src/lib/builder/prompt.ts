import { canonicalCountries } from "../catalog/nationalities";
import { describeCatalog } from "../catalog/endpoints";
import type { Domain } from "../router/types";

const EXAMPLES: Record<Domain, string> = {
  library: `Pregunta: ¿Qué libros se publicaron en 1967?
{"method": "GET", "path": "/libros/buscar/por-anio/1967", "description": "Libros publicados en 1967"}

Pregunta: ¿Qué autores son colombianos?
{"method": "GET", "path": "/autores/buscar/por-nacionalidad/Colombia", "description": "Autores de Colombia"}

Pregunta: Busca el libro "Ficciones"
{"method": "GET", "path": "/libros/buscar/titulo/Ficciones", "description": "Libros con 'Ficciones'"}

Pregunta: ¿Cuál es el clima de hoy?
{"error": "La pregunta no corresponde a ningún endpoint de la biblioteca"}`,
  purchases: `Pregunta: ¿Qué productos están sin stock?
{"method": "GET", "path": "/productos/sin-stock", "description": "Productos sin stock"}

Pregunta: ¿Cuántos clientes hay en el país Chile?
{"method": "GET", "path": "/clientes/buscar/por-pais/Chile", "description": "Clientes de Chile"}

Pregunta: ¿Qué productos se compraron en 2023?
{"method": "GET", "path": "/productos/comprados?desde=2023-01-01&hasta=2023-12-31", "description": "Productos comprados en 2023"}

Pregunta: ¿Quién ganó el partido?
{"error": "La pregunta no corresponde a ningún endpoint de compras"}`,
};

const DOMAIN_LABEL: Record<Domain, string> = {
  library: "la API de la biblioteca (libros y autores)",
  purchases: "la API de compras (clientes, productos y compras)",
};

export function buildSystemPrompt(domain: Domain): string {
  return `Eres un asistente que traduce preguntas en español a una llamada HTTP sobre ${DOMAIN_LABEL[domain]}.

Responde SOLO con un objeto JSON, sin explicaciones ni markdown.
Si la pregunta corresponde a un endpoint, responde:
{"method": "GET", "path": "<ruta con los parámetros ya sustituidos>", "description": "<resumen breve>"}
Si no corresponde a ninguno o es ambigua, responde:
{"error": "<motivo>"}

Endpoints disponibles:
${describeCatalog(domain)}

Reglas de extracción:
- Los años son números de cuatro dígitos entre 1900 y 2099.
- Las nacionalidades se expresan con el nombre del país: ${canonicalCountries().join(", ")}.
- Los términos de búsqueda de títulos se copian tal como aparecen entre comillas.
- Usa solo rutas de la lista anterior.

Ejemplos:
${EXAMPLES[domain]}`;
}
