// Demonyms and country spellings, scanned in order; the first hit wins.
const NATIONALITY_LEXICON: ReadonlyArray<readonly [string, string]> = [
  ["chileno", "Chile"],
  ["chilenos", "Chile"],
  ["chilena", "Chile"],
  ["chilenas", "Chile"],
  ["chile", "Chile"],
  ["colombiano", "Colombia"],
  ["colombianos", "Colombia"],
  ["colombiana", "Colombia"],
  ["colombia", "Colombia"],
  ["argentino", "Argentina"],
  ["argentinos", "Argentina"],
  ["argentina", "Argentina"],
  ["peruano", "Peru"],
  ["peruanos", "Peru"],
  ["peruana", "Peru"],
  ["perú", "Peru"],
  ["peru", "Peru"],
  ["español", "España"],
  ["españoles", "España"],
  ["española", "España"],
  ["españa", "España"],
  ["mexicano", "Mexico"],
  ["mexicanos", "Mexico"],
  ["mexicana", "Mexico"],
  ["méxico", "Mexico"],
  ["mexico", "Mexico"],
];

export function resolveNationality(text: string): string | null {
  const lower = text.toLowerCase();
  for (const [variant, canonical] of NATIONALITY_LEXICON) {
    if (lower.includes(variant)) return canonical;
  }
  return null;
}

export function canonicalCountries(): string[] {
  return Array.from(new Set(NATIONALITY_LEXICON.map(([, c]) => c)));
}
