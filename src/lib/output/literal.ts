/**
 * Best-effort recovery of collection literals that are *almost* JSON, such as
 * `[{'titulo': 'Paula', 'disponible': True}]`. Never throws; anything it
 * cannot read comes back as `undefined`.
 */
export interface LiteralParser {
  parse(text: string): unknown;
}

const BARE_WORDS: Record<string, string> = {
  True: "true",
  False: "false",
  None: "null",
};

/**
 * Rewrites single-quoted strings as JSON strings and maps True/False/None.
 * Double-quoted strings are copied untouched.
 */
export function normalizeQuotedLiteral(text: string): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      let j = i + 1;
      let content = "";
      while (j < text.length && text[j] !== ch) {
        if (text[j] === "\\" && j + 1 < text.length) {
          content += text[j] + text[j + 1];
          j += 2;
          continue;
        }
        content += text[j];
        j++;
      }
      if (ch === '"') {
        out += `"${content}"`;
      } else {
        const unescaped = content.replace(/\\'/g, "'").replace(/\\\\/g, "\\");
        out += JSON.stringify(unescaped);
      }
      i = j + 1;
      continue;
    }
    const word = /^[A-Za-z_]\w*/.exec(text.slice(i));
    if (word) {
      out += BARE_WORDS[word[0]] ?? word[0];
      i += word[0].length;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export const lenientLiteralParser: LiteralParser = {
  parse(text: string): unknown {
    const trimmed = text.trim();
    if (!trimmed) return undefined;
    return tryParseJson(trimmed) ?? tryParseJson(normalizeQuotedLiteral(trimmed));
  },
};
