import * as fs from "node:fs";
import * as path from "node:path";

let cached: string | undefined;

// Same relative hop from src/lib/utils and dist/lib/utils.
export function packageVersion(): string {
  if (cached) return cached;
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "../../../package.json"), {
        encoding: "utf-8",
      }),
    );
    cached =
      typeof raw === "object" &&
      raw !== null &&
      "version" in raw &&
      typeof raw.version === "string"
        ? raw.version
        : "0.0.0";
  } catch (err) {
    console.error("[version] could not read package.json:", err);
    cached = "0.0.0";
  }
  return cached;
}
