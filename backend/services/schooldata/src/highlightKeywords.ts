// backend/services/schooldata/src/highlightKeywords.ts
import fs from "node:fs/promises";

/** One keyword per line; blank lines and `#` comments ignored. */
export function parseKeywords(text: string): string[] {
  const out = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const kw = line.trim();
    if (kw && !kw.startsWith("#")) out.add(kw);
  }
  return [...out];
}

export async function loadHighlightKeywords(file: string): Promise<string[]> {
  return parseKeywords(await fs.readFile(file, "utf8"));
}
