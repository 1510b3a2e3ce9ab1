/**
 * Shared line handling for the docstring grammars.
 */

import type { ParsedDocstring } from "@sigparse/sdk";

/**
 * Normalize raw docstring text: expand tabs, drop the common indentation of
 * every line after the first, strip blank lines at both ends.
 */
export function cleanDocstring(text: string): string[] {
  const lines = text.replace(/\t/g, "        ").split(/\r?\n/);
  const rest = lines.slice(1).filter((line) => line.trim() !== "");
  const margin = rest.length > 0 ? Math.min(...rest.map(indentOf)) : 0;

  const cleaned = [
    (lines[0] ?? "").trimStart(),
    ...lines.slice(1).map((line) => line.slice(margin).trimEnd()),
  ];

  while (cleaned.length > 0 && cleaned[0]?.trim() === "") cleaned.shift();
  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === "") cleaned.pop();
  return cleaned;
}

export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/** First line is the short description; the rest of the block is the long one. */
export function splitDescription(
  lines: readonly string[],
): Pick<ParsedDocstring, "shortDescription" | "longDescription"> {
  const first = lines[0]?.trim();
  const long = lines.slice(1).join("\n").trim();
  return {
    shortDescription: first ? first : undefined,
    longDescription: long ? long : undefined,
  };
}

export function appendText(current: string, line: string): string {
  const trimmed = line.trim();
  if (!trimmed) return current;
  return current ? `${current} ${trimmed}` : trimmed;
}

export function emptyDocstring(): ParsedDocstring {
  return { params: [], raises: [] };
}
