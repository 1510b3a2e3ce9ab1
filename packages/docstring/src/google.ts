/**
 * Google-style docstrings: titled sections (`Args:`, `Returns:`, `Raises:`)
 * with `name (type): description` entries and indented continuations.
 */

import type { DocstringParam, DocstringRaises, ParsedDocstring } from "@sigparse/sdk";
import { appendText, cleanDocstring, emptyDocstring, indentOf, splitDescription } from "./clean.js";

type Section = "description" | "params" | "returns" | "raises" | "other";

const SECTION_TITLES: Record<string, Section> = {
  args: "params",
  arguments: "params",
  parameters: "params",
  params: "params",
  "keyword args": "params",
  "keyword arguments": "params",
  "other parameters": "params",
  returns: "returns",
  return: "returns",
  yields: "returns",
  yield: "returns",
  raises: "raises",
  raise: "raises",
  exceptions: "raises",
  except: "raises",
  attributes: "other",
  example: "other",
  examples: "other",
  note: "other",
  notes: "other",
  todo: "other",
  warning: "other",
  warnings: "other",
  warns: "other",
  "see also": "other",
  references: "other",
};

const TITLE_RE = /^([A-Za-z][A-Za-z ]*?)\s*:\s*(.*)$/;
const ENTRY_RE = /^(\*{0,2}\w+)\s*(?:\(([^)]*)\))?\s*:\s*(.*)$/;

function sectionOf(line: string): { section: Section; inline: string } | undefined {
  if (indentOf(line) > 0) return undefined;
  const match = TITLE_RE.exec(line);
  if (!match) return undefined;
  const section = SECTION_TITLES[(match[1] ?? "").toLowerCase()];
  const inline = (match[2] ?? "").trim();
  // Only "Returns: text" may carry its content on the title line.
  if (!section || (inline && section !== "returns")) return undefined;
  return { section, inline };
}

export function parseGoogle(text: string): ParsedDocstring {
  const lines = cleanDocstring(text);
  const description: string[] = [];
  const result: ParsedDocstring = emptyDocstring();

  let section: Section = "description";
  let entryIndent: number | undefined;
  let param: DocstringParam | undefined;
  let raise: DocstringRaises | undefined;
  let returns = "";

  for (const line of lines) {
    const title = sectionOf(line);
    if (title) {
      section = title.section;
      entryIndent = undefined;
      param = undefined;
      raise = undefined;
      if (section === "returns") returns = appendText(returns, title.inline);
      continue;
    }

    if (section === "description") {
      description.push(line);
      continue;
    }
    if (line.trim() === "") continue;

    const indent = indentOf(line);
    entryIndent ??= indent;
    const isEntry = indent <= entryIndent;

    switch (section) {
      case "params": {
        const match = isEntry ? ENTRY_RE.exec(line.trim()) : null;
        if (match) {
          param = {
            name: (match[1] ?? "").replace(/^\*+/, ""),
            typeName: match[2]?.trim() || undefined,
            description: (match[3] ?? "").trim(),
          };
          result.params.push(param);
        } else if (param) {
          param.description = appendText(param.description, line);
        }
        break;
      }

      case "returns":
        returns = appendText(returns, line);
        break;

      case "raises": {
        const match = isEntry ? ENTRY_RE.exec(line.trim()) : null;
        if (match) {
          raise = { typeName: match[1], description: (match[3] ?? "").trim() };
          result.raises.push(raise);
        } else if (raise) {
          raise.description = appendText(raise.description, line);
        }
        break;
      }

      case "other":
        break;
    }
  }

  return {
    ...result,
    ...splitDescription(description),
    returns: returns || undefined,
  };
}
