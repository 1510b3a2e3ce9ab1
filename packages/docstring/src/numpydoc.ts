/**
 * numpydoc docstrings: section titles underlined with dashes, entries of the
 * form `name : type` followed by an indented description.
 */

import type { DocstringParam, DocstringRaises, ParsedDocstring } from "@sigparse/sdk";
import { appendText, cleanDocstring, emptyDocstring, indentOf, splitDescription } from "./clean.js";

type Section = "params" | "returns" | "raises" | "other";

const PARAM_SECTIONS = new Set(["parameters", "other parameters", "receives"]);
const RETURN_SECTIONS = new Set(["returns", "yields"]);
const RAISE_SECTIONS = new Set(["raises", "warns"]);

const UNDERLINE_RE = /^-{3,}$/;

function sectionFor(title: string): Section {
  const key = title.trim().toLowerCase();
  if (PARAM_SECTIONS.has(key)) return "params";
  if (RETURN_SECTIONS.has(key)) return "returns";
  if (RAISE_SECTIONS.has(key)) return "raises";
  return "other";
}

export function parseNumpydoc(text: string): ParsedDocstring {
  const lines = cleanDocstring(text);
  const description: string[] = [];
  const result: ParsedDocstring = emptyDocstring();

  let section: Section | undefined;
  let params: DocstringParam[] = [];
  let raise: DocstringRaises | undefined;
  let returns = "";

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const next = lines[i + 1] ?? "";

    if (indentOf(line) === 0 && line.trim() && UNDERLINE_RE.test(next.trim())) {
      section = sectionFor(line);
      params = [];
      raise = undefined;
      i++;
      continue;
    }

    if (section === undefined) {
      description.push(line);
      continue;
    }
    if (line.trim() === "") continue;

    const isEntry = indentOf(line) === 0;

    if (section === "params") {
      if (isEntry) {
        const [names = "", typeName] = line.split(/\s+:\s*|\s*:\s+/, 2);
        params = names
          .split(",")
          .map((name) => name.trim().replace(/^\*+/, ""))
          .filter(Boolean)
          .map((name) => ({ name, typeName: typeName?.trim() || undefined, description: "" }));
        result.params.push(...params);
      } else {
        for (const param of params) param.description = appendText(param.description, line);
      }
    } else if (section === "returns") {
      // Entry lines only name the return type.
      if (!isEntry) returns = appendText(returns, line);
    } else if (section === "raises") {
      if (isEntry) {
        raise = { typeName: line.trim(), description: "" };
        result.raises.push(raise);
      } else if (raise) {
        raise.description = appendText(raise.description, line);
      }
    }
  }

  return {
    ...result,
    ...splitDescription(description),
    returns: returns || undefined,
  };
}
