/**
 * Field-list grammars: reStructuredText (`:param x: text`) and epydoc
 * (`@param x: text`). Both share one scanner and differ in the field marker.
 */

import type { DocstringParam, ParsedDocstring } from "@sigparse/sdk";
import { appendText, cleanDocstring, emptyDocstring, indentOf, splitDescription } from "./clean.js";

const PARAM_KEYS = new Set(["param", "parameter", "arg", "argument", "key", "keyword"]);
const RETURN_KEYS = new Set(["return", "returns"]);
const RAISE_KEYS = new Set(["raise", "raises", "except", "exception"]);

interface Field {
  key: string;
  args: string[];
  text: string;
}

function fieldPattern(marker: ":" | "@"): RegExp {
  return marker === ":" ? /^:(\w+)([^:]*):(.*)$/ : /^@(\w+)([^:]*):(.*)$/;
}

function scanFields(lines: readonly string[], marker: ":" | "@"): { description: string[]; fields: Field[] } {
  const pattern = fieldPattern(marker);
  const description: string[] = [];
  const fields: Field[] = [];
  let current: Field | undefined;

  for (const line of lines) {
    const match = indentOf(line) === 0 ? pattern.exec(line) : null;
    if (match) {
      current = {
        key: match[1] ?? "",
        args: (match[2] ?? "").trim().split(/\s+/).filter(Boolean),
        text: (match[3] ?? "").trim(),
      };
      fields.push(current);
    } else if (current) {
      current.text = appendText(current.text, line);
    } else {
      description.push(line);
    }
  }

  return { description, fields };
}

export function parseFieldList(text: string, marker: ":" | "@"): ParsedDocstring {
  const { description, fields } = scanFields(cleanDocstring(text), marker);
  const result: ParsedDocstring = { ...emptyDocstring(), ...splitDescription(description) };
  const byName = new Map<string, DocstringParam>();
  const types = new Map<string, string>();

  for (const field of fields) {
    const key = field.key.toLowerCase();
    if (PARAM_KEYS.has(key)) {
      const name = field.args[field.args.length - 1];
      if (!name) continue;
      const typeName = field.args.slice(0, -1).join(" ") || undefined;
      const param: DocstringParam = { name, description: field.text, typeName };
      byName.set(name, param);
      result.params.push(param);
    } else if (key === "type") {
      const name = field.args[0];
      if (name) types.set(name, field.text);
    } else if (RETURN_KEYS.has(key)) {
      result.returns = field.text;
    } else if (RAISE_KEYS.has(key)) {
      result.raises.push({ typeName: field.args[0], description: field.text });
    }
  }

  for (const [name, typeName] of types) {
    const param = byName.get(name);
    if (param && !param.typeName) param.typeName = typeName;
  }

  return result;
}
