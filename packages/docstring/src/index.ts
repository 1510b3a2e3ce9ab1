/**
 * Docstring parsing capability.
 *
 * Inject `parseDocstring` into the compiler (`docstringParser` option) to pull
 * parameter help out of a signature's documentation.
 */

import type { DocstringParser, ParsedDocstring } from "@sigparse/sdk";
import { DocstringStyle } from "@sigparse/sdk";
import { parseFieldList } from "./fields.js";
import { parseGoogle } from "./google.js";
import { parseNumpydoc } from "./numpydoc.js";

type ConcreteStyle = Exclude<DocstringStyle, "AUTO">;

const PARSERS: Record<ConcreteStyle, (text: string) => ParsedDocstring> = {
  REST: (text) => parseFieldList(text, ":"),
  GOOGLE: parseGoogle,
  NUMPYDOC: parseNumpydoc,
  EPYDOC: (text) => parseFieldList(text, "@"),
};

/** Styles tried by AUTO, in tie-breaking order. */
const AUTO_ORDER: readonly ConcreteStyle[] = ["REST", "GOOGLE", "NUMPYDOC", "EPYDOC"];

function metaCount(doc: ParsedDocstring): number {
  return doc.params.length + doc.raises.length + (doc.returns ? 1 : 0);
}

export const parseDocstring: DocstringParser = (text, style) => {
  if (style !== DocstringStyle.AUTO) {
    return PARSERS[style](text);
  }

  let best: ParsedDocstring | undefined;
  for (const candidate of AUTO_ORDER) {
    const parsed = PARSERS[candidate](text);
    if (!best || metaCount(parsed) > metaCount(best)) best = parsed;
  }
  return best ?? PARSERS.REST(text);
};

export { parseGoogle } from "./google.js";
export { parseNumpydoc } from "./numpydoc.js";
export { parseFieldList } from "./fields.js";
export { cleanDocstring } from "./clean.js";
