/**
 * Docstring parsing contract.
 *
 * Parsing is an optional capability: the compiler only uses it when a
 * DocstringStyle is selected, and fails with MissingCapabilityError when no
 * parser was injected.
 */

import { cliEnum } from "../enum.js";

export const DocstringStyle = cliEnum("AUTO", "REST", "GOOGLE", "NUMPYDOC", "EPYDOC");
export type DocstringStyle = (typeof DocstringStyle)[keyof typeof DocstringStyle];

export interface DocstringParam {
  name: string;
  typeName?: string;
  description: string;
}

export interface DocstringRaises {
  typeName?: string;
  description: string;
}

export interface ParsedDocstring {
  shortDescription?: string;
  longDescription?: string;
  params: DocstringParam[];
  returns?: string;
  raises: DocstringRaises[];
}

export type DocstringParser = (text: string, style: DocstringStyle) => ParsedDocstring;
