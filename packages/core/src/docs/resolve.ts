/**
 * Documentation Resolver: merges a signature's docstring with inline
 * per-parameter descriptions.
 */

import type { DocstringParser, DocstringStyle } from "@sigparse/sdk";
import { MissingCapabilityError } from "@sigparse/sdk";

export interface DocumentationSources {
  docstring?: string;
  /** Without a style the docstring is used verbatim as the description. */
  style?: DocstringStyle;
  parser?: DocstringParser;
  /** Parameter name → `.describe()` text. Wins over the docstring. */
  inline?: ReadonlyMap<string, string>;
}

export interface ResolvedDocumentation {
  description?: string;
  params: Map<string, string>;
}

export function resolveDocumentation(sources: DocumentationSources): ResolvedDocumentation {
  const params = new Map<string, string>();
  let description = sources.docstring;

  if (sources.style !== undefined) {
    if (!sources.parser) {
      throw new MissingCapabilityError(
        "docstring-parser",
        `docstring style ${sources.style} requested but no docstringParser was provided`,
      );
    }
    description = undefined;
    if (sources.docstring) {
      const parsed = sources.parser(sources.docstring, sources.style);
      description = parsed.longDescription ?? parsed.shortDescription;
      for (const param of parsed.params) params.set(param.name, param.description);
    }
  }

  for (const [name, text] of sources.inline ?? []) params.set(name, text);

  return { description: description || undefined, params };
}
