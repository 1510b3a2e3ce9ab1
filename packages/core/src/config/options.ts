/**
 * Compile options and their validation.
 */

import { basename } from "node:path";
import { z } from "zod";
import type { DocstringParser, SurfaceConstructor } from "@sigparse/sdk";
import { ConfigError, DocstringStyle, ErrorCode } from "@sigparse/sdk";
import { validateInput } from "@sigparse/shared";

export interface CompileOptions {
  /** Parameters left off the command line; supply them with `withState`. */
  ignore?: readonly string[];
  /** Flag-parsing engine. Defaults to CommanderSurface. */
  surface?: SurfaceConstructor;
  docstringStyle?: DocstringStyle;
  /** Required whenever `docstringStyle` is set. */
  docstringParser?: DocstringParser;
  /** Program name for usage lines. Defaults to the running script's file name. */
  name?: string;
  /** Replaces the description taken from the docstring. */
  description?: string;
  /** Sink for help and usage output. */
  writeOut?: (text: string) => void;
}

export const CompileOptionsSchema = z.object({
  ignore: z.array(z.string().min(1)).optional(),
  docstringStyle: z.nativeEnum(DocstringStyle).optional(),
  name: z.string().min(1, "name must not be empty").optional(),
  description: z.string().optional(),
});

export interface ResolvedCompileOptions {
  ignore: ReadonlySet<string>;
  surface?: SurfaceConstructor;
  docstringStyle?: DocstringStyle;
  docstringParser?: DocstringParser;
  name: string;
  description?: string;
  writeOut?: (text: string) => void;
}

export function defaultProgramName(argv: readonly string[] = process.argv): string {
  const script = argv[1];
  return script ? basename(script) : "command";
}

export function resolveCompileOptions(options: CompileOptions = {}): ResolvedCompileOptions {
  const result = validateInput(CompileOptionsSchema, {
    ignore: options.ignore,
    docstringStyle: options.docstringStyle,
    name: options.name,
    description: options.description,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid compile options: ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }

  return {
    ignore: new Set(result.data.ignore ?? []),
    surface: options.surface,
    docstringStyle: result.data.docstringStyle,
    docstringParser: options.docstringParser,
    name: result.data.name ?? defaultProgramName(),
    description: result.data.description,
    writeOut: options.writeOut,
  };
}
