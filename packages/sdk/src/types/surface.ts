/**
 * Contract between the compiler and a flag-parsing engine.
 *
 * The compiler only registers definitions and asks for parsed values;
 * tokenizing and help rendering stay with the engine.
 */

import type { ArgumentDefinition, ParsedValues } from "./argument.js";

export interface SurfaceOptions {
  /** Program name shown in usage lines. */
  name: string;
  description?: string;
  /** Sink for help and usage output. Defaults to stdout. */
  writeOut?: (text: string) => void;
}

export interface ArgumentSurface {
  readonly name: string;
  readonly description?: string;

  register(definition: ArgumentDefinition): void;
  definitions(): readonly ArgumentDefinition[];

  /**
   * Parse tokens into parameter values.
   * Throws an ArgumentParseError subclass instead of exiting the process.
   */
  parse(tokens: readonly string[]): ParsedValues;

  formatUsage(): string;
  formatHelp(): string;
  printUsage(): void;
  printHelp(): void;
}

/** Alternate surface implementations are passed to the compiler by class. */
export type SurfaceConstructor = new (options: SurfaceOptions) => ArgumentSurface;
