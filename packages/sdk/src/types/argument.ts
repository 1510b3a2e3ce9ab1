/**
 * Argument definitions produced by the signature compiler.
 */

import type { z } from "zod";

/** Parsing behaviour bound to a registered argument. */
export type ArgumentAction = "store" | "store_true" | "store_false" | "append";

/** Marks a parameter that was declared without a default value. */
export const NO_DEFAULT: unique symbol = Symbol("sigparse.noDefault");
export type NoDefault = typeof NO_DEFAULT;

/** Turns one command-line token into a typed value. Throws InvalidValueError. */
export type ValueConstructor<T = unknown> = (token: string) => T;

export type ParameterKind = "positional" | "variadic";

/** One declared parameter of a signature. */
export interface ParameterSpec {
  readonly name: string;
  /** Declared type with any default wrapper removed. */
  readonly schema: z.ZodTypeAny;
  readonly defaultValue: unknown;
  readonly kind: ParameterKind;
  /** Inline `.describe()` text, if any. */
  readonly help?: string;
}

/** Engine-facing projection of a ParameterSpec. */
export interface ArgumentDefinition {
  /** Name of the parameter the parsed value is delivered to. */
  readonly parameter: string;
  /** `--long-name` for options, bare `long-name` for positionals. */
  readonly flag: string;
  readonly action: ArgumentAction;
  readonly construct?: ValueConstructor;
  /** Advisory member names; only shown in help. */
  readonly choices?: readonly string[];
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
  readonly help?: string;
  /** Collects one or more trailing tokens. */
  readonly variadic: boolean;
}

export interface CompiledConfiguration {
  readonly name: string;
  readonly description?: string;
  readonly definitions: readonly ArgumentDefinition[];
  /** Parameter receiving the variadic sequence, if the signature has one. */
  readonly variadic?: string;
}

/** Parameter name → typed value, as returned by a surface. */
export type ParsedValues = Record<string, unknown>;

/** How a parsed invocation maps onto a call of the wrapped function. */
export interface CallPlan<K = Record<string, unknown>, V = unknown> {
  readonly positional: V[];
  readonly keywords: K;
}

export function isOptionFlag(flag: string): boolean {
  return flag.startsWith("-");
}
