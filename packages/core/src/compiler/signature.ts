/**
 * Declared signatures and their reflection into ParameterSpecs.
 */

import { z } from "zod";
import type { ParameterSpec } from "@sigparse/sdk";
import { NO_DEFAULT } from "@sigparse/sdk";

export interface VariadicParameter<E extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  element: E;
}

/**
 * A callable's declared parameters. `params` lists them in declaration order;
 * `variadic` collects any number of trailing tokens into leading positional
 * call arguments.
 */
export interface Signature<S extends z.ZodRawShape = z.ZodRawShape, E extends z.ZodTypeAny = z.ZodNever> {
  params: z.ZodObject<S>;
  variadic?: VariadicParameter<E>;
  /** Docstring; its grammar is picked with the `docstringStyle` option. */
  doc?: string;
}

export type KeywordsOf<S extends z.ZodRawShape> = z.output<z.ZodObject<S>>;
export type VariadicOf<E extends z.ZodTypeAny> = z.output<E>;

/** Values supplied ahead of time with `withState`. */
export type BoundState<S extends z.ZodRawShape> = Partial<z.input<z.ZodObject<S>>>;

/** Peel `.default()` wrappers, keeping the outermost default. */
function peelDefault(schema: z.ZodTypeAny): { schema: z.ZodTypeAny; defaultValue: unknown } {
  let current = schema;
  let defaultValue: unknown = NO_DEFAULT;
  while (current instanceof z.ZodDefault) {
    if (defaultValue === NO_DEFAULT) defaultValue = current._def.defaultValue();
    current = current.removeDefault();
  }
  return { schema: current, defaultValue };
}

/** `.describe()` text, looked up through wrapper schemas. */
export function inlineDescription(schema: z.ZodTypeAny): string | undefined {
  let current: z.ZodTypeAny | undefined = schema;
  while (current) {
    if (current.description) return current.description;
    if (current instanceof z.ZodDefault) current = current.removeDefault();
    else if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) current = current.unwrap();
    else current = undefined;
  }
  return undefined;
}

export function reflectSignature<S extends z.ZodRawShape, E extends z.ZodTypeAny>(
  signature: Signature<S, E>,
): ParameterSpec[] {
  const specs: ParameterSpec[] = Object.entries<z.ZodTypeAny>(signature.params.shape).map(([name, declared]) => ({
    name,
    ...peelDefault(declared),
    kind: "positional" as const,
    help: inlineDescription(declared),
  }));

  if (signature.variadic) {
    specs.push({
      name: signature.variadic.name,
      schema: signature.variadic.element,
      defaultValue: NO_DEFAULT,
      kind: "variadic",
      help: inlineDescription(signature.variadic.element),
    });
  }
  return specs;
}
