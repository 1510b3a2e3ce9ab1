/**
 * Invocation Dispatcher: turns parsed values and bound state into a call plan.
 *
 * Variadic values become leading positional arguments; everything else is
 * delivered as one keyword object, validated against the declared schemas.
 */

import { z } from "zod";
import type { CallPlan, CompiledConfiguration, ParsedValues } from "@sigparse/sdk";
import { InvalidValueError, MissingRequiredArgumentError, StateConflictError } from "@sigparse/sdk";
import { formatZodError } from "@sigparse/shared";
import type { BoundState, KeywordsOf, Signature, VariadicOf } from "../compiler/index.js";

function validationFailure(error: z.ZodError, prefix: string): Error {
  const [issue] = error.issues;
  const parameter = issue?.path[0] === undefined ? undefined : String(issue.path[0]);
  const missing = issue?.code === "invalid_type" && issue.received === "undefined";
  const message = `${prefix}: ${formatZodError(error)}`;
  return missing
    ? new MissingRequiredArgumentError(message, { cause: error })
    : new InvalidValueError(message, { parameter, cause: error });
}

export function planCall<S extends z.ZodRawShape, E extends z.ZodTypeAny>(
  signature: Signature<S, E>,
  configuration: CompiledConfiguration,
  parsed: ParsedValues,
  state: BoundState<S> = {},
): CallPlan<KeywordsOf<S>, VariadicOf<E>> {
  const values: ParsedValues = { ...parsed };
  let rest: unknown[] = [];
  if (configuration.variadic !== undefined) {
    const collected = values[configuration.variadic];
    rest = Array.isArray(collected) ? collected : [];
    delete values[configuration.variadic];
  }

  const conflicts = Object.keys(state).filter((key) => Object.hasOwn(values, key));
  if (conflicts.length > 0) throw new StateConflictError(conflicts);

  const keywords = signature.params.safeParse({ ...state, ...values });
  if (!keywords.success) throw validationFailure(keywords.error, configuration.name);

  if (!signature.variadic) return { positional: [], keywords: keywords.data };

  const positional = z.array(signature.variadic.element).safeParse(rest);
  if (!positional.success) throw validationFailure(positional.error, configuration.name);

  return { positional: positional.data, keywords: keywords.data };
}
