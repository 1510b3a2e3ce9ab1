/**
 * Command handles: a compiled signature bound to its function.
 *
 * `asArgParser(signature, fn)` compiles once; `run(tokens)` parses and calls
 * `fn(...variadic, keywords)`. `withState` returns a new handle with some
 * keyword values pre-bound, leaving the original untouched.
 */

import type { z } from "zod";
import type { ArgumentSurface, CallPlan, CompiledConfiguration } from "@sigparse/sdk";
import { HelpDisplayedError } from "@sigparse/sdk";
import { createLogger } from "@sigparse/shared";
import type { BoundState, KeywordsOf, Signature, VariadicOf } from "../compiler/index.js";
import { compileSignature } from "../compiler/index.js";
import type { CompileOptions } from "../config/index.js";
import { planCall } from "../dispatch/index.js";

const logger = createLogger("Command");

export type KeywordFn<S extends z.ZodRawShape, R> = (keywords: KeywordsOf<S>) => R;

/** Variadic values first, then the keyword object. */
export type VariadicFn<S extends z.ZodRawShape, E extends z.ZodTypeAny, R> = (
  ...args: [...VariadicOf<E>[], KeywordsOf<S>]
) => R;

/** The function a signature binds to: keyword-only unless it declares `variadic`. */
export type CommandFn<S extends z.ZodRawShape, E extends z.ZodTypeAny, R> = [E] extends [z.ZodNever]
  ? KeywordFn<S, R>
  : VariadicFn<S, E, R>;

type Invoker<S extends z.ZodRawShape, E extends z.ZodTypeAny, R> = (
  positional: VariadicOf<E>[],
  keywords: KeywordsOf<S>,
) => R;

export interface CommandHandle<S extends z.ZodRawShape, E extends z.ZodTypeAny, R> {
  readonly configuration: CompiledConfiguration;
  readonly surface: ArgumentSurface;
  /** Parse tokens (default: process.argv.slice(2)) and call the function. */
  run(tokens?: readonly string[]): R;
  /** Parse and validate without calling. */
  plan(tokens?: readonly string[]): CallPlan<KeywordsOf<S>, VariadicOf<E>>;
  withState(state: BoundState<S>): CommandHandle<S, E, R>;
  formatUsage(): string;
  formatHelp(): string;
  printUsage(): void;
  printHelp(): void;
  /** Print help through the surface's `--help` path. */
  showHelp(): void;
}

function defaultTokens(): string[] {
  return process.argv.slice(2);
}

function takesVariadic<S extends z.ZodRawShape, E extends z.ZodTypeAny, R>(
  signature: Signature<S, E>,
  _fn: KeywordFn<S, R> | VariadicFn<S, E, R>,
): _fn is VariadicFn<S, E, R> {
  return signature.variadic !== undefined;
}

function invokerFor<S extends z.ZodRawShape, E extends z.ZodTypeAny, R>(
  signature: Signature<S, E>,
  fn: KeywordFn<S, R> | VariadicFn<S, E, R>,
): Invoker<S, E, R> {
  if (takesVariadic(signature, fn)) {
    const spread = fn;
    return (positional, keywords) => spread(...positional, keywords);
  }
  const keywordsOnly = fn;
  return (_positional, keywords) => keywordsOnly(keywords);
}

function createHandle<S extends z.ZodRawShape, E extends z.ZodTypeAny, R>(
  signature: Signature<S, E>,
  invoke: Invoker<S, E, R>,
  compiled: { configuration: CompiledConfiguration; surface: ArgumentSurface },
  state: BoundState<S>,
): CommandHandle<S, E, R> {
  const { configuration, surface } = compiled;
  const log = logger.child("run", { command: configuration.name });

  const handle: CommandHandle<S, E, R> = {
    configuration,
    surface,

    plan(tokens = defaultTokens()) {
      const parsed = surface.parse(tokens);
      return planCall(signature, configuration, parsed, state);
    },

    run(tokens = defaultTokens()) {
      const { positional, keywords } = handle.plan(tokens);
      log.debug("Dispatching", { positional: positional.length, bound: Object.keys(state) });
      return invoke(positional, keywords);
    },

    withState(next) {
      return createHandle(signature, invoke, compiled, { ...next });
    },

    formatUsage: () => surface.formatUsage(),
    formatHelp: () => surface.formatHelp(),
    printUsage: () => surface.printUsage(),
    printHelp: () => surface.printHelp(),

    showHelp() {
      try {
        surface.parse(["--help"]);
      } catch (err) {
        if (err instanceof HelpDisplayedError) return;
        throw err;
      }
    },
  };
  return handle;
}

function bind<S extends z.ZodRawShape, E extends z.ZodTypeAny, R>(
  signature: Signature<S, E>,
  fn: KeywordFn<S, R> | VariadicFn<S, E, R>,
  options?: CompileOptions,
): CommandHandle<S, E, R> {
  return createHandle(signature, invokerFor(signature, fn), compileSignature(signature, options), {});
}

export function createCommand<S extends z.ZodRawShape, E extends z.ZodTypeAny = z.ZodNever, R = unknown>(
  signature: Signature<S, E>,
  fn: CommandFn<S, E, R>,
  options?: CompileOptions,
): CommandHandle<S, E, R> {
  return bind<S, E, R>(signature, fn, options);
}

/**
 * Compile `signature` into a command for `fn`.
 *
 * Also usable as a factory: `asArgParser(signature, options)(fn)`.
 */
export function asArgParser<S extends z.ZodRawShape, E extends z.ZodTypeAny = z.ZodNever, R = unknown>(
  signature: Signature<S, E>,
  fn: CommandFn<S, E, R>,
  options?: CompileOptions,
): CommandHandle<S, E, R>;
export function asArgParser<S extends z.ZodRawShape, E extends z.ZodTypeAny = z.ZodNever>(
  signature: Signature<S, E>,
  options?: CompileOptions,
): <R>(fn: CommandFn<S, E, R>) => CommandHandle<S, E, R>;
export function asArgParser<S extends z.ZodRawShape, E extends z.ZodTypeAny, R>(
  signature: Signature<S, E>,
  fnOrOptions?: KeywordFn<S, R> | VariadicFn<S, E, R> | CompileOptions,
  options?: CompileOptions,
): CommandHandle<S, E, R> | (<T>(fn: CommandFn<S, E, T>) => CommandHandle<S, E, T>) {
  if (typeof fnOrOptions === "function") {
    return bind(signature, fnOrOptions, options);
  }
  return <T>(fn: CommandFn<S, E, T>) => createCommand<S, E, T>(signature, fn, fnOrOptions);
}
